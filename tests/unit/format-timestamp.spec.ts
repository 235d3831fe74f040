import {
  formatTimestamp,
  parseTimestamp,
  toTimestampString,
} from '../../src/utils/format-timestamp';

describe('formatTimestamp', () => {
  it('should format local time as YYYY-MM-DD HH:MM:SS', () => {
    expect(formatTimestamp(new Date(2025, 2, 4, 7, 8, 9))).toBe(
      '2025-03-04 07:08:09',
    );
  });
});

describe('parseTimestamp', () => {
  it('should parse the space separated pattern', () => {
    const parsed = parseTimestamp('2025-03-14 08:45:00');
    expect(parsed?.getTime()).toBe(new Date(2025, 2, 14, 8, 45, 0).getTime());
  });

  it('should accept a T separator and fractional seconds', () => {
    const parsed = parseTimestamp('2025-03-14T08:45:00.123');
    expect(parsed?.getTime()).toBe(new Date(2025, 2, 14, 8, 45, 0).getTime());
  });

  it('should drop a zone designator and keep the wall-clock time', () => {
    const expected = new Date(2025, 2, 14, 8, 45, 0).getTime();
    expect(parseTimestamp('2025-03-14T08:45:00Z')?.getTime()).toBe(expected);
    expect(parseTimestamp('2025-03-14T08:45:00.500+02:00')?.getTime()).toBe(expected);
    expect(parseTimestamp('2025-03-14 08:45:00-0530')?.getTime()).toBe(expected);
  });

  it('should reject malformed text and overflowing parts', () => {
    expect(parseTimestamp('yesterday')).toBeNull();
    expect(parseTimestamp('2025-13-01 00:00:00')).toBeNull();
    expect(parseTimestamp('2025-02-30 00:00:00')).toBeNull();
  });
});

describe('toTimestampString', () => {
  it('should normalize dates and timestamp text', () => {
    expect(toTimestampString(new Date(2025, 0, 1, 0, 0, 0))).toBe(
      '2025-01-01 00:00:00',
    );
    expect(toTimestampString('2025-01-01T10:20:30')).toBe('2025-01-01 10:20:30');
  });

  it('should return null for invalid input', () => {
    expect(toTimestampString(new Date(Number.NaN))).toBeNull();
    expect(toTimestampString('not a time')).toBeNull();
  });
});
