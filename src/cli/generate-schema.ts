#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';

export function generatePortSchema(): string {
  return `-- migrate:up
CREATE TABLE process_instance (
    process_instance_key BIGINT PRIMARY KEY,
    description TEXT
);

CREATE TABLE container (
    container_id VARCHAR(50) PRIMARY KEY,
    operation_type VARCHAR(20) NOT NULL CHECK (operation_type IN ('loading', 'unloading')),
    weight INTEGER NOT NULL
);

CREATE TABLE storage (
    storage_id SERIAL PRIMARY KEY,
    container_id VARCHAR(50) NOT NULL UNIQUE REFERENCES container(container_id) ON DELETE CASCADE,
    storage_status VARCHAR(50) NOT NULL CHECK (storage_status IN ('complete', 'incomplete'))
);

CREATE TABLE transport_mean (
    transportation_id VARCHAR(20) PRIMARY KEY,
    container_id VARCHAR(50) NOT NULL REFERENCES container(container_id) ON DELETE CASCADE,
    check_in TIMESTAMP,
    check_out TIMESTAMP,
    CONSTRAINT transport_mean_kind CHECK (
        transportation_id LIKE 'truck%' OR
        (transportation_id LIKE 'ship%' AND check_in IS NULL AND check_out IS NULL)
    )
);

CREATE INDEX idx_container_operation_type ON container (operation_type);
CREATE INDEX idx_storage_status ON storage (storage_status);
CREATE INDEX idx_transport_mean_container_id ON transport_mean (container_id);

CREATE VIEW active_operations AS
SELECT c.container_id, c.operation_type, c.weight,
       s.storage_id, s.storage_status,
       t.transportation_id, t.check_in, t.check_out
FROM container c
JOIN storage s ON c.container_id = s.container_id
JOIN transport_mean t ON c.container_id = t.container_id
WHERE s.storage_status = 'incomplete';

CREATE VIEW completed_operations_summary AS
SELECT c.operation_type,
       COUNT(*) AS total_operations,
       AVG(c.weight) AS avg_weight,
       MIN(c.weight) AS min_weight,
       MAX(c.weight) AS max_weight
FROM container c
JOIN storage s ON c.container_id = s.container_id
WHERE s.storage_status = 'complete'
GROUP BY c.operation_type;

CREATE VIEW truck_operations AS
SELECT t.transportation_id, c.container_id, c.operation_type, c.weight,
       s.storage_status, t.check_in, t.check_out,
       EXTRACT(EPOCH FROM (t.check_out - t.check_in)) / 60 AS duration_minutes
FROM transport_mean t
JOIN container c ON t.container_id = c.container_id
JOIN storage s ON t.container_id = s.container_id
WHERE t.transportation_id LIKE 'truck%';

CREATE VIEW ship_operations AS
SELECT t.transportation_id, c.container_id, c.operation_type, c.weight,
       s.storage_status
FROM transport_mean t
JOIN container c ON t.container_id = c.container_id
JOIN storage s ON t.container_id = s.container_id
WHERE t.transportation_id LIKE 'ship%';

-- migrate:down
DROP VIEW IF EXISTS ship_operations;
DROP VIEW IF EXISTS truck_operations;
DROP VIEW IF EXISTS completed_operations_summary;
DROP VIEW IF EXISTS active_operations;
DROP TABLE IF EXISTS transport_mean;
DROP TABLE IF EXISTS storage;
DROP TABLE IF EXISTS container;
DROP TABLE IF EXISTS process_instance;
`;
}

const USAGE =
  'Usage: port-operations generate-schema\n\n' +
  'Generates a dbmate-compatible SQL migration for the port operations tables and views.\n\n' +
  'Example:\n' +
  '  npx port-operations generate-schema';

export function migrationFileName(now: Date): string {
  const timestamp = now.toISOString().replace(/[-:T]/g, '').slice(0, 14);
  return `${timestamp}_create_port_schema.sql`;
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    console.log(USAGE);
    process.exit(args.length === 0 ? 1 : 0);
  }

  const command = args[0];
  if (command !== 'generate-schema') {
    console.error(`Unknown command: ${command}`);
    console.error('Available commands: generate-schema');
    process.exit(1);
  }

  const migrationsDir = path.resolve('db', 'migrations');
  if (!fs.existsSync(migrationsDir)) {
    fs.mkdirSync(migrationsDir, { recursive: true });
  }

  const filePath = path.join(migrationsDir, migrationFileName(new Date()));
  fs.writeFileSync(filePath, generatePortSchema(), 'utf-8');
  console.log(`Migration created: ${filePath}`);
}

if (require.main === module) {
  main();
}
