import StateMachine from 'javascript-state-machine';
import { InvalidStorageTransitionError } from '../errors/invalid-storage-transition.error';
import type { StorageStatus } from '../interfaces/port-records.interface';

const STORAGE_STATES: readonly StorageStatus[] = ['incomplete', 'complete'];

/**
 * `complete` is terminal: the only transition out of it leads back to itself,
 * which keeps repeated storage jobs idempotent.
 */
const STORAGE_TRANSITIONS = [
  { name: 'store', from: ['incomplete', 'complete'], to: 'complete' },
];

const TRANSITION_BY_TARGET: Record<StorageStatus, string | undefined> = {
  complete: 'store',
  incomplete: undefined,
};

export function isStorageStatus(value: unknown): value is StorageStatus {
  return (
    typeof value === 'string' &&
    (STORAGE_STATES as readonly string[]).includes(value)
  );
}

export interface StorageTransition {
  from: StorageStatus;
  to: StorageStatus;
  changed: boolean;
}

export class StorageLifecycle {
  private readonly fsm: StateMachine;
  private readonly initial: StorageStatus;

  constructor(current: StorageStatus) {
    this.initial = current;
    this.fsm = new StateMachine({
      init: current,
      transitions: STORAGE_TRANSITIONS,
    });
  }

  get state(): StorageStatus {
    const state = this.fsm.state;
    if (!isStorageStatus(state)) {
      throw new Error(`Storage lifecycle reached unknown state "${state}"`);
    }
    return state;
  }

  canTransitionTo(target: StorageStatus): boolean {
    const name = TRANSITION_BY_TARGET[target];
    return name !== undefined && this.fsm.can(name);
  }

  transitionTo(target: StorageStatus): StorageTransition {
    const name = TRANSITION_BY_TARGET[target];
    if (name === undefined || !this.fsm.can(name)) {
      throw new InvalidStorageTransitionError(this.state, target);
    }

    const transitionFn = this.fsm[name];
    if (typeof transitionFn !== 'function') {
      throw new Error(`Transition ${name} is not available on storage lifecycle`);
    }
    transitionFn.call(this.fsm);

    return {
      from: this.initial,
      to: this.state,
      changed: this.initial !== this.state,
    };
  }
}

/**
 * Resolves the status a storage job writes. A missing record counts as
 * `incomplete`.
 */
export function completeStorage(current: StorageStatus | null): StorageTransition {
  return new StorageLifecycle(current ?? 'incomplete').transitionTo('complete');
}
