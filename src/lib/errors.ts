import type { ElevatorEvent } from '@/types/simulation.types';

export type ElevatorErrorCode =
  | 'INVALID_CONFIG'
  | 'INVALID_ARGUMENT'
  | 'SELF_TRANSITION'
  | 'ILLEGAL_TRANSITION'
  | 'NOT_HALTED'
  | 'NO_SAVED_STATE'
  | 'UNEXPECTED_FLAGS'
  | 'REENTRANT_CALL';

export class ElevatorError extends Error {
  readonly code: ElevatorErrorCode;

  constructor(code: ElevatorErrorCode, message: string) {
    super(message);
    this.name = 'ElevatorError';
    this.code = code;
  }
}

/**
 * Decides what happens when a controller invariant does not hold.
 * A strict policy throws; a lenient one records an `invalid` event and
 * lets the caller skip the operation.
 */
export interface AssertionPolicy {
  readonly strict: boolean;
  /** Returns `condition`, after failing when it is false. */
  check(condition: boolean, code: ElevatorErrorCode, message: string): boolean;
}

export function createAssertionPolicy(
  strict: boolean,
  emit: (event: ElevatorEvent) => void
): AssertionPolicy {
  return {
    strict,
    check(condition, code, message) {
      if (condition) return true;
      if (strict) throw new ElevatorError(code, message);
      emit({ type: 'invalid', message: `${code}: ${message}` });
      return false;
    }
  };
}
