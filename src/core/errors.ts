/**
 * Profiler Errors
 *
 * Usage errors raised at the call site. They propagate to the caller
 * unchanged; nothing in the library catches them.
 */

export type ProfilerErrorCode =
  | 'DUPLICATE_ACTION_START'
  | 'UNKNOWN_ACTION_STOP'
  | 'INVALID_ACTION_NAME'
  | 'INVALID_DURATION';

/**
 * Base class for every error thrown by the profiler
 */
export class ProfilerError extends Error {
  readonly code: ProfilerErrorCode;
  readonly action: string;

  constructor(code: ProfilerErrorCode, action: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.action = action;
  }
}

/**
 * start() on an action that is already in flight
 */
export class DuplicateActionStartError extends ProfilerError {
  constructor(action: string) {
    super(
      'DUPLICATE_ACTION_START',
      action,
      `Attempted to start "${action}" which has already started`
    );
  }
}

/**
 * stop() on an action that was never started
 */
export class UnknownActionStopError extends ProfilerError {
  constructor(action: string) {
    super(
      'UNKNOWN_ACTION_STOP',
      action,
      `Attempted to stop "${action}" which was never started`
    );
  }
}

export class InvalidActionNameError extends ProfilerError {
  constructor(action: string) {
    super(
      'INVALID_ACTION_NAME',
      action,
      'Cannot profile an anonymous function without an explicit action name'
    );
  }
}

export class InvalidDurationError extends ProfilerError {
  readonly duration: number;

  constructor(action: string, duration: number) {
    super(
      'INVALID_DURATION',
      action,
      `Cannot record duration ${duration} for "${action}": expected a finite number >= 0`
    );
    this.duration = duration;
  }
}
