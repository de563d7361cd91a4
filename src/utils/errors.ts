export type SchedulingErrorCode = 'INVALID_REQUEST' | 'INVALID_STRATEGY' | 'DATA_FETCH_FAILED';

export type SimulationErrorCode =
  | 'PRODUCT_NOT_FOUND'
  | 'NO_ACTIVE_LINES'
  | 'NO_ELIGIBLE_LINES'
  | 'NO_FEASIBLE_SCENARIO'
  | 'DATA_FETCH_FAILED';

export class SchedulingError extends Error {
  constructor(message: string, public code: SchedulingErrorCode, public details?: unknown) {
    super(message);
    this.name = 'SchedulingError';
  }
}

export class SimulationError extends Error {
  constructor(message: string, public code: SimulationErrorCode, public details?: unknown) {
    super(message);
    this.name = 'SimulationError';
  }
}

export class ValidationError extends Error {
  constructor(message: string, public field: string, public value?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class DatabaseError extends Error {
  constructor(message: string, public operation: string, public originalError?: Error) {
    super(message);
    this.name = 'DatabaseError';
  }
}

export class JobQueueError extends Error {
  constructor(message: string, public jobId?: string, public originalError?: Error) {
    super(message);
    this.name = 'JobQueueError';
  }
}

export function isRetryableError(error: Error): boolean {
  return error instanceof JobQueueError;
}

/** Errors caused by the request itself; the API boundary reports them as 422. */
export function isClientError(error: unknown): error is SchedulingError | SimulationError | ValidationError {
  return error instanceof SchedulingError || error instanceof SimulationError || error instanceof ValidationError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
