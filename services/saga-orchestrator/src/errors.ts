export type SagaErrorCode =
  | "INVALID_REQUEST"
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "ALREADY_TERMINAL"
  | "COMPENSATION_IN_PROGRESS"
  | "TOO_ADVANCED_TO_CANCEL"
  | "VERSION_CONFLICT"
  | "FINALIZATION_FAILED";

/**
 * Base class for every error the orchestrator raises on purpose. Routes translate
 * `statusCode` into the HTTP response; anything else is an unexpected 500.
 */
export class SagaError extends Error {
  constructor(
    message: string,
    public readonly code: SagaErrorCode,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = "SagaError";
  }
}

export class InvalidRequestError extends SagaError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, "INVALID_REQUEST", 400);
    this.name = "InvalidRequestError";
  }
}

export class NotFoundError extends SagaError {
  constructor(
    public readonly resource: "saga" | "vehicle" | "customer",
    public readonly id: string
  ) {
    super(`${resource} ${id} not found`, "NOT_FOUND", 404);
    this.name = "NotFoundError";
  }
}

export class AlreadyExistsError extends SagaError {
  constructor(public readonly transactionId: string) {
    super(`saga ${transactionId} already exists`, "ALREADY_EXISTS", 409);
    this.name = "AlreadyExistsError";
  }
}

export class AlreadyTerminalError extends SagaError {
  constructor(
    public readonly transactionId: string,
    public readonly status: string
  ) {
    super(`saga ${transactionId} is already ${status}`, "ALREADY_TERMINAL", 409);
    this.name = "AlreadyTerminalError";
  }
}

export class CompensationInProgressError extends SagaError {
  constructor(public readonly transactionId: string) {
    super(`saga ${transactionId} is already compensating a failure`, "COMPENSATION_IN_PROGRESS", 409);
    this.name = "CompensationInProgressError";
  }
}

export class TooAdvancedToCancelError extends SagaError {
  constructor(public readonly transactionId: string) {
    super(
      `saga ${transactionId} is too advanced to cancel: the vehicle sale is in progress`,
      "TOO_ADVANCED_TO_CANCEL",
      409
    );
    this.name = "TooAdvancedToCancelError";
  }
}

// Never surfaced to callers: the handler rejects and the transport redelivers.
export class VersionConflictError extends SagaError {
  constructor(
    public readonly transactionId: string,
    public readonly expectedVersion: number
  ) {
    super(`saga ${transactionId} changed since version ${expectedVersion}`, "VERSION_CONFLICT", 409);
    this.name = "VersionConflictError";
  }
}

export class FinalizationError extends SagaError {
  constructor(message: string) {
    super(message, "FINALIZATION_FAILED", 502);
    this.name = "FinalizationError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
