export class RelayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = "RelayError";
  }
}

export class ConfigurationError extends RelayError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIGURATION_ERROR", cause);
    this.name = "ConfigurationError";
  }
}

export type EntityKind = "session" | "job" | "approval";

export class NotFoundError extends RelayError {
  constructor(
    public readonly entity: EntityKind,
    public readonly id: string
  ) {
    super(`${entity.charAt(0).toUpperCase()}${entity.slice(1)} not found: ${id}`, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export type ConflictReason =
  | "CONFLICT"
  | "SESSION_BUSY_OVERFLOW"
  | "SESSION_CLOSING"
  | "INVALID_TRANSITION"
  | "NO_PENDING_APPROVAL";

export class ConflictError extends RelayError {
  constructor(message: string, reason: ConflictReason = "CONFLICT") {
    super(message, reason);
    this.name = "ConflictError";
  }
}

export class ValidationError extends RelayError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class StoreError extends RelayError {
  constructor(message: string, cause?: Error) {
    super(message, "STORE_ERROR", cause);
    this.name = "StoreError";
  }
}

export class WorkspaceError extends RelayError {
  constructor(message: string, cause?: Error) {
    super(message, "WORKSPACE_ERROR", cause);
    this.name = "WorkspaceError";
  }
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
