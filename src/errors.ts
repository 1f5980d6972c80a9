export type SignalErrorCode =
  | "NOT_FOUND"
  | "ALREADY_PROCESSED"
  | "TRANSPORT_FAILURE"
  | "CONFIGURATION_MISSING"
  | "STORE_UNAVAILABLE"
  | "INVALID_COMMAND";

export class SignalError extends Error {
  constructor(
    message: string,
    public readonly code: SignalErrorCode,
  ) {
    super(message);
    this.name = "SignalError";
  }
}

export class NotFoundError extends SignalError {
  constructor(id: string) {
    super(`No signal '${id}' found`, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class AlreadyProcessedError extends SignalError {
  constructor(
    id: string,
    public readonly status: string,
  ) {
    super(`Signal '${id}' was already processed (${status})`, "ALREADY_PROCESSED");
    this.name = "AlreadyProcessedError";
  }
}

export class TransportFailureError extends SignalError {
  constructor(destination: string, reason: string) {
    super(`Transport to '${destination}' failed: ${reason}`, "TRANSPORT_FAILURE");
    this.name = "TransportFailureError";
  }
}

export class ConfigurationMissingError extends SignalError {
  constructor(setting: string) {
    super(`Missing configuration: ${setting}`, "CONFIGURATION_MISSING");
    this.name = "ConfigurationMissingError";
  }
}

export class StoreUnavailableError extends SignalError {
  constructor(
    operation: string,
    public readonly cause?: unknown,
  ) {
    super(
      `Store unavailable during ${operation}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      "STORE_UNAVAILABLE",
    );
    this.name = "StoreUnavailableError";
  }
}

export class InvalidCommandError extends SignalError {
  constructor(message: string) {
    super(message, "INVALID_COMMAND");
    this.name = "InvalidCommandError";
  }
}

/** Structured result for operator-facing operations. */
export type OpResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: SignalError };

export const ok = <T>(value: T): OpResult<T> => ({ ok: true, value });
export const fail = <T>(error: SignalError): OpResult<T> => ({
  ok: false,
  error,
});

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
