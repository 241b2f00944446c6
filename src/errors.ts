export class ConsoleLinkError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConsoleLinkError";
    this.code = code;
  }
}

// ── Domain errors ──

export class DiscoveryError extends ConsoleLinkError {
  readonly address: string;

  constructor(address: string, options?: ErrorOptions) {
    super(`Failed to discover console at ${address}`, "DISCOVERY", options);
    this.name = "DiscoveryError";
    this.address = address;
  }
}

export class WaitTimeoutError extends ConsoleLinkError {
  readonly messageType: string;
  readonly timeoutMs: number;

  constructor(messageType: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms waiting for "${messageType}"`, "TIMEOUT");
    this.name = "WaitTimeoutError";
    this.messageType = messageType;
    this.timeoutMs = timeoutMs;
  }
}

export class ConnectionFailedError extends ConsoleLinkError {
  readonly attempts: number;

  constructor(address: string, attempts: number, options?: ErrorOptions) {
    super(`Failed to connect to ${address} after ${attempts} attempts`, "CONNECTION_FAILED", options);
    this.name = "ConnectionFailedError";
    this.attempts = attempts;
  }
}

export class ConnectionRejectedError extends ConsoleLinkError {
  readonly result: number;

  constructor(address: string, result: number) {
    super(`Console at ${address} rejected the connection (result ${result})`, "CONNECTION_REJECTED");
    this.name = "ConnectionRejectedError";
    this.result = result;
  }
}

export class ChannelOpenError extends ConsoleLinkError {
  readonly result: number;

  constructor(result: number) {
    super(`Failed to open channel (result ${result})`, "CHANNEL_OPEN_FAILED");
    this.name = "ChannelOpenError";
    this.result = result;
  }
}

export class DisposedError extends ConsoleLinkError {
  constructor(what: string) {
    super(`${what} has been disposed`, "DISPOSED");
    this.name = "DisposedError";
  }
}

export class MessageValidationError extends ConsoleLinkError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "INVALID_MESSAGE", options);
    this.name = "MessageValidationError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to ConsoleLinkError (preserves cause chain). */
export function toConsoleLinkError(value: unknown): ConsoleLinkError {
  if (value instanceof ConsoleLinkError) return value;
  if (value instanceof Error) return new ConsoleLinkError(value.message, "UNKNOWN", { cause: value });
  return new ConsoleLinkError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
