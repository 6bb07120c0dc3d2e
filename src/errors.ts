/**
 * Client Error Classes
 *
 * `category` separates transport faults (the caller may reconnect and retry)
 * from protocol faults and caller mistakes.
 */

export type ErrorCategory = "transport" | "protocol" | "precondition";

export class ClientError extends Error {
  readonly category: ErrorCategory;

  constructor(category: ErrorCategory, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ClientError";
    this.category = category;
  }

  get retryable(): boolean {
    return this.category === "transport";
  }
}

/* ── transport ───────────────────────────────────────────── */

export class ConnectionError extends ClientError {
  constructor(message: string, options?: ErrorOptions) {
    super("transport", message, options);
    this.name = "ConnectionError";
  }
}

export class ConnectionClosed extends ClientError {
  constructor(message: string, options?: ErrorOptions) {
    super("transport", message, options);
    this.name = "ConnectionClosed";
  }
}

export class TimeoutError extends ClientError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super("transport", message);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/* ── protocol ────────────────────────────────────────────── */

export class MalformedMessage extends ClientError {
  constructor(message: string, options?: ErrorOptions) {
    super("protocol", message, options);
    this.name = "MalformedMessage";
  }
}

export class FieldOverflow extends ClientError {
  readonly field: string;

  constructor(field: string, message: string) {
    super("protocol", `${field}: ${message}`);
    this.name = "FieldOverflow";
    this.field = field;
  }
}

/* ── caller ──────────────────────────────────────────────── */

export class PreconditionError extends ClientError {
  constructor(message: string, options?: ErrorOptions) {
    super("precondition", message, options);
    this.name = "PreconditionError";
  }
}

export class SigningError extends ClientError {
  constructor(message: string, options?: ErrorOptions) {
    super("precondition", message, options);
    this.name = "SigningError";
  }
}
