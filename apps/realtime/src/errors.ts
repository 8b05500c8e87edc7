/**
 * Error taxonomy for the sync engine.
 *
 * - ProtocolError: malformed or unexpected message, fatal for the connection
 * - TransportError: connection reset or refused, triggers reconnect/removal
 * - PlayerAdapterError: local player unreachable or rejected a command
 */

export type ProtocolErrorCode =
  | "MALFORMED"
  | "UNSUPPORTED_VERSION"
  | "UNEXPECTED_MESSAGE";

export class ProtocolError extends Error {
  readonly code: ProtocolErrorCode;

  constructor(code: ProtocolErrorCode, message: string) {
    super(message);
    this.name = "ProtocolError";
    this.code = code;
  }
}

export class TransportError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class PlayerAdapterError extends Error {
  /** Adapter operation that failed, e.g. "seek" */
  readonly operation: string;

  constructor(operation: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "PlayerAdapterError";
    this.operation = operation;
  }
}

export class ReconnectExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, options?: ErrorOptions) {
    super(`Gave up reconnecting after ${attempts} attempts`, options);
    this.name = "ReconnectExhaustedError";
    this.attempts = attempts;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Readable message for anything thrown */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
