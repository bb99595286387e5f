export type TagwireErrorCode =
  | "E_CLOSED"
  | "E_CANCELED"
  | "E_CONNECTION"
  | "E_PROTOCOL"
  | "E_CONFIGURATION"
  | "E_MESSAGE_TRUNCATED"
  | "E_INVALID_TAG"
  | "E_CONTEXT_IN_USE"
  | "E_CONTEXT_RESET"
  | "E_ALREADY_INITIALIZED";

export class TagwireError extends Error {
  readonly code: TagwireErrorCode;

  constructor(code: TagwireErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    this.name = "TagwireError";
  }
}

/** Operation attempted on an endpoint that is closed or aborted. */
export class ClosedError extends TagwireError {
  constructor(message = "Endpoint closed", options?: ErrorOptions) {
    super("E_CLOSED", message, options);
    this.name = "ClosedError";
  }
}

/** Operation canceled, usually by a concurrent teardown of its connection. */
export class CanceledError extends TagwireError {
  constructor(message = "Operation canceled", options?: ErrorOptions) {
    super("E_CANCELED", message, options);
    this.name = "CanceledError";
  }
}

export class ConnectionError extends TagwireError {
  constructor(message: string, options?: ErrorOptions) {
    super("E_CONNECTION", message, options);
    this.name = "ConnectionError";
  }
}

/** Peer handshake desync. Never retried. */
export class ProtocolError extends TagwireError {
  constructor(message: string, options?: ErrorOptions) {
    super("E_PROTOCOL", message, options);
    this.name = "ProtocolError";
  }
}

export class ConfigurationError extends TagwireError {
  constructor(message: string, options?: ErrorOptions) {
    super("E_CONFIGURATION", message, options);
    this.name = "ConfigurationError";
  }
}

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));
