/**
 * Client Domain Errors - Structured error types for the game client
 *
 * Error Categories:
 * - **Connection Errors**: TCP connection failures and unexpected closes
 * - **Protocol Errors**: Malformed or unexpected XML from the server
 * - **Server Errors**: Error messages the server reports in a room
 * - **Move Errors**: The player's logic failing to produce a move
 *
 * Usage:
 * ```typescript
 * import { ProtocolError, ClientErrorCode } from './ClientDomainErrors';
 *
 * throw new ProtocolError(
 *   ClientErrorCode.PROTOCOL_MISSING_ATTRIBUTE,
 *   "No attribute with key 'roomId' found in <joined>!"
 * );
 * ```
 *
 * @module ClientDomainErrors
 */

// ═══════════════════════════════════════════════════════════════════════════
// ERROR CODES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Error codes are prefixed by category:
 * - CONNECTION_*: Transport errors
 * - PROTOCOL_*: XML protocol errors
 * - SERVER_*: Errors reported by the game server
 * - MOVE_*: Move selection errors
 */
export enum ClientErrorCode {
  // Connection Errors
  CONNECTION_FAILED = 'CONNECTION_FAILED',
  CONNECTION_CLOSED = 'CONNECTION_CLOSED',

  // Protocol Errors
  PROTOCOL_MALFORMED_XML = 'PROTOCOL_MALFORMED_XML',
  PROTOCOL_MISSING_ATTRIBUTE = 'PROTOCOL_MISSING_ATTRIBUTE',
  PROTOCOL_MISSING_CHILD = 'PROTOCOL_MISSING_CHILD',
  PROTOCOL_INVALID_VALUE = 'PROTOCOL_INVALID_VALUE',
  PROTOCOL_UNEXPECTED_MESSAGE = 'PROTOCOL_UNEXPECTED_MESSAGE',

  // Server Errors
  SERVER_REPORTED_ERROR = 'SERVER_REPORTED_ERROR',

  // Move Errors
  MOVE_SELECTION_FAILED = 'MOVE_SELECTION_FAILED',
  MOVE_NO_LEGAL_MOVE = 'MOVE_NO_LEGAL_MOVE',

  // Internal Errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Process exit codes for error types, used by the CLI entry point.
 */
export const ERROR_EXIT_CODES: Record<ClientErrorCode, number> = {
  [ClientErrorCode.CONNECTION_FAILED]: 2,
  [ClientErrorCode.CONNECTION_CLOSED]: 2,

  [ClientErrorCode.PROTOCOL_MALFORMED_XML]: 3,
  [ClientErrorCode.PROTOCOL_MISSING_ATTRIBUTE]: 3,
  [ClientErrorCode.PROTOCOL_MISSING_CHILD]: 3,
  [ClientErrorCode.PROTOCOL_INVALID_VALUE]: 3,
  [ClientErrorCode.PROTOCOL_UNEXPECTED_MESSAGE]: 3,

  [ClientErrorCode.SERVER_REPORTED_ERROR]: 4,

  [ClientErrorCode.MOVE_SELECTION_FAILED]: 5,
  [ClientErrorCode.MOVE_NO_LEGAL_MOVE]: 5,

  [ClientErrorCode.INTERNAL_ERROR]: 1,
};

// ═══════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Base class for all client errors.
 */
export class ClientError extends Error {
  /** Error code for programmatic handling */
  readonly code: ClientErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Whether this error is fatal (the client should shut down) */
  readonly isFatal: boolean;

  readonly timestamp: Date;

  constructor(
    code: ClientErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    isFatal: boolean = false
  ) {
    super(message);
    this.name = 'ClientError';
    this.code = code;
    this.context = context;
    this.isFatal = isFatal;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, ClientError.prototype);
  }

  get exitCode(): number {
    return ERROR_EXIT_CODES[this.code] ?? 1;
  }

  /** Serialize to a JSON-safe object for structured logs */
  toJSON(): ClientErrorJSON {
    return {
      error: true,
      code: this.code,
      message: this.message,
      context: this.context,
      isFatal: this.isFatal,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export interface ClientErrorJSON {
  error: true;
  code: string;
  message: string;
  context: Record<string, unknown>;
  isFatal: boolean;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIFIC ERROR CLASSES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Error for XML the client cannot decode.
 */
export class ProtocolError extends ClientError {
  constructor(
    code: ClientErrorCode,
    message: string,
    context: Record<string, unknown> = {}
  ) {
    super(code, message, context, true);
    this.name = 'ProtocolError';
    Object.setPrototypeOf(this, ProtocolError.prototype);
  }
}

export class ConnectionError extends ClientError {
  constructor(
    code: ClientErrorCode.CONNECTION_FAILED | ClientErrorCode.CONNECTION_CLOSED,
    message: string,
    context: Record<string, unknown> = {}
  ) {
    super(code, message, context, true);
    this.name = 'ConnectionError';
    Object.setPrototypeOf(this, ConnectionError.prototype);
  }
}

/**
 * Error message received from the game server.
 */
export class ServerReportedError extends ClientError {
  constructor(serverMessage: string, context: Record<string, unknown> = {}) {
    super(
      ClientErrorCode.SERVER_REPORTED_ERROR,
      `Server reported an error: ${serverMessage}`,
      { serverMessage, ...context },
      false
    );
    this.name = 'ServerReportedError';
    Object.setPrototypeOf(this, ServerReportedError.prototype);
  }
}

/**
 * Error when neither the player's logic nor the fallback produced a move.
 */
export class MoveSelectionError extends ClientError {
  constructor(
    code: ClientErrorCode.MOVE_SELECTION_FAILED | ClientErrorCode.MOVE_NO_LEGAL_MOVE,
    message: string,
    context: Record<string, unknown> = {}
  ) {
    super(code, message, context, false);
    this.name = 'MoveSelectionError';
    Object.setPrototypeOf(this, MoveSelectionError.prototype);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

export function isClientError(error: unknown): error is ClientError {
  return error instanceof ClientError;
}

export function isFatalError(error: unknown): boolean {
  return isClientError(error) && error.isFatal;
}

/**
 * Exit code for an error, 1 for anything that is not a ClientError.
 */
export function getExitCode(error: unknown): number {
  if (isClientError(error)) {
    return error.exitCode;
  }
  return 1;
}

/**
 * Wrap an unknown error in a ClientError.
 */
export function wrapError(error: unknown, context: Record<string, unknown> = {}): ClientError {
  if (isClientError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new ClientError(ClientErrorCode.INTERNAL_ERROR, message, {
    ...context,
    originalStack: stack,
  });
}
