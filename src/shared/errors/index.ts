/**
 * Shared Errors Module
 *
 * Structured error types for the client, its protocol layer and its
 * connection handling. Rules-engine errors live in `engine/errors.ts`.
 *
 * @module errors
 */

export {
  // Error codes
  ClientErrorCode,
  ERROR_EXIT_CODES,
  // Base class
  ClientError,
  type ClientErrorJSON,
  // Specific errors
  ProtocolError,
  ConnectionError,
  ServerReportedError,
  MoveSelectionError,
  // Utilities
  isClientError,
  isFatalError,
  getExitCode,
  wrapError,
} from './ClientDomainErrors';
