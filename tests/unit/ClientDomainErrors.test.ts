/**
 * Tests for ClientDomainErrors - Structured error types for the client
 * @module tests/unit/ClientDomainErrors.test
 */

import {
  ClientError,
  ClientErrorCode,
  ConnectionError,
  ERROR_EXIT_CODES,
  MoveSelectionError,
  ProtocolError,
  ServerReportedError,
  getExitCode,
  isClientError,
  isFatalError,
  wrapError,
  type ClientErrorJSON,
} from '../../src/shared/errors';

describe('ClientDomainErrors', () => {
  describe('ERROR_EXIT_CODES', () => {
    it('maps each category to its own exit code', () => {
      expect(ERROR_EXIT_CODES[ClientErrorCode.CONNECTION_FAILED]).toBe(2);
      expect(ERROR_EXIT_CODES[ClientErrorCode.PROTOCOL_MALFORMED_XML]).toBe(3);
      expect(ERROR_EXIT_CODES[ClientErrorCode.SERVER_REPORTED_ERROR]).toBe(4);
      expect(ERROR_EXIT_CODES[ClientErrorCode.MOVE_NO_LEGAL_MOVE]).toBe(5);
      expect(ERROR_EXIT_CODES[ClientErrorCode.INTERNAL_ERROR]).toBe(1);
    });
  });

  describe('ClientError', () => {
    it('should carry code, context and fatality', () => {
      const error = new ClientError(ClientErrorCode.INTERNAL_ERROR, 'boom', { step: 1 });

      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('ClientError');
      expect(error.message).toBe('boom');
      expect(error.context).toEqual({ step: 1 });
      expect(error.isFatal).toBe(false);
      expect(error.exitCode).toBe(1);
    });

    it('should serialize to JSON', () => {
      const error = new ClientError(ClientErrorCode.INTERNAL_ERROR, 'boom', {}, true);
      const json: ClientErrorJSON = error.toJSON();

      expect(json).toEqual({
        error: true,
        code: 'INTERNAL_ERROR',
        message: 'boom',
        context: {},
        isFatal: true,
        timestamp: error.timestamp.toISOString(),
      });
    });
  });

  describe('specific errors', () => {
    it('ProtocolError is fatal', () => {
      const error = new ProtocolError(ClientErrorCode.PROTOCOL_INVALID_VALUE, 'bad');
      expect(error).toBeInstanceOf(ClientError);
      expect(error.name).toBe('ProtocolError');
      expect(error.isFatal).toBe(true);
      expect(error.exitCode).toBe(3);
    });

    it('ConnectionError is fatal', () => {
      const error = new ConnectionError(ClientErrorCode.CONNECTION_CLOSED, 'closed');
      expect(error).toBeInstanceOf(ConnectionError);
      expect(isFatalError(error)).toBe(true);
      expect(getExitCode(error)).toBe(2);
    });

    it('ServerReportedError prefixes the server message', () => {
      const error = new ServerReportedError('Not your turn', { roomId: 'r' });
      expect(error.message).toBe('Server reported an error: Not your turn');
      expect(error.code).toBe(ClientErrorCode.SERVER_REPORTED_ERROR);
      expect(error.context).toEqual({ serverMessage: 'Not your turn', roomId: 'r' });
      expect(isFatalError(error)).toBe(false);
    });

    it('MoveSelectionError is not fatal', () => {
      const error = new MoveSelectionError(ClientErrorCode.MOVE_NO_LEGAL_MOVE, 'none');
      expect(error).toBeInstanceOf(MoveSelectionError);
      expect(error.isFatal).toBe(false);
      expect(error.exitCode).toBe(5);
    });
  });

  describe('utilities', () => {
    it('isClientError distinguishes client errors', () => {
      expect(isClientError(new ProtocolError(ClientErrorCode.PROTOCOL_MISSING_CHILD, 'x'))).toBe(true);
      expect(isClientError(new Error('x'))).toBe(false);
      expect(isClientError('x')).toBe(false);
    });

    it('getExitCode defaults to 1', () => {
      expect(getExitCode(new Error('x'))).toBe(1);
      expect(getExitCode(undefined)).toBe(1);
    });

    it('wrapError passes client errors through', () => {
      const error = new ConnectionError(ClientErrorCode.CONNECTION_FAILED, 'refused');
      expect(wrapError(error)).toBe(error);
    });

    it('wrapError wraps plain errors and values', () => {
      const source = new Error('plain');
      const wrapped = wrapError(source, { phase: 'move' });

      expect(wrapped.code).toBe(ClientErrorCode.INTERNAL_ERROR);
      expect(wrapped.message).toBe('plain');
      expect(wrapped.context).toEqual({ phase: 'move', originalStack: source.stack });

      expect(wrapError('text').message).toBe('text');
      expect(wrapError('text').context).toEqual({ originalStack: undefined });
    });
  });
});
