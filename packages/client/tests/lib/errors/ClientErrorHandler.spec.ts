// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';
import pino from 'pino';
import sinon from 'sinon';

import { ClientError } from '../../../src/lib/errors/ClientError';
import { ClientErrorHandler } from '../../../src/lib/errors/ClientErrorHandler';
import { RpcError } from '../../../src/lib/errors/RpcError';
import { decodeResponse } from '../../../src/lib/response/decodeResponse';

describe('ClientErrorHandler', function () {
  let errorHandler: ClientErrorHandler;
  let logger: pino.Logger;

  beforeEach(function () {
    logger = pino({ level: 'silent' });
    errorHandler = new ClientErrorHandler(logger);
  });

  afterEach(function () {
    sinon.restore();
  });

  describe('createErrorHandlingProxy', function () {
    const methodName = 'TestService.method';

    it('should pass through successful synchronous results', function () {
      const wrappedMethod = errorHandler.createErrorHandlingProxy((a: number, b: number) => a + b, methodName, false);
      expect(wrappedMethod(2, 3)).to.equal(5);
    });

    it('should pass through successful asynchronous results', async function () {
      const wrappedMethod = errorHandler.createErrorHandlingProxy(async (name: string) => `hello ${name}`, methodName, true);
      expect(await wrappedMethod('peer')).to.equal('hello peer');
    });

    it('should return an RpcError for synchronous methods that throw', function () {
      const wrappedMethod = errorHandler.createErrorHandlingProxy(
        () => {
          throw new Error('Sync error');
        },
        methodName,
        false,
      );
      const result = wrappedMethod();

      expect(result).to.be.instanceOf(RpcError);
      expect(result).to.deep.include({ code: -1, message: 'Sync error' });
    });

    it('should return an RpcError for asynchronous methods that reject', async function () {
      const wrappedMethod = errorHandler.createErrorHandlingProxy(
        async () => {
          throw ClientError.nonceMismatch();
        },
        methodName,
        true,
      );
      const result = await wrappedMethod();

      expect(result).to.be.instanceOf(RpcError);
      expect(result).to.deep.include({ code: -1, message: 'Nonce of response did not match nonce of request' });
    });

    it('should pass a thrown RpcError through unchanged in value', function () {
      const wrappedMethod = errorHandler.createErrorHandlingProxy(
        () => {
          throw new RpcError(-32602, 'Invalid params', { index: 0 });
        },
        methodName,
        false,
      );
      const result = wrappedMethod();

      expect(result).to.be.instanceOf(RpcError);
      if (result instanceof RpcError) {
        expect(result.equals(new RpcError(-32602, 'Invalid params', { index: 0 }))).to.be.true;
      }
    });

    it('should return the peer error even when its message mentions a configuration error', function () {
      const payload = '{"jsonrpc":"2.0","error":{"code":-32000,"message":"Configuration error: node not synced"},"id":1}';
      const wrappedMethod = errorHandler.createErrorHandlingProxy(() => decodeResponse(payload, 1), methodName, false);
      const result = wrappedMethod();

      expect(result).to.be.instanceOf(RpcError);
      if (result instanceof RpcError) {
        expect(result.toJSON()).to.deep.equal({
          code: -32000,
          message: 'Configuration error: node not synced',
          data: null,
        });
      }
    });

    it('should return an RpcError for thrown values without a string form', async function () {
      const wrappedMethod = errorHandler.createErrorHandlingProxy(
        async () => {
          throw Object.create(null);
        },
        methodName,
        true,
      );
      const result = await wrappedMethod();

      expect(result).to.be.instanceOf(RpcError);
      expect(result).to.deep.include({ code: -1, message: '[object Object]' });
    });
  });

  describe('toClientError', function () {
    it('should return the original error if it is already a ClientError', function () {
      const originalError = ClientError.missingOutcome();
      expect(errorHandler.toClientError(originalError)).to.equal(originalError);
    });

    it('should map an RpcError to an RPC failure', function () {
      const rpcError = new RpcError(7, 'boom');
      const result = errorHandler.toClientError(rpcError);

      expect(result.failure).to.deep.equal({ kind: 'rpc', error: rpcError });
    });

    it('should map a SyntaxError to a decode failure', function () {
      const syntaxError = new SyntaxError('Unexpected end of JSON input');
      const result = errorHandler.toClientError(syntaxError);

      expect(result.kind).to.equal('decode');
      expect(result.cause).to.equal(syntaxError);
      expect(result.message).to.equal('JSON decode error: Unexpected end of JSON input');
    });

    it('should map a system error to a transport failure', function () {
      const ioError = Object.assign(new Error('connect ECONNREFUSED /tmp/daemon.sock'), {
        code: 'ECONNREFUSED',
        syscall: 'connect',
      });
      const result = errorHandler.toClientError(ioError);

      expect(result.kind).to.equal('transport');
      expect(result.message).to.equal('IO error response: connect ECONNREFUSED /tmp/daemon.sock');
    });

    it('should fold any other error into an RPC failure with code -1 and log it', function () {
      const warnSpy = sinon.spy(logger, 'warn');
      const result = errorHandler.toClientError(new Error('disk full'), 'Storage.write');

      expect(result.kind).to.equal('rpc');
      expect(result.toRpcError().toJSON()).to.deep.equal({ code: -1, message: 'disk full', data: null });
      expect(warnSpy.calledOnce).to.be.true;
      expect(warnSpy.firstCall.args[1]).to.equal('Unclassified failure in Storage.write');
    });

    it('should fold thrown non-error values by their string form', function () {
      expect(errorHandler.toClientError('plain failure').toRpcError().message).to.equal('plain failure');
      expect(errorHandler.toClientError(undefined).toRpcError().message).to.equal('undefined');
    });

    it('should describe a value whose toString does not return a string by its object tag', function () {
      const failure = { toString: () => ({}) };
      expect(errorHandler.toClientError(failure).toRpcError().message).to.equal('[object Object]');
    });

    it('should keep a ClientError carrying configuration error text instead of rethrowing it', function () {
      const peerFailure = ClientError.rpc(new RpcError(-32000, 'Configuration error: node not synced'));
      expect(errorHandler.toClientError(peerFailure)).to.equal(peerFailure);
    });

    it('should rethrow configuration errors', function () {
      const configError = new Error('Configuration error: LOG_PRETTY must be either "true" or "false".');
      expect(() => errorHandler.toClientError(configError)).to.throw(configError.message);
    });
  });

  describe('toRpcError', function () {
    it('should synthesize a wire error for local failures', function () {
      const result = errorHandler.toRpcError(ClientError.versionMismatch(), 'Client.call');
      expect(result.toJSON()).to.deep.equal({ code: -1, message: '`jsonrpc` field set to non-"2.0"', data: null });
    });

    it('should keep the peer error for RPC failures', function () {
      const peerError = new RpcError(-32601, 'Method not found', 'getinfo');
      const result = errorHandler.toRpcError(ClientError.rpc(peerError));

      expect(result.equals(peerError)).to.be.true;
      expect(result).not.to.equal(peerError);
    });
  });
});
