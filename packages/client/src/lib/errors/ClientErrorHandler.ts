// SPDX-License-Identifier: Apache-2.0

import { LoggerService } from '@rpcfault/config-service';
import { Logger } from 'pino';

import constants from '../constants';
import { describeUnknown } from '../utils';
import { ClientError } from './ClientError';
import { RpcError } from './RpcError';

/**
 * ClientErrorHandler folds whatever a collaborator throws into the client's error taxonomy.
 *
 * On the calling side it turns caught values into {@link ClientError}s; on the answering side it wraps
 * handler methods so that any failure degrades to a well-formed {@link RpcError} instead of escaping
 * the responder.
 */
export class ClientErrorHandler {
  constructor(private readonly logger: Logger = LoggerService.getLogger('client-error-handler')) {}

  /**
   * Wraps a handler method with error mapping while preserving its synchronous or asynchronous behavior.
   *
   * @param method - The original handler
   * @param methodName - The name of the method, used as logging context
   * @param isAsync - Whether the method returns a Promise
   * @returns A wrapped method that returns an RpcError in place of anything it would have thrown
   */
  public createErrorHandlingProxy<A extends unknown[], T>(
    method: (...args: A) => Promise<T>,
    methodName: string,
    isAsync: true,
  ): (...args: A) => Promise<T | RpcError>;
  public createErrorHandlingProxy<A extends unknown[], T>(
    method: (...args: A) => T,
    methodName: string,
    isAsync: false,
  ): (...args: A) => T | RpcError;
  public createErrorHandlingProxy<A extends unknown[], T>(
    method: (...args: A) => T | Promise<T>,
    methodName: string,
    isAsync: boolean,
  ): (...args: A) => T | RpcError | Promise<T | RpcError> {
    if (isAsync) {
      return async (...args: A) => {
        try {
          return await method(...args);
        } catch (error) {
          return this.toRpcError(error, methodName);
        }
      };
    }

    return (...args: A) => {
      try {
        return method(...args);
      } catch (error) {
        return this.toRpcError(error, methodName);
      }
    };
  }

  /**
   * Classifies a caught value:
   * - ClientError is returned as is
   * - RpcError becomes an RPC failure
   * - SyntaxError becomes a decode failure
   * - a Node system error (one carrying `syscall`) becomes a transport failure
   * - anything else is folded in through its description
   *
   * @param error - The caught value
   * @param contextInfo - Where it was caught, for logging
   * @throws the original error when it is an unclassified configuration error
   */
  public toClientError(error: unknown, contextInfo?: string): ClientError {
    if (error instanceof ClientError) {
      return error;
    }

    if (error instanceof RpcError) {
      return ClientError.rpc(error);
    }

    if (error instanceof SyntaxError) {
      return ClientError.decode(error);
    }

    if (error instanceof Error && 'syscall' in error && typeof error.syscall === 'string') {
      return ClientError.transport(error);
    }

    if (error instanceof Error && error.message.includes(constants.CONFIGURATION_ERROR_MARKER)) {
      throw error;
    }

    this.logger.warn({ err: error }, `Unclassified failure in ${contextInfo || 'unknown context'}`);

    return ClientError.fromOpaque(error instanceof Error ? error : describeUnknown(error));
  }

  /**
   * Classifies a caught value and converts it to its wire form.
   */
  public toRpcError(error: unknown, contextInfo?: string): RpcError {
    const clientError = this.toClientError(error, contextInfo);
    this.logger.debug(`${contextInfo || 'unknown context'} failed: ${clientError.message}`);
    return clientError.toRpcError();
  }
}
