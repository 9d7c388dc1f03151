// SPDX-License-Identifier: Apache-2.0

import constants from '../constants';
import { Displayable } from '../types';
import { display } from '../utils';
import { RpcError } from './RpcError';

/**
 * Every way a JSON-RPC round trip can fail, as a closed union discriminated by `kind`.
 */
export type ClientFailure =
  /** payload bytes were not valid JSON */
  | { readonly kind: 'decode'; readonly cause: Error }
  /** the byte stream could not be read or written */
  | { readonly kind: 'transport'; readonly cause: Error }
  /** the peer answered with a JSON-RPC error object */
  | { readonly kind: 'rpc'; readonly error: RpcError }
  /** the response had neither `result` nor `error` */
  | { readonly kind: 'missingOutcome' }
  /** the response id did not match the id of the outstanding request */
  | { readonly kind: 'nonceMismatch' }
  /** the response declared a `jsonrpc` version other than "2.0" */
  | { readonly kind: 'versionMismatch' };

export type ClientFailureKind = ClientFailure['kind'];

export const describeFailure = (failure: ClientFailure): string => {
  switch (failure.kind) {
    case 'decode':
      return `${constants.MESSAGES.DECODE_FAILURE}: ${display(failure.cause)}`;
    case 'transport':
      return `${constants.MESSAGES.TRANSPORT_FAILURE}: ${display(failure.cause)}`;
    case 'rpc':
      return `${constants.MESSAGES.RPC_FAILURE}: ${failure.error.toString()}`;
    case 'missingOutcome':
      return constants.MESSAGES.MISSING_OUTCOME;
    case 'nonceMismatch':
      return constants.MESSAGES.NONCE_MISMATCH;
    case 'versionMismatch':
      return constants.MESSAGES.VERSION_MISMATCH;
  }
};

/**
 * The single error type surfaced by the client. The failure itself lives in {@link ClientError.failure};
 * `message` is its display text. Only decode failures chain their underlying error as `cause`.
 */
export class ClientError extends Error {
  public readonly failure: ClientFailure;

  constructor(failure: ClientFailure) {
    super(describeFailure(failure), failure.kind === 'decode' ? { cause: failure.cause } : undefined);
    this.name = 'ClientError';
    this.failure = failure;
    Object.setPrototypeOf(this, ClientError.prototype);
  }

  get kind(): ClientFailureKind {
    return this.failure.kind;
  }

  static decode(cause: Error): ClientError {
    return new ClientError({ kind: 'decode', cause });
  }

  static transport(cause: Error): ClientError {
    return new ClientError({ kind: 'transport', cause });
  }

  static rpc(error: RpcError): ClientError {
    return new ClientError({ kind: 'rpc', error });
  }

  /**
   * Folds a failure known only by its description into an RPC failure with code -1 and no data.
   */
  static fromOpaque(failure: Displayable): ClientError {
    return ClientError.rpc(new RpcError(constants.FALLBACK_ERROR_CODE, display(failure)));
  }

  static missingOutcome(): ClientError {
    return new ClientError({ kind: 'missingOutcome' });
  }

  static nonceMismatch(): ClientError {
    return new ClientError({ kind: 'nonceMismatch' });
  }

  static versionMismatch(): ClientError {
    return new ClientError({ kind: 'versionMismatch' });
  }

  /**
   * Wire form of this error. An RPC failure yields a copy of the peer's error object,
   * every other failure becomes code -1 with the display text as message.
   */
  public toRpcError(): RpcError {
    if (this.failure.kind === 'rpc') {
      return this.failure.error.clone();
    }

    return new RpcError(constants.FALLBACK_ERROR_CODE, this.message);
  }
}
