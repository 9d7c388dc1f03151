// SPDX-License-Identifier: Apache-2.0

import constants from '../constants';
import { ClientError } from '../errors/ClientError';
import { RpcError } from '../errors/RpcError';
import { IJsonRpcErrorResponse, IJsonRpcResponse, JsonRpcId } from '../types';
import { isJsonRpcId } from '../utils';

/**
 * Builds a response envelope carrying either an error or a result.
 *
 * @throws Error when both or neither are given
 * @throws TypeError when the id is not a string, number or null
 */
export default function jsonResp(id: JsonRpcId, error: RpcError | null, result?: unknown): IJsonRpcResponse {
  if (error && result !== undefined) {
    throw new Error('Mutually exclusive error and result exist');
  }

  if (!isJsonRpcId(id)) {
    throw new TypeError(`Invalid id type ${typeof id}`);
  }

  if (result !== undefined) {
    return { jsonrpc: constants.JSON_RPC_VERSION, id, result };
  }

  if (error) {
    return { jsonrpc: constants.JSON_RPC_VERSION, id, error: error.toJSON() };
  }

  throw new Error('Missing result or error');
}

/**
 * Error envelope for any failure, converted to its wire form first.
 */
export function errorResponse(id: JsonRpcId, failure: ClientError | RpcError): IJsonRpcErrorResponse {
  const error = failure instanceof ClientError ? failure.toRpcError() : failure;
  return { jsonrpc: constants.JSON_RPC_VERSION, id, error: error.toJSON() };
}
