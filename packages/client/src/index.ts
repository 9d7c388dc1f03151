// SPDX-License-Identifier: Apache-2.0

export { default as constants, JsonRpcErrorCode } from './lib/constants';
export { ClientError, describeFailure } from './lib/errors/ClientError';
export type { ClientFailure, ClientFailureKind } from './lib/errors/ClientError';
export { ClientErrorHandler } from './lib/errors/ClientErrorHandler';
export { RpcError } from './lib/errors/RpcError';
export type { RpcErrorJson } from './lib/errors/RpcError';
export { decodeResponse } from './lib/response/decodeResponse';
export { default as jsonResp, errorResponse } from './lib/response/RpcResponse';
export type {
  Displayable,
  IJsonRpcError,
  IJsonRpcErrorResponse,
  IJsonRpcResponse,
  IJsonRpcSuccessResponse,
  JsonRpcId,
  JsonValue,
} from './lib/types';
