// SPDX-License-Identifier: Apache-2.0

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonRpcId = string | number | null;

/**
 * JSON-RPC 2.0 error object as it appears on the wire.
 */
export interface IJsonRpcError {
  code: number;
  message: string;
  data?: JsonValue;
}

export interface IJsonRpcSuccessResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
}

export interface IJsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: IJsonRpcError;
}

export type IJsonRpcResponse = IJsonRpcSuccessResponse | IJsonRpcErrorResponse;

/**
 * A failure that exposes nothing but a human-readable description.
 */
export interface Displayable {
  toString(): string;
}
