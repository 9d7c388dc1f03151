// SPDX-License-Identifier: Apache-2.0

import _ from 'lodash';

import constants from '../constants';
import { IJsonRpcError, JsonValue } from '../types';
import { isJsonValue, isPlainObject } from '../utils';

/**
 * Serialized form of an {@link RpcError}. `data` is always present, `null` when the error carries none.
 */
export interface RpcErrorJson {
  code: number;
  message: string;
  data: JsonValue;
}

/**
 * Represents a JSON-RPC 2.0 Error object as defined in the specification.
 *
 * Reserved error codes (from -32768 to -32000):
 * - -32700: Parse error - Invalid JSON was received by the server
 * - -32600: Invalid Request - The JSON sent is not a valid Request object
 * - -32601: Method not found - The method does not exist / is not available
 * - -32602: Invalid params - Invalid method parameter(s)
 * - -32603: Internal error - Internal JSON-RPC error
 * - -32000 to -32099: Server error - Reserved for implementation-defined server-errors
 *
 * Errors synthesized from local failures use the code -1.
 *
 * Instances are immutable values owning a private copy of `data`, compared by structure, see {@link RpcError.equals}.
 *
 * @see https://www.jsonrpc.org/specification
 */
export class RpcError implements IJsonRpcError {
  public readonly code: number;
  public readonly message: string;
  public readonly data?: JsonValue;

  /**
   * @param code A Number that indicates the error type that occurred. This MUST be a signed 32-bit integer.
   * @param message A String providing a short description of the error.
   * @param data A Primitive or Structured value that contains additional information about the error. `null` is the same as omitting it.
   */
  constructor(code: number, message: string, data?: JsonValue) {
    if (!Number.isInteger(code) || code < constants.INT32_MIN || code > constants.INT32_MAX) {
      throw new RangeError(`Invalid error code ${code}: expected a signed 32-bit integer`);
    }

    this.code = code;
    this.message = message;
    if (data !== undefined && data !== null) {
      this.data = _.cloneDeep(data);
    }
    Object.freeze(this);
  }

  /**
   * Decodes the `error` member of a response envelope.
   *
   * @throws TypeError when the value is not a well-formed error object
   */
  static fromWire(value: unknown): RpcError {
    if (!isPlainObject(value)) {
      throw new TypeError('Invalid error object: expected a JSON object');
    }

    const { code, message, data } = value;
    if (typeof code !== 'number' || !Number.isInteger(code) || code < constants.INT32_MIN || code > constants.INT32_MAX) {
      throw new TypeError(`Invalid error code ${JSON.stringify(code)}`);
    }
    if (typeof message !== 'string') {
      throw new TypeError(`Invalid error message type ${typeof message}`);
    }
    if (data !== undefined && !isJsonValue(data)) {
      throw new TypeError('Invalid error data: expected a JSON value');
    }

    return new RpcError(code, message, data);
  }

  /**
   * Structural equality over code, message and data.
   */
  public equals(other: RpcError): boolean {
    return this.code === other.code && this.message === other.message && _.isEqual(this.data, other.data);
  }

  /**
   * Independent deep copy.
   */
  public clone(): RpcError {
    return new RpcError(this.code, this.message, this.data);
  }

  public toJSON(): RpcErrorJson {
    return {
      code: this.code,
      message: this.message,
      data: this.data ?? null,
    };
  }

  /**
   * Single-line debug form, e.g. `{"code":7,"message":"boom","data":null}`.
   */
  public toString(): string {
    return JSON.stringify(this.toJSON());
  }
}
