// SPDX-License-Identifier: Apache-2.0

import constants from '../constants';
import { ClientError } from '../errors/ClientError';
import { RpcError } from '../errors/RpcError';
import { JsonRpcId } from '../types';
import { isPlainObject } from '../utils';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });

const parsePayload = (payload: string | Buffer): unknown => {
  try {
    return JSON.parse(typeof payload === 'string' ? payload : utf8Decoder.decode(payload));
  } catch (error) {
    throw ClientError.decode(error instanceof Error ? error : new SyntaxError(String(error)));
  }
};

const parseError = (value: unknown): RpcError => {
  try {
    return RpcError.fromWire(value);
  } catch (error) {
    throw ClientError.decode(error instanceof Error ? error : new TypeError(String(error)));
  }
};

/**
 * Decodes a JSON-RPC 2.0 response envelope answering the request identified by `expectedId`.
 *
 * Checks run in order: UTF-8 encoding of byte payloads, JSON syntax, envelope shape, `jsonrpc` version, id, then error/result.
 * A `result` of `null` is a valid outcome.
 *
 * @returns the `result` member
 * @throws ClientError for every malformed or failed response
 */
export const decodeResponse = (payload: string | Buffer, expectedId: JsonRpcId): unknown => {
  const envelope = parsePayload(payload);

  if (!isPlainObject(envelope)) {
    throw ClientError.decode(new TypeError('Invalid response: expected a JSON object'));
  }

  if (envelope.jsonrpc !== constants.JSON_RPC_VERSION) {
    throw ClientError.versionMismatch();
  }

  if ((envelope.id ?? null) !== expectedId) {
    throw ClientError.nonceMismatch();
  }

  if (envelope.error !== undefined && envelope.error !== null) {
    throw ClientError.rpc(parseError(envelope.error));
  }

  if (Object.prototype.hasOwnProperty.call(envelope, 'result')) {
    return envelope.result;
  }

  throw ClientError.missingOutcome();
};
