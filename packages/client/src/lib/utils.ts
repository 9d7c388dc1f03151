// SPDX-License-Identifier: Apache-2.0

import _ from 'lodash';

import { Displayable, JsonRpcId, JsonValue } from './types';

export const isPlainObject = (value: unknown): value is Record<string, unknown> => _.isPlainObject(value);

export const isJsonValue = (value: unknown): value is JsonValue => {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (isPlainObject(value)) {
    return Object.values(value).every(isJsonValue);
  }
  return false;
};

export const isJsonRpcId = (value: unknown): value is JsonRpcId =>
  value === null || typeof value === 'string' || typeof value === 'number';

/**
 * String form of any value. Values without one (a null-prototype object, a `toString` that throws
 * or returns a non-string) are described by their object tag instead.
 */
export const describeUnknown = (value: unknown): string => {
  try {
    return String(value);
  } catch {
    return Object.prototype.toString.call(value);
  }
};

/**
 * Human-readable form of a failure: the message of an Error, the string form of anything else.
 */
export const display = (failure: Displayable): string =>
  failure instanceof Error ? failure.message : describeUnknown(failure);
