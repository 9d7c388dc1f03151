// SPDX-License-Identifier: Apache-2.0

export enum JsonRpcErrorCode {
  PARSE_ERROR = -32700,
  INVALID_REQUEST = -32600,
  METHOD_NOT_FOUND = -32601,
  INVALID_PARAMS = -32602,
  INTERNAL_ERROR = -32603,
}

export default {
  JSON_RPC_VERSION: '2.0',

  // code of every wire error synthesized from a local failure
  FALLBACK_ERROR_CODE: -1,

  INT32_MIN: -2147483648,
  INT32_MAX: 2147483647,

  CONFIGURATION_ERROR_MARKER: 'Configuration error',

  MESSAGES: {
    DECODE_FAILURE: 'JSON decode error',
    TRANSPORT_FAILURE: 'IO error response',
    RPC_FAILURE: 'RPC error response',
    MISSING_OUTCOME: 'Malformed RPC response',
    NONCE_MISMATCH: 'Nonce of response did not match nonce of request',
    VERSION_MISMATCH: '`jsonrpc` field set to non-"2.0"',
  },
} as const;
