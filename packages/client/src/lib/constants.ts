// SPDX-License-Identifier: Apache-2.0

export default {
  DEFAULT_BLOCK: 'latest' as const,
  DEFAULT_HOST: 'localhost',
  DEFAULT_HTTP_PORT: 8545,
  DEFAULT_WS_PORT: 8546,
  DEFAULT_CORS: '',
  DEFAULT_APIS: 'eth,net,web3',

  JSON_RPC_VERSION: '2.0' as const,
  REQUEST_ID_STRING: `Request ID: `,
  X_API_KEY: 'x-api-key',

  HASHRATE_HEX_DIGITS: 64,
  NONCE_HEX_DIGITS: 8,
  STORAGE_WORD_HEX_DIGITS: 64,

  INVALID_ARGUMENTS_CODE: -32602,

  METRIC_REQUEST_DURATION: 'ethrpc_client_request_duration_ms',
};
