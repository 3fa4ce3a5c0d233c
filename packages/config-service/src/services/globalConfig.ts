// SPDX-License-Identifier: Apache-2.0

/**
 * Extracts the type string associated with a specific key in the `_CONFIG` object.
 * If the key `K` exists in `_CONFIG`, it retrieves the 'type' property; otherwise, it resolves to `never`.
 *
 * Example:
 * - `'ETH_RPC_ENDPOINT'` → `'string'`
 * - `'INVALID_KEY'` → `never`
 */
type ExtractTypeStringFromKey<K extends string> = K extends keyof typeof _CONFIG ? (typeof _CONFIG)[K]['type'] : never;

/**
 * Maps string representations of types (`'string'`, `'boolean'`, `'number'`) to their actual TypeScript types.
 */
type StringTypeToActualType<Tstr extends string> = Tstr extends 'string'
  ? string
  : Tstr extends 'boolean'
  ? boolean
  : Tstr extends 'number'
  ? number
  : never;

/**
 * A configuration value can be `undefined` when its entry has no default value (`defaultValue: null`).
 *
 * Example:
 * - `'ETH_RPC_MAX_CONCURRENCY'` (`defaultValue: 100`) → `false`
 * - `'ETH_RPC_HEADER_X_API_KEY'` (`defaultValue: null`) → `true`
 */
type CanBeUndefined<K extends string> = K extends keyof typeof _CONFIG
  ? (typeof _CONFIG)[K]['defaultValue'] extends null
    ? true
    : false
  : never;

/**
 * Maps configuration keys to their corresponding TypeScript types,
 * including `undefined` when applicable based on the configuration.
 */
export type GetTypeOfConfigKey<K extends string> = CanBeUndefined<K> extends true
  ? StringTypeToActualType<ExtractTypeStringFromKey<K>> | undefined
  : StringTypeToActualType<ExtractTypeStringFromKey<K>>;

/**
 * Interface defining the structure of a configuration property.
 */
export interface ConfigProperty {
  envName: string; // Environment variable name
  type: 'string' | 'number' | 'boolean'; // Data type of the configuration property
  defaultValue: string | number | boolean | null; // Default value (if any)
}

const _CONFIG = {
  ETH_RPC_ENDPOINT: {
    envName: 'ETH_RPC_ENDPOINT',
    type: 'string',
    defaultValue: 'localhost:8545',
  },
  ETH_RPC_HEADER_X_API_KEY: {
    envName: 'ETH_RPC_HEADER_X_API_KEY',
    type: 'string',
    defaultValue: null,
  },
  ETH_RPC_HTTP_KEEP_ALIVE: {
    envName: 'ETH_RPC_HTTP_KEEP_ALIVE',
    type: 'boolean',
    defaultValue: true,
  },
  ETH_RPC_HTTP_KEEP_ALIVE_MSECS: {
    envName: 'ETH_RPC_HTTP_KEEP_ALIVE_MSECS',
    type: 'number',
    defaultValue: 1000,
  },
  ETH_RPC_HTTP_MAX_REDIRECTS: {
    envName: 'ETH_RPC_HTTP_MAX_REDIRECTS',
    type: 'number',
    defaultValue: 5,
  },
  ETH_RPC_HTTP_MAX_SOCKETS: {
    envName: 'ETH_RPC_HTTP_MAX_SOCKETS',
    type: 'number',
    defaultValue: 100,
  },
  ETH_RPC_HTTP_TIMEOUT: {
    envName: 'ETH_RPC_HTTP_TIMEOUT',
    type: 'number',
    defaultValue: 0,
  },
  ETH_RPC_MAX_CONCURRENCY: {
    envName: 'ETH_RPC_MAX_CONCURRENCY',
    type: 'number',
    defaultValue: 100,
  },
  LOG_LEVEL: {
    envName: 'LOG_LEVEL',
    type: 'string',
    defaultValue: 'info',
  },
} as const satisfies { [key: string]: ConfigProperty }; // Ensures _CONFIG is read-only and conforms to the ConfigProperty structure

export type ConfigKey = keyof typeof _CONFIG;

export class GlobalConfig {
  public static readonly ENTRIES: Record<ConfigKey, ConfigProperty> = _CONFIG;
}
