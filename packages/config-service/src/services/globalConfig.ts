// SPDX-License-Identifier: Apache-2.0

/**
 * Extracts the type string associated with a specific key in the `_CONFIG` object.
 * If the key `K` exists in `_CONFIG`, it retrieves the 'type' property; otherwise, it resolves to `never`.
 *
 * Example:
 * - `'LOG_LEVEL'` → `'string'`
 * - `'INVALID_KEY'` → `never`
 */
type ExtractTypeStringFromKey<K extends string> = K extends keyof typeof _CONFIG ? (typeof _CONFIG)[K]['type'] : never;

/**
 * Maps string representations of types (`'string'`, `'boolean'`) to their actual TypeScript types.
 */
type StringTypeToActualType<Tstr extends string> = Tstr extends 'string'
  ? string
  : Tstr extends 'boolean'
  ? boolean
  : never;

/**
 * Determines if a configuration value can be `undefined`: it must be optional (`required: false`)
 * and have no default value (`defaultValue: null`).
 */
type CanBeUndefined<K extends string> = K extends keyof typeof _CONFIG
  ? (typeof _CONFIG)[K]['required'] extends true
    ? false
    : (typeof _CONFIG)[K]['defaultValue'] extends null
    ? true
    : false
  : never;

/**
 * Maps configuration keys to their corresponding TypeScript types,
 * including `undefined` when applicable based on the configuration.
 *
 * Example:
 * - `'LOG_LEVEL'` (`type: 'string'`, `required: false`, `defaultValue: 'info'`) → `string`
 * - `'LOG_PRETTY'` (`type: 'boolean'`, `required: false`, `defaultValue: false`) → `boolean`
 */
export type GetTypeOfConfigKey<K extends string> = CanBeUndefined<K> extends true
  ? StringTypeToActualType<ExtractTypeStringFromKey<K>> | undefined
  : StringTypeToActualType<ExtractTypeStringFromKey<K>>;

/**
 * Interface defining the structure of a configuration property.
 */
export interface ConfigProperty {
  envName: string; // Environment variable name
  type: 'string' | 'boolean'; // Data type of the configuration property
  required: boolean; // Whether the property is required
  defaultValue: string | boolean | null; // Default value (if any)
}

const _CONFIG = {
  LOG_LEVEL: {
    envName: 'LOG_LEVEL',
    type: 'string',
    required: false,
    defaultValue: 'info',
  },
  LOG_NAME: {
    envName: 'LOG_NAME',
    type: 'string',
    required: false,
    defaultValue: 'jsonrpc-client',
  },
  LOG_PRETTY: {
    envName: 'LOG_PRETTY',
    type: 'boolean',
    required: false,
    defaultValue: false,
  },
} as const satisfies { [key: string]: ConfigProperty }; // Ensures _CONFIG is read-only and conforms to the ConfigProperty structure

export type ConfigKey = keyof typeof _CONFIG;

export class GlobalConfig {
  public static readonly ENTRIES: Record<ConfigKey, ConfigProperty> = _CONFIG;

  public static isConfigKey(name: string): name is ConfigKey {
    return Object.prototype.hasOwnProperty.call(GlobalConfig.ENTRIES, name);
  }
}
