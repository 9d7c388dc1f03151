// SPDX-License-Identifier: Apache-2.0

import pino from 'pino';

import { ConfigKey, GlobalConfig } from './globalConfig';

export type TypedEnvs = Partial<Record<ConfigKey, string | boolean>>;

export class ValidationService {
  /**
   * Validate mandatory fields and the format of every provided entry on start-up
   * @param envs
   */
  static startUp(envs: NodeJS.Dict<string>): void {
    Object.entries(GlobalConfig.ENTRIES).forEach(([entryName, entryInfo]) => {
      const isPresent = Object.prototype.hasOwnProperty.call(envs, entryName);

      if (entryInfo.required && !isPresent) {
        throw new Error(`Configuration error: ${entryName} is a mandatory configuration for client operation.`);
      }

      if (!isPresent) {
        return;
      }

      const value = envs[entryName];
      if (entryInfo.type === 'boolean' && value !== 'true' && value !== 'false') {
        throw new Error(`Configuration error: ${entryName} must be either "true" or "false".`);
      }
    });

    const level = envs[GlobalConfig.ENTRIES.LOG_LEVEL.envName];
    const levels = [...Object.keys(pino.levels.values), 'silent'];
    if (level !== undefined && !levels.includes(level)) {
      throw new Error(`Configuration error: LOG_LEVEL must be one of ${levels.join(', ')}.`);
    }
  }

  /**
   * Transform string environment variables to their proper types based on GlobalConfig.ENTRIES.
   * Missing entries fall back to their default value; 'boolean' entries are true only for the string 'true'.
   *
   * @param envs - Dictionary of environment variables and their string values
   * @returns Dictionary with environment variables cast to their proper types
   */
  static typeCasting(envs: NodeJS.Dict<string>): TypedEnvs {
    const typeCastedEnvs: TypedEnvs = {};

    Object.entries(GlobalConfig.ENTRIES).forEach(([entryName, entryInfo]) => {
      if (!GlobalConfig.isConfigKey(entryName)) {
        return;
      }

      const value = envs[entryName];
      if (value === undefined) {
        if (entryInfo.defaultValue != null) {
          typeCastedEnvs[entryName] = entryInfo.defaultValue;
        }
        return;
      }

      typeCastedEnvs[entryName] = entryInfo.type === 'boolean' ? value === 'true' : value;
    });

    return typeCastedEnvs;
  }
}
