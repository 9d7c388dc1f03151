// SPDX-License-Identifier: Apache-2.0

import dotenv from 'dotenv';
import findConfig from 'find-config';
import pino from 'pino';

import type { ConfigKey, GetTypeOfConfigKey } from './globalConfig';
import { GlobalConfig } from './globalConfig';
import { TypedEnvs, ValidationService } from './validationService';

export class ConfigService {
  /**
   * @private
   */
  private static readonly envFileName: string = '.env';

  /**
   * The singleton instance
   * @private
   */
  private static instance: ConfigService | undefined;

  /**
   * Typed copies of the known entries of process.env
   * @private
   */
  private readonly envs: TypedEnvs;

  /**
   * Loads the nearest .env file, if any, then validates and type-casts process.env
   * @private
   */
  private constructor() {
    const configPath = findConfig(ConfigService.envFileName);

    if (configPath) {
      dotenv.config({ path: configPath });
    }

    ValidationService.startUp(process.env);
    this.envs = ValidationService.typeCasting(process.env);

    // built only once LOG_LEVEL is known to be a valid pino level
    const level = this.envs.LOG_LEVEL;
    const logger = pino({ name: 'config-service', level: typeof level === 'string' ? level : 'info' });

    if (!configPath) {
      logger.debug('No .env file is found, using process environment and defaults.');
    }

    for (const [name, value] of Object.entries(this.envs)) {
      logger.trace(`${name} = ${String(value)}`);
    }
  }

  private static getInstance(): ConfigService {
    if (this.instance == null) {
      this.instance = new ConfigService();
    }

    return this.instance;
  }

  /**
   * Retrieves the value of a configuration property, falling back to the default of its GlobalConfig entry.
   *
   * @param name - The configuration key to retrieve.
   * @typeParam K - The specific type parameter representing the ConfigKey.
   * @returns The value associated with the key, typed after its GlobalConfig entry.
   * @throws Error if a required configuration value is missing.
   */
  public static get<K extends ConfigKey>(name: K): GetTypeOfConfigKey<K> {
    const configEntry = GlobalConfig.ENTRIES[name];
    const value = this.getInstance().envs[name] ?? configEntry.defaultValue;

    if (value == undefined && configEntry.required) {
      throw new Error(`Configuration error: ${name} is a mandatory configuration for client operation.`);
    }

    return value as GetTypeOfConfigKey<K>;
  }

  /**
   * Drops the loaded configuration so the next read picks up the current process.env
   */
  public static reload(): void {
    this.instance = undefined;
  }
}
