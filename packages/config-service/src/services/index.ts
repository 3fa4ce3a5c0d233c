// SPDX-License-Identifier: Apache-2.0

import dotenv from 'dotenv';
import findConfig from 'find-config';
import pino from 'pino';

import type { ConfigKey, GetTypeOfConfigKey } from './globalConfig';
import { GlobalConfig } from './globalConfig';
import { LoggerService } from './loggerService';
import { type ConfigValue, ValidationService } from './validationService';

const mainLogger = pino({
  name: 'ethrpc-client',
  level: process.env.LOG_LEVEL || 'info',
});
const logger = mainLogger.child({ name: 'config-service' });

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
   * Typed copy of the known envs from process.env
   * @private
   */
  private readonly envs: NodeJS.ReadOnlyDict<ConfigValue>;

  /**
   * Loads the `.env` file (when there is one), validates the known entries and casts them to their types
   * @private
   */
  private constructor() {
    const configPath = findConfig(ConfigService.envFileName);

    if (configPath) {
      dotenv.config({ path: configPath });
    } else {
      logger.warn('No .env file is found. Falling back to process environment and defaults.');
    }

    // reject malformed numbers
    ValidationService.startUp(process.env);

    // transform string representations of env vars into proper types
    this.envs = ValidationService.typeCasting(process.env);

    // printing current env variables, masking up sensitive information
    for (const name in this.envs) {
      logger.info(LoggerService.maskUpEnv(name, this.envs[name]));
    }
  }

  /**
   * Get the singleton instance of the current service
   * @private
   */
  private static getInstance(): ConfigService {
    if (this.instance == null) {
      this.instance = new ConfigService();
    }

    return this.instance;
  }

  /**
   * Drops the loaded configuration; the next `get` reads process.env again.
   */
  public static reload(): void {
    this.instance = undefined;
  }

  /**
   * Retrieves the value of a specified configuration property using its key name.
   *
   * @param name - The configuration key to retrieve.
   * @typeParam K - The specific type parameter representing the ConfigKey.
   * @returns The value associated with the specified key, or the default value from its GlobalConfig entry, properly typed based on the key's configuration.
   * @throws Error if a numeric entry is set to something that is not a number.
   */
  public static get<K extends ConfigKey>(name: K): GetTypeOfConfigKey<K> {
    const configEntry = GlobalConfig.ENTRIES[name];
    const loaded = this.getInstance().envs[name];
    const value = loaded == undefined ? configEntry?.defaultValue : loaded;

    return (value ?? undefined) as GetTypeOfConfigKey<K>;
  }
}

export { GlobalConfig, LoggerService, ValidationService };
export type { ConfigKey, ConfigValue, GetTypeOfConfigKey };
