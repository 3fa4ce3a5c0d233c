// SPDX-License-Identifier: Apache-2.0

import { GlobalConfig } from './globalConfig';

export type ConfigValue = string | number | boolean;

export class ValidationService {
  /**
   * Validate the numeric entries that are set
   * @param envs
   */
  static startUp(envs: NodeJS.Dict<string>): void {
    Object.entries(GlobalConfig.ENTRIES).forEach(([entryName, entryInfo]) => {
      const isSet = Object.prototype.hasOwnProperty.call(envs, entryName);

      if (isSet && entryInfo.type === 'number' && isNaN(Number(envs[entryName]))) {
        throw new Error(`Configuration error: ${entryName} must be a valid number.`);
      }
    });
  }

  /**
   * Transform string environment variables to their proper types based on GlobalConfig.ENTRIES.
   * For each entry:
   * - If the env var is missing but has a default value, use the default
   * - For 'number' type, converts to Number
   * - For 'boolean' type, converts 'true' string to true boolean
   * - For 'string' type, keeps as string
   *
   * Variables that are not described in GlobalConfig.ENTRIES are dropped.
   *
   * @param envs - Dictionary of environment variables and their string values
   * @returns Dictionary with environment variables cast to their proper types
   */
  static typeCasting(envs: NodeJS.Dict<string>): NodeJS.Dict<ConfigValue> {
    const typeCastedEnvs: NodeJS.Dict<ConfigValue> = {};

    Object.entries(GlobalConfig.ENTRIES).forEach(([entryName, entryInfo]) => {
      const value = envs[entryName];
      if (value === undefined) {
        if (entryInfo.defaultValue != null) {
          typeCastedEnvs[entryName] = entryInfo.defaultValue;
        }
        return;
      }

      switch (entryInfo.type) {
        case 'number':
          typeCastedEnvs[entryName] = Number(value);
          break;
        case 'boolean':
          typeCastedEnvs[entryName] = value === 'true';
          break;
        default:
          // handle "string" type
          typeCastedEnvs[entryName] = value;
      }
    });

    return typeCastedEnvs;
  }
}
