// SPDX-License-Identifier: Apache-2.0

import { GlobalConfig } from './globalConfig';

export class LoggerService {
  public static readonly SENSITIVE_FIELDS: string[] = [GlobalConfig.ENTRIES.ETH_RPC_HEADER_X_API_KEY.envName];

  public static readonly MASK = '**********';

  /**
   * Matches the `user:password@` part of an endpoint URL.
   */
  public static readonly URL_CREDENTIALS_PATTERN: RegExp = /^([a-z][a-z0-9+.-]*:\/\/)?([^:@/\s]+):([^@/\s]+)@/i;

  /**
   * Hide sensitive information
   *
   * @param envName
   * @param envValue
   */
  static maskUpEnv(envName: string, envValue: string | number | boolean | undefined): string {
    if (this.SENSITIVE_FIELDS.indexOf(envName) > -1) {
      return `${envName} = ${this.MASK}`;
    }

    if (typeof envValue === 'string' && this.URL_CREDENTIALS_PATTERN.test(envValue)) {
      return `${envName} = ${envValue.replace(this.URL_CREDENTIALS_PATTERN, `$1$2:${this.MASK}@`)}`;
    }

    return `${envName} = ${envValue}`;
  }
}
