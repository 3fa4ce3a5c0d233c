// SPDX-License-Identifier: Apache-2.0

import constants from '../constants';

/**
 * Raised while shaping the parameters of a call, before anything reaches the transport.
 */
export class InvalidArgumentError extends Error {
  public readonly code: number = constants.INVALID_ARGUMENTS_CODE;

  constructor(message: string) {
    super(`Invalid arguments: ${message}`);
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }

  static missingParameter(name: string): InvalidArgumentError {
    return new InvalidArgumentError(`${name} parameter must be provided.`);
  }

  static invalidHex(name: string, value: string): InvalidArgumentError {
    return new InvalidArgumentError(`${name} must be at most 32 bytes of hex, got '${value}'.`);
  }

  static invalidQuantity(name: string, value: unknown): InvalidArgumentError {
    return new InvalidArgumentError(`${name} must be a non-negative integer, got '${String(value)}'.`);
  }

  static unsupportedSubscription(kind: string): InvalidArgumentError {
    return new InvalidArgumentError(`Unexpected eth_subscribe type '${kind}'.`);
  }

  static unknownMethod(name: string): InvalidArgumentError {
    return new InvalidArgumentError(`Method ${name} is not registered.`);
  }
}
