// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '../src/services';

type EnvOverrides = Record<string, string | undefined>;

const applyOverrides = (overrides: EnvOverrides): EnvOverrides => {
  const previous: EnvOverrides = {};
  for (const [name, value] of Object.entries(overrides)) {
    previous[name] = process.env[name];
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = value;
    }
  }
  ConfigService.reload();
  return previous;
};

/**
 * Overrides environment variables for the duration of the enclosing mocha `describe` block
 * and reloads the configuration on the way in and out.
 *
 * @param overrides - variables to set; `undefined` removes the variable
 */
export const overrideEnvsInMochaDescribe = (overrides: EnvOverrides): void => {
  let previous: EnvOverrides = {};

  before(() => {
    previous = applyOverrides(overrides);
  });

  after(() => {
    applyOverrides(previous);
  });
};

/**
 * Wraps `tests` in a `describe` block that runs with the given environment overrides.
 */
export const withOverriddenEnvsInMochaTest = (overrides: EnvOverrides, tests: () => void): void => {
  describe(`given the following environment overrides: ${JSON.stringify(overrides)}`, () => {
    overrideEnvsInMochaDescribe(overrides);
    tests();
  });
};
