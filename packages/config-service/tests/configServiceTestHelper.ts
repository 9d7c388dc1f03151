// SPDX-License-Identifier: Apache-2.0

import { ConfigService, LoggerService } from '../src/services';

/**
 * Tests that change environment variables at runtime go through this helper, so the
 * cached configuration and root logger are rebuilt from the overridden values.
 */
export class ConfigServiceTestHelper {
  /**
   * Override an env variable, used in test cases only
   * @param name string
   * @param value string | undefined
   */
  public static dynamicOverride(name: string, value: string | undefined): void {
    if (value === undefined) {
      delete process.env[name];
    } else {
      process.env[name] = value;
    }
    ConfigService.reload();
    LoggerService.reset();
  }

  /**
   * Delete an env variable, used in test cases only
   * @param name string
   */
  public static remove(name: string): void {
    this.dynamicOverride(name, undefined);
  }
}

/**
 * Overrides the given envs for every test of the enclosing describe block and restores them afterwards
 * @param envs
 */
export const overrideEnvsInMochaDescribe = (envs: NodeJS.Dict<string>): void => {
  const previous: NodeJS.Dict<string> = {};

  before(() => {
    Object.entries(envs).forEach(([name, value]) => {
      previous[name] = process.env[name];
      ConfigServiceTestHelper.dynamicOverride(name, value);
    });
  });

  after(() => {
    Object.entries(previous).forEach(([name, value]) => {
      ConfigServiceTestHelper.dynamicOverride(name, value);
    });
  });
};
