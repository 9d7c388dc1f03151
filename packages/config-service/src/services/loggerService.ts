// SPDX-License-Identifier: Apache-2.0

import pino, { Logger } from 'pino';

import { ConfigService } from './configService';

export class LoggerService {
  private static root: Logger | undefined;

  /**
   * Builds the root logger from LOG_NAME, LOG_LEVEL and LOG_PRETTY
   */
  static createRootLogger(): Logger {
    const options: pino.LoggerOptions = {
      name: ConfigService.get('LOG_NAME'),
      level: ConfigService.get('LOG_LEVEL'),
    };

    if (ConfigService.get('LOG_PRETTY')) {
      options.transport = {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: true,
        },
      };
    }

    return pino(options);
  }

  /**
   * Child logger of the shared root logger, tagged with the component name
   *
   * @param name
   */
  static getLogger(name: string): Logger {
    if (this.root == null) {
      this.root = this.createRootLogger();
    }

    return this.root.child({ name });
  }

  static reset(): void {
    this.root = undefined;
  }
}
