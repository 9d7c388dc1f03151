// SPDX-License-Identifier: Apache-2.0

export { ConfigService } from './configService';
export { GlobalConfig } from './globalConfig';
export type { ConfigKey, ConfigProperty, GetTypeOfConfigKey } from './globalConfig';
export { LoggerService } from './loggerService';
export { ValidationService } from './validationService';
export type { TypedEnvs } from './validationService';
