// SPDX-License-Identifier: Apache-2.0

export { ConfigurationError } from './errors/ConfigurationError';
export { AccountsLoader } from './services/accountsLoader';
export { type ConfigKey, type ConfigValues, GlobalConfig } from './services/globalConfig';
export { ConfigService } from './services';
export { LoggerService } from './services/loggerService';
