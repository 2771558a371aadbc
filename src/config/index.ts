/**
 * Config module - configuration loading and resolution
 */

export type { EnvRecord } from './env-values';
export { getEnvString, getEnvBool, getEnvInt } from './env-values';

export type { LoadedEnvironment } from './load-env-file';
export { loadEnvironment } from './load-env-file';

export { parseLlamaCliConfig } from './parse-llama-config';

export type { ConfigOverrides } from './resolve-config';
export {
  ConfigError,
  DEFAULT_APP_LOG_FILE_NAME,
  parseHttpPort,
  resolveConfig,
  formatConfigForDisplay,
} from './resolve-config';
