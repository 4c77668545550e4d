export { loadEnvConfig } from './defaults';
export type { LoadEnvConfigResult } from './defaults';
export { loadLineTagConfig, CONFIG_DEFAULTS, CONFIG_FILE_NAME } from './loader';
export type { ConfigWarning, LoadConfigResult } from './loader';
export { lineTagConfigSchema } from './schema';
