export { loadAppConfig, appConfigSchema, DEFAULT_CONFIG_PATH } from './app-config.js';
export type { AppConfig } from './app-config.js';
