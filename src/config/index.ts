export { getCapgateHome, getDefaultConfigPath } from './defaults.js';
export { getConfig, initConfig, loadConfig, parseConfig, resetConfig } from './loader.js';
export { type CapgateConfig, ConfigSchema, type LogLevel } from './schema.js';
