export { loadConfig, parseConfig, ConfigError, CONFIG_FILE_NAME, DEFAULT_CONFIG } from './config-parser.js';
