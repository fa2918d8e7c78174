/**
 * Config module exports
 */

export {
  configSchema,
  sectionNameSchema,
  parserConfigSchema,
  placeholdersConfigSchema,
  type Config,
  type ConfigInput,
  type ParserConfig,
  type PlaceholdersConfig,
} from './schema.js';

export {
  CONFIG_FILE_NAMES,
  loadConfig,
  parseConfig,
  getDefaultConfig,
  findConfig,
  loadConfigOrDefault,
} from './loader.js';
