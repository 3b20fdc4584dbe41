// Config module exports

export {
  TrellisConfig,
  CONFIG_SCHEMA,
  OUTPUT_FORMATS,
  getConfigFilePath,
  loadConfigFile,
  parseConfigValue,
  validateConfigValue,
  type ConfigInitOptions,
  type ConfigProperty,
  type ConfigSchema,
  type ConfigSource,
  type OutputFormat,
} from './config.ts';
export {
  parseCliFlags,
  generateFlagHelp,
  generateEnvVarHelp,
  type ParsedCliFlags,
} from './cli.ts';
