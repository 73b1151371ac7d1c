export { ConfigSchema, ConfigDefaults, PROVIDER_KEYS, type RawConfig, type Config, type ProviderKey } from './schema.js';
export { loadConfig, loadConfigWithMeta, getConfigPath, hasAnyApiKey, expandTilde, type LoadConfigOptions, type LoadConfigResult, ConfigError } from './loader.js';
