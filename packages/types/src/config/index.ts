export { ConfigLoader, CONFIG_ENV_VAR, type ResolveConfigOptions, type ResolvedConfig } from './loader.js';
export { validateConfig, ConfigValidationError, type KbGraphConfigInput } from './validator.js';
