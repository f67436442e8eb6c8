/**
 * Config module - exports configuration utilities
 */

export * from './analyzerConfig.js';
export { envVarNameFromPath, applyConfigEnvOverrides } from './env/config-env-overrides.js';
