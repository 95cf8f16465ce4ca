/**
 * Configuration module exports
 */

export { ConfigLoader, mergeConfig, loadFromEnv, loadFromFile } from './loader.js';
export type { ConfigSources } from './loader.js';
export { defaultConfig } from './defaults.js';
export { validateConfig, validateOverrides, ValidationErrors, configFileSchema, describeIssues } from './validators.js';
export type { Config, ConfigOverrides, AnalysisConfig, OutputConfig, ServerConfig } from './types.js';
