import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import { AnalysisConfig, Config, ConfigOverrides, OutputConfig, ServerConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { configFileSchema, describeIssues, validateConfig, validateOverrides } from './validators.js';
import { ConfigurationError } from '../utils/guards/errors.js';
import { logger } from '../utils/logger.js';

function mergeAnalysis(base: AnalysisConfig, source: Partial<AnalysisConfig> = {}): AnalysisConfig {
  return {
    significantFigures: source.significantFigures ?? base.significantFigures,
    maxPercentile: source.maxPercentile ?? base.maxPercentile,
    plotPoints: source.plotPoints ?? base.plotPoints,
    raw: source.raw ?? base.raw
  };
}

function mergeOutput(base: OutputConfig, source: Partial<OutputConfig> = {}): OutputConfig {
  return { overwrite: source.overwrite ?? base.overwrite };
}

function mergeServer(base: ServerConfig, source: Partial<ServerConfig> = {}): ServerConfig {
  return {
    name: source.name ?? base.name,
    version: source.version ?? base.version
  };
}

/**
 * Layer overrides on top of a configuration; undefined fields keep the base value
 */
export function mergeConfig(base: Config, overrides: ConfigOverrides): Config {
  return {
    analysis: mergeAnalysis(base.analysis, overrides.analysis),
    output: mergeOutput(base.output, overrides.output),
    server: mergeServer(base.server, overrides.server)
  };
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1')
  .optional();

const envSchema = z.object({
  HDR_SIGNIFICANT_FIGURES: z.coerce.number().int().optional(),
  HDR_MAX_PERCENTILE: z.coerce.number().optional(),
  HDR_PLOT_POINTS: z.coerce.number().int().optional(),
  HDR_RAW_UNITS: booleanFlag,
  HDR_OVERWRITE: booleanFlag,
  SERVER_NAME: z.string().min(1).optional()
});

/**
 * Load configuration from environment variables
 */
export function loadFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid configuration in environment', describeIssues(parsed.error));
  }

  const values = parsed.data;
  const overrides: ConfigOverrides = {};

  if (
    values.HDR_SIGNIFICANT_FIGURES !== undefined ||
    values.HDR_MAX_PERCENTILE !== undefined ||
    values.HDR_PLOT_POINTS !== undefined ||
    values.HDR_RAW_UNITS !== undefined
  ) {
    overrides.analysis = {
      significantFigures: values.HDR_SIGNIFICANT_FIGURES,
      maxPercentile: values.HDR_MAX_PERCENTILE,
      plotPoints: values.HDR_PLOT_POINTS,
      raw: values.HDR_RAW_UNITS
    };
  }

  if (values.HDR_OVERWRITE !== undefined) {
    overrides.output = { overwrite: values.HDR_OVERWRITE };
  }

  if (values.SERVER_NAME) {
    overrides.server = { name: values.SERVER_NAME };
  }

  return overrides;
}

/**
 * Load configuration from a JSON file; a missing file contributes nothing
 */
export function loadFromFile(filePath: string): ConfigOverrides {
  if (!existsSync(filePath)) {
    return {};
  }

  let content: unknown;
  try {
    content = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read configuration file ${filePath}`, [
      error instanceof Error ? error.message : String(error)
    ]);
  }

  const parsed = configFileSchema.safeParse(content);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration file ${filePath}`, describeIssues(parsed.error));
  }

  logger.info('Loaded configuration from file', { filePath });
  return parsed.data;
}

export interface ConfigSources {
  /** Files read in order, later files win */
  paths?: string[];
  env?: NodeJS.ProcessEnv;
}

/**
 * Configuration loader class
 */
export class ConfigLoader {
  static readonly configPaths: readonly string[] = [
    join(process.env.HOME || '', '.hdr-curves', 'config.json'),
    '.hdr-curves.json',
    'hdr-curves.config.json'
  ];

  /**
   * Load configuration from all sources: defaults, files, environment, then overrides
   */
  static load(overrides?: ConfigOverrides, sources: ConfigSources = {}): Config {
    let config = mergeConfig(defaultConfig, {});

    for (const path of sources.paths ?? this.configPaths) {
      config = mergeConfig(config, loadFromFile(path));
    }

    config = mergeConfig(config, loadFromEnv(sources.env));

    if (overrides) {
      const overrideErrors = validateOverrides(overrides);
      if (overrideErrors.hasErrors()) {
        throw new ConfigurationError(
          `Invalid configuration overrides: ${overrideErrors.toString()}`,
          overrideErrors.getErrors()
        );
      }
      config = mergeConfig(config, overrides);
    }

    const errors = validateConfig(config);
    if (errors.hasErrors()) {
      throw new ConfigurationError(`Invalid configuration: ${errors.toString()}`, errors.getErrors());
    }

    logger.info('Configuration loaded successfully', { analysis: config.analysis, output: config.output });

    return config;
  }
}
