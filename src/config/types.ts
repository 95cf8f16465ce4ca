/**
 * Configuration types for the histogram curve tools
 */

export interface AnalysisConfig {
  /** Precision of the aggregated histogram; should match the recorder's */
  significantFigures: number;
  /** Percentile at which curves stop, cutting the long tail */
  maxPercentile: number;
  plotPoints: number;
  /** Keep raw histogram units instead of converting to milliseconds */
  raw: boolean;
}

export interface OutputConfig {
  overwrite: boolean;
}

export interface ServerConfig {
  name: string;
  version: string;
}

export interface Config {
  analysis: AnalysisConfig;
  output: OutputConfig;
  server: ServerConfig;
}

export interface ConfigOverrides {
  analysis?: Partial<AnalysisConfig>;
  output?: Partial<OutputConfig>;
  server?: Partial<ServerConfig>;
}
