import { Config } from './types.js';

/**
 * Default configuration values
 */
export const defaultConfig: Config = {
  analysis: {
    significantFigures: 3,
    maxPercentile: 97.5, // low enough to keep plots on the interesting part
    plotPoints: 500,
    raw: false
  },
  output: {
    overwrite: false
  },
  server: {
    name: 'hdr-curves',
    version: '0.1.0'
  }
};
