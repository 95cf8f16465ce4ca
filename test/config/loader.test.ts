import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  ConfigLoader,
  defaultConfig,
  loadFromEnv,
  loadFromFile,
  mergeConfig,
  validateConfig
} from '../../src/config/index.js';
import { ConfigurationError } from '../../src/utils/guards/errors.js';

function configFile(content: string): string {
  const path = join(mkdtempSync(join(tmpdir(), 'hdr-config-')), 'config.json');
  writeFileSync(path, content);
  return path;
}

describe('mergeConfig', () => {
  it('keeps base values for undefined fields', () => {
    const merged = mergeConfig(defaultConfig, { analysis: { plotPoints: 100, raw: undefined } });

    expect(merged.analysis).toEqual({ significantFigures: 3, maxPercentile: 97.5, plotPoints: 100, raw: false });
    expect(merged.server).toEqual(defaultConfig.server);
  });
});

describe('loadFromEnv', () => {
  it('reads numbers and flags', () => {
    expect(loadFromEnv({ HDR_MAX_PERCENTILE: '99', HDR_RAW_UNITS: 'true', HDR_OVERWRITE: '0' })).toEqual({
      analysis: { significantFigures: undefined, maxPercentile: 99, plotPoints: undefined, raw: true },
      output: { overwrite: false }
    });
  });

  it('ignores unrelated variables', () => {
    expect(loadFromEnv({ PATH: '/usr/bin' })).toEqual({});
  });

  it('rejects malformed values', () => {
    expect(() => loadFromEnv({ HDR_PLOT_POINTS: 'abc' })).toThrow(ConfigurationError);
    expect(() => loadFromEnv({ HDR_RAW_UNITS: 'yes' })).toThrow('Invalid configuration in environment');
  });
});

describe('loadFromFile', () => {
  it('contributes nothing for a missing file', () => {
    expect(loadFromFile(join(tmpdir(), 'no-such-dir', 'config.json'))).toEqual({});
  });

  it('reads partial sections', () => {
    expect(loadFromFile(configFile('{"analysis": {"plotPoints": 100}}'))).toEqual({ analysis: { plotPoints: 100 } });
  });

  it('rejects unknown keys and broken JSON', () => {
    expect(() => loadFromFile(configFile('{"analysis": {"unknown": 1}}'))).toThrow(ConfigurationError);
    expect(() => loadFromFile(configFile('{'))).toThrow(/^Cannot read configuration file/);
  });
});

describe('ConfigLoader', () => {
  it('falls back to defaults', () => {
    expect(ConfigLoader.load(undefined, { paths: [], env: {} })).toEqual(defaultConfig);
  });

  it('layers files, environment and overrides', () => {
    const first = configFile('{"analysis": {"plotPoints": 100, "maxPercentile": 90}}');
    const second = configFile('{"analysis": {"plotPoints": 200}, "server": {"name": "curves"}}');

    const config = ConfigLoader.load(
      { output: { overwrite: true } },
      { paths: [first, second], env: { HDR_MAX_PERCENTILE: '99.9' } }
    );

    expect(config.analysis.plotPoints).toBe(200);
    expect(config.analysis.maxPercentile).toBe(99.9);
    expect(config.output.overwrite).toBe(true);
    expect(config.server.name).toBe('curves');
  });

  it('rejects invalid overrides', () => {
    expect(() => ConfigLoader.load({ analysis: { significantFigures: 7 } }, { paths: [], env: {} })).toThrow(
      'Invalid configuration overrides: Override significantFigures must be an integer between 1 and 5'
    );
  });

  it('rejects an invalid merged configuration', () => {
    expect(() => ConfigLoader.load(undefined, { paths: [], env: { HDR_MAX_PERCENTILE: '150' } })).toThrow(
      'Invalid configuration: Analysis maxPercentile must be in (0, 100]'
    );
  });
});

describe('validateConfig', () => {
  it('accepts the defaults', () => {
    expect(validateConfig(defaultConfig).hasErrors()).toBe(false);
  });

  it('collects every problem', () => {
    const errors = validateConfig({
      ...defaultConfig,
      analysis: { significantFigures: 9, maxPercentile: 0, plotPoints: 0, raw: false },
      server: { name: ' ', version: '1' }
    });

    expect(errors.getErrors()).toHaveLength(4);
  });
});
