import { describe, it, expect, vi, beforeEach } from 'vitest';
import { mkdtempSync, readFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { runCli, CliDependencies } from '../../src/cli/main.js';
import { USAGE } from '../../src/cli/args.js';
import { SliceRepository } from '../../src/analysis/index.js';
import { defaultConfig } from '../../src/config/index.js';
import { Config } from '../../src/config/types.js';
import { makeSlice, SLICE_A_VALUES, SLICE_B_VALUES } from '../helpers/slices.js';

const repository = SliceRepository.fromSlices([
  makeSlice('read', 0, SLICE_A_VALUES),
  makeSlice('read', 1000, SLICE_B_VALUES),
  makeSlice('solo', 0, [1_000_000, 2_000_000])
]);

interface Harness {
  out: string[];
  err: string[];
  deps: CliDependencies;
}

function makeHarness(config: Config = defaultConfig): Harness {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    deps: {
      io: { out: line => out.push(line), err: line => err.push(line) },
      selectMetric: vi.fn(async () => 'read'),
      loadRepository: filename => (filename === 'empty.hlog' ? SliceRepository.fromLogText('') : repository),
      config
    }
  };
}

describe('runCli', () => {
  let root: string;

  beforeEach(() => {
    root = join(mkdtempSync(join(tmpdir(), 'hdr-cli-')), 'run');
  });

  describe('without work to do', () => {
    it('prints usage for help', async () => {
      const harness = makeHarness();

      expect(await runCli(['-h'], harness.deps)).toBe(0);
      expect(harness.out).toEqual([USAGE]);
    });

    it('warns when no analysis is requested', async () => {
      const harness = makeHarness();

      expect(await runCli(['run.hlog'], harness.deps)).toBe(0);
      expect(harness.out).toEqual(['WARNING: Nothing to do.\n', USAGE]);
    });

    it('warns when no output is requested', async () => {
      const harness = makeHarness();

      expect(await runCli(['run.hlog', '-b'], harness.deps)).toBe(0);
      expect(harness.out).toEqual(['WARNING: No output mode(s) provided.\n', USAGE]);
    });
  });

  describe('failures', () => {
    it('requires a filename', async () => {
      const harness = makeHarness();

      expect(await runCli([], harness.deps)).toBe(1);
      expect(harness.err).toEqual(['ERROR: the following arguments are required: filename', USAGE]);
    });

    it('reports invalid values with their problems', async () => {
      const harness = makeHarness();

      expect(await runCli(['run.hlog', '-b', '-d', root, '-t', 'abc'], harness.deps)).toBe(1);
      expect(harness.err.slice(0, 2)).toEqual([
        'ERROR: Invalid command line values',
        '  threshold: Expected number, received nan'
      ]);
    });

    it('fails on a log without intervals', async () => {
      const harness = makeHarness();

      expect(await runCli(['empty.hlog', '-b', '-d', root], harness.deps)).toBe(1);
      expect(harness.err).toEqual(['ERROR: No interval histograms found in "empty.hlog"']);
    });

    it('fails on an unknown metric without usage', async () => {
      const harness = makeHarness();

      expect(await runCli(['run.hlog', '-m', 'write', '-b', '-d', root], harness.deps)).toBe(1);
      expect(harness.err).toEqual(['ERROR: Metric "write" not found in log']);
    });
  });

  describe('analyses', () => {
    const analysisArgs = (...extra: string[]): string[] => ['run.hlog', '-m', 'read', '-t', '100', '-z', '1', ...extra];

    it('dumps data files per requested kind', async () => {
      const harness = makeHarness();

      expect(await runCli(analysisArgs('-b', '-c', '-d', root), harness.deps)).toBe(0);
      expect(harness.out).toEqual([
        '  * Calculating base plot ... done.',
        '  * Calculating percentile plot ... done.',
        '  * Output for "baseplot": ',
        `      ${root}_baseplot.dat`,
        '  * Output for "percentiles": ',
        `      ${root}_percentiles.dat`
      ]);
      expect(readFileSync(`${root}_baseplot.dat`, 'utf8')).toBe(
        '4.995000e-04\t9.933333e+02\n1.499000e-03\t6.666667e+00'
      );
    });

    it('writes chart documents', async () => {
      const harness = makeHarness();

      expect(await runCli(analysisArgs('-b', '-p', root), harness.deps)).toBe(0);
      expect(readFileSync(`${root}_baseplot.md`, 'utf8').split('\n')[0]).toMatch(/^# Distribution for "read" \(avg = /);
    });

    it('skips existing files unless forced', async () => {
      await runCli(analysisArgs('-b', '-d', root), makeHarness().deps);

      const skipped = makeHarness();
      await runCli(analysisArgs('-b', '-d', root), skipped.deps);
      expect(skipped.out).toContain(`      *SKIPPING*: ${root}_baseplot.dat`);

      const forced = makeHarness();
      await runCli(analysisArgs('-b', '-d', root, '-f'), forced.deps);
      expect(forced.out).toContain(`      ${root}_baseplot.dat`);
    });

    it('overwrites when the configuration says so', async () => {
      await runCli(analysisArgs('-b', '-d', root), makeHarness().deps);

      const harness = makeHarness({ ...defaultConfig, output: { overwrite: true } });
      await runCli(analysisArgs('-b', '-d', root), harness.deps);
      expect(harness.out).toContain(`      ${root}_baseplot.dat`);
    });

    it('warns about stability on a single slice', async () => {
      const harness = makeHarness();

      expect(await runCli(['run.hlog', '-m', 'solo', '-b', '-s', '-d', root], harness.deps)).toBe(0);
      expect(harness.out.slice(0, 2)).toEqual([
        '  * Calculating base plot ... done.',
        '*WARNING*: Nothing to plot for stability analysis: Stability analysis needs at least 2 slices, got 1'
      ]);
      expect(harness.out).not.toContain('  * Output for "stability": ');
    });

    it('asks for a metric when none is given', async () => {
      const harness = makeHarness();

      expect(await runCli(['run.hlog', '-b', '-d', root], harness.deps)).toBe(0);
      expect(harness.out[0]).toBe('Available metrics to analyse:');
      expect(harness.out).toHaveLength(6);
      expect(harness.deps.selectMetric).toHaveBeenCalledTimes(1);
    });

    it('prints the inspection first', async () => {
      const harness = makeHarness();

      await runCli(analysisArgs('-i', '-b', '-d', root), harness.deps);
      expect(harness.out[0]).toBe('HDR log details for "run.hlog"');
    });
  });
});
