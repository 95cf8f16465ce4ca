import { runAnalyses } from '../analysis/analysisRunner.js';
import { formatMetricListing, inspectLines, listMetrics } from '../analysis/repositoryReport.js';
import { SliceRepository } from '../analysis/sliceRepository.js';
import { ConfigLoader } from '../config/index.js';
import { Config } from '../config/types.js';
import { canCreateFile, outputFileName } from '../output/fileGuards.js';
import { plotToDatafile } from '../output/dataFiles.js';
import { plotToFigure } from '../output/mermaidPlots.js';
import { PLOT_KINDS, PlotKind } from '../types/hdr.js';
import { handleError } from '../utils/errorHandling.js';
import { ConfigurationError } from '../utils/guards/errors.js';
import { CliOptions, parseCliArgs, USAGE } from './args.js';
import { MetricSelector } from './metricSelector.js';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDependencies {
  io: CliIO;
  selectMetric: MetricSelector;
  loadRepository?: (filename: string) => SliceRepository;
  /** Loaded from files and environment when absent */
  config?: Config;
}

const KIND_LABELS: Record<PlotKind, string> = {
  baseplot: 'base plot',
  percentiles: 'percentile plot',
  stability: 'stability plot'
};

function requestedKinds(options: CliOptions): PlotKind[] {
  return PLOT_KINDS.filter(kind => options[kind]);
}

function writeOutputs(
  options: CliOptions,
  kind: PlotKind,
  write: { figure: (fileName: string) => boolean; data: (fileName: string) => boolean },
  io: CliIO
): void {
  io.out(`  * Output for "${kind}": `);
  const targets: Array<[string | undefined, string, (fileName: string) => boolean]> = [
    [options.plotRoot, 'md', write.figure],
    [options.dumpRoot, 'dat', write.data]
  ];
  for (const [root, extension, writer] of targets) {
    if (root === undefined) {
      continue;
    }
    const fileName = outputFileName(root, kind, extension);
    if (!canCreateFile(fileName, options.force)) {
      io.out(`      *SKIPPING*: ${fileName}`);
    } else if (writer(fileName)) {
      io.out(`      ${fileName}`);
    } else {
      io.out(`      *FAILED*: ${fileName}`);
    }
  }
}

/**
 * Run the command line tool; resolves to the process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDependencies): Promise<number> {
  const { io } = deps;
  const loadRepository = deps.loadRepository ?? ((filename: string) => SliceRepository.load(filename));

  try {
    const config = deps.config ?? ConfigLoader.load();
    const options = parseCliArgs(argv, config);

    if (options.help) {
      io.out(USAGE);
      return 0;
    }
    const kinds = requestedKinds(options);
    if (kinds.length === 0) {
      io.out('WARNING: Nothing to do.\n');
      io.out(USAGE);
      return 0;
    }
    if (options.plotRoot === undefined && options.dumpRoot === undefined) {
      io.out('WARNING: No output mode(s) provided.\n');
      io.out(USAGE);
      return 0;
    }

    const repository = loadRepository(options.filename);
    if (repository.isEmpty()) {
      io.err(`ERROR: No interval histograms found in "${options.filename}"`);
      return 1;
    }

    if (options.inspect) {
      inspectLines(repository, options.filename, options.raw).forEach(line => io.out(line));
    }

    let metric = options.metric;
    if (metric === undefined) {
      const listing = listMetrics(repository);
      io.out('Available metrics to analyse:');
      formatMetricListing(listing).forEach(line => io.out(line));
      metric = await deps.selectMetric(listing);
    }

    const result = runAnalyses(repository, {
      metric,
      kinds,
      maxPercentile: options.maxPercentile,
      plotPoints: options.plotPoints,
      raw: options.raw,
      significantFigures: config.analysis.significantFigures
    });

    for (const kind of kinds) {
      if (result.curves[kind]) {
        io.out(`  * Calculating ${KIND_LABELS[kind]} ... done.`);
      }
    }
    result.warnings.forEach(warning => io.out(`*WARNING*: ${warning}`));

    for (const kind of [...kinds].sort()) {
      const curves = result.curves[kind];
      if (!curves) {
        continue;
      }
      writeOutputs(
        options,
        kind,
        {
          figure: fileName => plotToFigure(kind, curves, result.bucketWidth, result.metric, fileName, result.unitName),
          data: fileName => plotToDatafile(kind, curves, fileName)
        },
        io
      );
    }
    return 0;
  } catch (error) {
    const response = handleError(error, 'cli');
    io.err(`ERROR: ${error instanceof Error ? error.message : response.message}`);
    if (error instanceof ConfigurationError) {
      error.problems.forEach(problem => io.err(`  ${problem}`));
      io.err(USAGE);
    }
    return 1;
  }
}
