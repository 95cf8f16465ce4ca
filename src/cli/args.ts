import { parseArgs } from 'node:util';
import { z } from 'zod';
import { Config } from '../config/types.js';
import { describeIssues } from '../config/validators.js';
import { ConfigurationError } from '../utils/guards/errors.js';

export const USAGE = `usage: hdr-curves [-h] [-i] [-m METRICTAG] [-t THRESHOLD] [-z PLOTSIZE] [-b] [-c] [-s]
                  [-p PLOTFILEROOT] [-d DUMPFILEROOT] [-f] [-r]
                  filename

Density, percentile and stability curves from HdrHistogram interval logs.

positional arguments:
  filename              HDR input data

options:
  -h, --help            show this help message and exit
  -i, --inspect         Detailed input breakdown

Analysis tasks:
  -m, --metric METRICTAG
                        Work on the specified metric tag (interactive choice if not provided)
  -t, --threshold THRESHOLD
                        Percentile (0-100) at which to stop collecting distributions
  -z, --plotsize PLOTSIZE
                        Number of points in the resulting curve
  -b, --baseplot        Create standard distribution plot
  -c, --percentiles     Create percentile analysis
  -s, --stability       Perform stability analysis (per-slice plots)

Output control:
  -p, --plot PLOTFILEROOT
                        Create Mermaid chart documents (with given file root)
  -d, --dump DUMPFILEROOT
                        Dump to data files (with given file root)
  -f, --force           Overwrite existing file(s) if necessary
  -r, --raw             Keep raw values found in histograms (no unit conversions)`;

export interface CliOptions {
  help: boolean;
  filename: string;
  inspect: boolean;
  metric?: string;
  maxPercentile: number;
  plotPoints: number;
  baseplot: boolean;
  percentiles: boolean;
  stability: boolean;
  plotRoot?: string;
  dumpRoot?: string;
  force: boolean;
  raw: boolean;
}

const cliValuesSchema = z.object({
  threshold: z.coerce.number().gt(0).max(100).optional(),
  plotsize: z.coerce.number().int().positive().optional()
});

function parseRawArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        help: { type: 'boolean', short: 'h', default: false },
        inspect: { type: 'boolean', short: 'i', default: false },
        metric: { type: 'string', short: 'm' },
        threshold: { type: 'string', short: 't' },
        plotsize: { type: 'string', short: 'z' },
        baseplot: { type: 'boolean', short: 'b', default: false },
        percentiles: { type: 'boolean', short: 'c', default: false },
        stability: { type: 'boolean', short: 's', default: false },
        plot: { type: 'string', short: 'p' },
        dump: { type: 'string', short: 'd' },
        force: { type: 'boolean', short: 'f', default: false },
        raw: { type: 'boolean', short: 'r', default: false }
      }
    });
  } catch (error) {
    throw new ConfigurationError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parse the command line; unset values fall back to the configuration
 *
 * @throws ConfigurationError on unknown flags, missing values or a missing filename
 */
export function parseCliArgs(argv: readonly string[], config: Config): CliOptions {
  const { values, positionals } = parseRawArgs(argv);
  const numbers = cliValuesSchema.safeParse({ threshold: values.threshold, plotsize: values.plotsize });
  if (!numbers.success) {
    throw new ConfigurationError('Invalid command line values', describeIssues(numbers.error));
  }

  const help = values.help ?? false;
  const [filename] = positionals;
  if (!help && filename === undefined) {
    throw new ConfigurationError('the following arguments are required: filename');
  }
  if (positionals.length > 1) {
    throw new ConfigurationError(`unrecognized arguments: ${positionals.slice(1).join(' ')}`);
  }

  return {
    help,
    filename: filename ?? '',
    inspect: values.inspect ?? false,
    metric: values.metric,
    maxPercentile: numbers.data.threshold ?? config.analysis.maxPercentile,
    plotPoints: numbers.data.plotsize ?? config.analysis.plotPoints,
    baseplot: values.baseplot ?? false,
    percentiles: values.percentiles ?? false,
    stability: values.stability ?? false,
    plotRoot: values.plot,
    dumpRoot: values.dump,
    force: (values.force ?? false) || config.output.overwrite,
    raw: (values.raw ?? false) || config.analysis.raw
  };
}
