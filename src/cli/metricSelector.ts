import { createInterface } from 'node:readline/promises';
import { MetricListing } from '../analysis/repositoryReport.js';
import { ConfigurationError } from '../utils/guards/errors.js';

/**
 * Picks one metric tag out of the listing of a log
 */
export type MetricSelector = (listing: readonly MetricListing[]) => Promise<string>;

/**
 * Tag at a listing index typed by the user
 */
export function pickByIndex(listing: readonly MetricListing[], answer: string): string {
  const trimmed = answer.trim();
  const picked = /^\d+$/.test(trimmed) ? listing.find(metric => metric.index === Number(trimmed)) : undefined;
  if (!picked) {
    throw new ConfigurationError(`Invalid metric index "${trimmed}"`, [
      `expected an integer between 0 and ${listing.length - 1}`
    ]);
  }
  return picked.tag;
}

/**
 * Ask on the terminal for a metric index
 */
export function interactiveMetricSelector(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): MetricSelector {
  return async listing => {
    const prompt = createInterface({ input, output });
    try {
      const answer = await prompt.question(`Please choose a metric index (0-${listing.length - 1}): `);
      return pickByIndex(listing, answer);
    } finally {
      prompt.close();
    }
  };
}
