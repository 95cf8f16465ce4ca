#!/usr/bin/env node
import { runCli } from './cli/main.js';
import { interactiveMetricSelector } from './cli/metricSelector.js';
import { logger } from './utils/logger.js';

runCli(process.argv.slice(2), {
  io: {
    out: line => process.stdout.write(`${line}\n`),
    err: line => process.stderr.write(`${line}\n`)
  },
  selectMetric: interactiveMetricSelector()
})
  .then(code => {
    process.exitCode = code;
  })
  .catch(err => {
    logger.error('Unexpected failure in command line tool', {
      error: err instanceof Error ? err.message : String(err)
    });
    process.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  });
