import { z } from 'zod';
import { Config, ConfigOverrides } from './types.js';
import { logger } from '../utils/logger.js';

/**
 * Validation errors collection
 */
export class ValidationErrors {
  private errors: string[] = [];

  add(error: string): void {
    this.errors.push(error);
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  getErrors(): string[] {
    return [...this.errors];
  }

  toString(): string {
    return this.errors.join('; ');
  }
}

/**
 * Shape of a configuration file. Every section and field is optional.
 */
export const configFileSchema = z
  .object({
    analysis: z
      .object({
        significantFigures: z.number().int(),
        maxPercentile: z.number(),
        plotPoints: z.number().int(),
        raw: z.boolean()
      })
      .partial()
      .strict()
      .optional(),
    output: z.object({ overwrite: z.boolean() }).partial().strict().optional(),
    server: z.object({ name: z.string(), version: z.string() }).partial().strict().optional()
  })
  .strict();

/**
 * Turn zod issues into `path: message` lines
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

function checkSignificantFigures(value: number, errors: ValidationErrors, label: string): void {
  if (!Number.isInteger(value) || value < 1 || value > 5) {
    errors.add(`${label} significantFigures must be an integer between 1 and 5`);
  }
}

function checkMaxPercentile(value: number, errors: ValidationErrors, label: string): void {
  if (!(value > 0 && value <= 100)) {
    errors.add(`${label} maxPercentile must be in (0, 100]`);
  }
}

function checkPlotPoints(value: number, errors: ValidationErrors, label: string): void {
  if (!Number.isInteger(value) || value < 1) {
    errors.add(`${label} plotPoints must be a positive integer`);
  }
}

/**
 * Validate a complete configuration
 */
export function validateConfig(config: Config): ValidationErrors {
  const errors = new ValidationErrors();

  checkSignificantFigures(config.analysis.significantFigures, errors, 'Analysis');
  checkMaxPercentile(config.analysis.maxPercentile, errors, 'Analysis');
  checkPlotPoints(config.analysis.plotPoints, errors, 'Analysis');

  if (!config.server.name.trim()) {
    errors.add('Server name cannot be empty');
  }

  if (errors.hasErrors()) {
    logger.error('Configuration validation failed', { errors: errors.getErrors() });
  }

  return errors;
}

/**
 * Validate configuration overrides
 */
export function validateOverrides(overrides: ConfigOverrides): ValidationErrors {
  const errors = new ValidationErrors();
  const analysis = overrides.analysis;

  if (analysis?.significantFigures !== undefined) {
    checkSignificantFigures(analysis.significantFigures, errors, 'Override');
  }
  if (analysis?.maxPercentile !== undefined) {
    checkMaxPercentile(analysis.maxPercentile, errors, 'Override');
  }
  if (analysis?.plotPoints !== undefined) {
    checkPlotPoints(analysis.plotPoints, errors, 'Override');
  }

  return errors;
}
