import type { MCPToolContentItem, MCPToolOutput } from '../../types.js';
import { HdrAnalysisError, HdrErrorCode, UnknownMetricError } from './errors.js';
import { logger } from '../logger.js';

/**
 * Functions for formatting error responses for MCP tools
 */
export class ErrorResponseFormatter {
  /**
   * Format an error into a standardized MCP tool output response
   * @param error The error to format
   * @param params Optional parameters that were part of the original request
   */
  static formatErrorResponse(error: unknown, params?: Record<string, unknown>): MCPToolOutput {
    logger.error('[ErrorResponseFormatter] Formatting error response', {
      errorType: error instanceof Error ? error.constructor.name : typeof error,
      errorMessage: error instanceof Error ? error.message : String(error),
      params
    });

    let errorMessage = 'An unexpected error occurred';
    const errorContent: MCPToolContentItem[] = [];
    let suggestions: string[] = [];

    if (error instanceof HdrAnalysisError) {
      errorMessage = error.message;
      suggestions = this.getSuggestionsForCode(error.code);

      if (error instanceof UnknownMetricError && error.available.length > 0) {
        errorContent.push({
          type: 'text',
          text: `Available metrics: ${error.available.map(tag => `"${tag}"`).join(', ')}`
        });
      } else if (error.details) {
        errorContent.push({
          type: 'text',
          text: `Details: ${JSON.stringify(error.details, null, 2)}`
        });
      }
    } else if (error instanceof Error) {
      errorMessage = error.message || 'Unknown error';

      if (error.stack) {
        errorContent.push({
          type: 'text',
          text: `Stack Trace: ${error.stack}`
        });
      }
    } else if (typeof error === 'string') {
      errorMessage = error;
    }

    const response: MCPToolOutput = {
      content: [
        {
          type: 'text',
          text: errorMessage
        },
        ...errorContent
      ],
      isError: true
    };

    if (suggestions.length > 0) {
      response.content.push({
        type: 'text',
        text: '**Suggestions:**\n\n' + suggestions.map(s => `- ${s}`).join('\n')
      });
    }

    return response;
  }

  /**
   * Get suggestions for a pipeline error code
   */
  private static getSuggestionsForCode(code: HdrErrorCode): string[] {
    switch (code) {
      case 'LOG_FORMAT':
        return [
          'Check that the file is an HdrHistogram interval log',
          'Make sure the log was not truncated in the middle of a line'
        ];
      case 'EMPTY_SERIES':
        return [
          'Pick a metric with at least one non-empty slice (see hdrMetricsList)'
        ];
      case 'NO_STABILITY_DATA':
        return [
          'Stability analysis compares slices: record a longer run or use a shorter reporting interval'
        ];
      case 'UNKNOWN_METRIC':
        return [
          'Use hdrMetricsList to see the metric tags present in the log'
        ];
      case 'UNKNOWN_PLOT_KIND':
        return [
          'Supported kinds are baseplot, percentiles and stability'
        ];
      case 'CONFIGURATION':
        return [
          'Review hdr-curves.config.json and the HDR_* environment variables'
        ];
    }
  }
}
