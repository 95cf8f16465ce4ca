import { describe, it, expect } from 'vitest';
import { ErrorResponseFormatter, EmptySeriesError, UnknownMetricError } from '../../../src/utils/guards/index.js';

describe('ErrorResponseFormatter', () => {
  it('adds details and suggestions for pipeline errors', () => {
    const response = ErrorResponseFormatter.formatErrorResponse(new EmptySeriesError('no samples', 'read'));

    expect(response.isError).toBe(true);
    expect(response.content.map(item => item.text)).toEqual([
      'no samples',
      'Details: {\n  "tag": "read"\n}',
      '**Suggestions:**\n\n- Pick a metric with at least one non-empty slice (see hdrMetricsList)'
    ]);
  });

  it('lists the available metrics', () => {
    const response = ErrorResponseFormatter.formatErrorResponse(new UnknownMetricError('write', ['read']));

    expect(response.content[1].text).toBe('Available metrics: "read"');
  });

  it('passes plain strings through', () => {
    expect(ErrorResponseFormatter.formatErrorResponse('boom')).toEqual({
      content: [{ type: 'text', text: 'boom' }],
      isError: true
    });
  });
});
