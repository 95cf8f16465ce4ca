import { describe, it, expect } from 'vitest';
import { handleError } from '../../src/utils/errorHandling.js';
import { LogFormatError } from '../../src/utils/guards/errors.js';

describe('handleError', () => {
  it('prefixes the context and keeps pipeline error details', () => {
    expect(handleError(new LogFormatError('bad line', { line: 3 }), 'cli')).toEqual({
      error: true,
      message: '[cli] bad line',
      details: { line: 3 },
      code: 'LOG_FORMAT'
    });
  });

  it('accepts non-error values', () => {
    expect(handleError('oops')).toEqual({ error: true, message: 'oops' });
  });
});
