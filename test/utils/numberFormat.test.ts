import { describe, it, expect } from 'vitest';
import { formatFixed, formatInteger, formatScientific } from '../../src/utils/numberFormat.js';

describe('formatScientific', () => {
  it('pads the exponent to two digits', () => {
    expect(formatScientific(0.00125)).toBe('1.250000e-03');
    expect(formatScientific(1)).toBe('1.000000e+00');
    expect(formatScientific(123456789)).toBe('1.234568e+08');
    expect(formatScientific(-2.5)).toBe('-2.500000e+00');
  });

  it('keeps longer exponents', () => {
    expect(formatScientific(1e100)).toBe('1.000000e+100');
  });

  it('handles zeros and non-finite values', () => {
    expect(formatScientific(0)).toBe('0.000000e+00');
    expect(formatScientific(-0)).toBe('-0.000000e+00');
    expect(formatScientific(NaN)).toBe('nan');
    expect(formatScientific(Infinity)).toBe('inf');
    expect(formatScientific(-Infinity)).toBe('-inf');
  });
});

describe('formatInteger', () => {
  it('truncates and right-aligns', () => {
    expect(formatInteger(42.9, 5)).toBe('   42');
    expect(formatInteger(-3.7, 4)).toBe('  -3');
    expect(formatInteger(123456, 3)).toBe('123456');
  });
});

describe('formatFixed', () => {
  it('rounds to the requested digits', () => {
    expect(formatFixed(2, 2, 8)).toBe('    2.00');
    expect(formatFixed(1.5, 1)).toBe('1.5');
  });
});
