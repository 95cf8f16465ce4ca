export { createHistogram, asHdrHistogram, minValueOf, BIT_BUCKET_SIZE } from './hdrHistogram.js';
export type { HdrHistogram, ReadonlyHdrHistogram } from './hdrHistogram.js';
export { LinearIterator, linearSteps } from './iterators.js';
export type { HistogramIterationStep } from './iterators.js';
