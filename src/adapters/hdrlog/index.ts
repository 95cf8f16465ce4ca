export { HistogramLogReader } from './logReader.js';
