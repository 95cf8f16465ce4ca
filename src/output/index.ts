export { canCreateFile, outputFileName } from './fileGuards.js';
export { renderPlot, plotToFigure, percentileGrid, percentileTicks, winterColor, formatChartNumber, PERCENTILE_TICKS } from './mermaidPlots.js';
export { formatDataFile, plotToDatafile } from './dataFiles.js';
