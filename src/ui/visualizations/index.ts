// src/ui/visualizations/index.ts

// Density charts: stacked lines, ridgelines, faceted grids
export * from './density';

// BASE: palettes
export { ColorSchemes, getSeriesColor } from './base/colors';
