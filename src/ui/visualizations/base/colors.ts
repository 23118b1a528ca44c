/**
 * Consistent color schemes
 */
export const ColorSchemes = {
  categorical: [
    '#FF6B6B', // Coral
    '#9B59B6', // Lilac
    '#3B82F6', // Blue
    '#10B981', // Green
    '#F59E0B', // Yellow
    '#EF4444', // Red
    '#8B5CF6', // Purple
    '#EC4899', // Pink
  ],

  // Posterior against prior in ridge plots
  comparison: {
    posterior: '#3B82F6',
    prior: '#F59E0B',
  },

  // Single-series ridge plots
  neutral: '#6B7280',

  // Point estimate marker
  pointFill: '#FFFFFF',
} as const;

/**
 * Color of the i-th series, cycling through the categorical palette
 */
export function getSeriesColor(index: number): string {
  return ColorSchemes.categorical[index % ColorSchemes.categorical.length];
}
