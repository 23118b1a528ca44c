import { describe, it, expect } from 'vitest';
import { JSDOM } from 'jsdom';
import { buildDensityChart, renderChart, toPlotOptions } from '../../ui/visualizations';
import type { RawSampleRow } from '../../core/data';

const curves: RawSampleRow[] = [
  { x: 0, y: 0.2, Parameter: 'a' },
  { x: 1, y: 0.4, Parameter: 'a' },
  { x: 0, y: 0.1, Parameter: 'b' },
  { x: 1, y: 0.2, Parameter: 'b' },
];

describe('Observable Plot renderer', () => {
  describe('toPlotOptions', () => {
    it('maps a stacked chart to one line mark', () => {
      const options = toPlotOptions(buildDensityChart({ columns: ['Parameter'], rows: curves }));

      expect(options.title).toBe('Estimated Density Function');
      expect(options.width).toBe(640);
      expect(options.height).toBe(400);
      expect(options.marks).toHaveLength(1);
      expect(options.marginLeft).toBeUndefined();
      expect(options.x).toEqual({ label: 'Values' });
      expect(options.y).toEqual({ label: 'Density', ticks: [] });
      expect(options.color?.type).toBe('ordinal');
      expect(options.color?.domain).toEqual(['b', 'a']);
      expect(options.color?.legend).toBe(true);
      expect(options.fx).toBeUndefined();
    });

    it('labels parameter rows on the y axis of a ridge chart', () => {
      const options = toPlotOptions(buildDensityChart({ columns: ['Parameter'], rows: curves }, { stack: false }));

      expect(options.marks).toHaveLength(3);
      expect(options.y?.ticks).toEqual([0, 1]);
      expect(options.marginLeft).toBe(40);
      const format = options.y?.tickFormat;
      expect(typeof format).toBe('function');
      if (typeof format === 'function') {
        expect(format(0, 0)).toBe('b');
        expect(format(1, 1)).toBe('a');
        expect(format(0.5, 2)).toBe('');
      }
    });

    it('adds facet titles and hides facet axes', () => {
      const rows: RawSampleRow[] = [
        { x: 0, Parameter: 'a', Effects: 'fixed' },
        { x: 1, Parameter: 'a', Effects: 'fixed' },
        { x: 0, Parameter: 'b', Effects: 'random' },
        { x: 2, Parameter: 'b', Effects: 'random' },
      ];
      const options = toPlotOptions(buildDensityChart({ columns: ['Parameter', 'Effects'], rows }));

      expect(options.marks).toHaveLength(2);
      expect(options.fx).toEqual({ axis: null });
      expect(options.fy).toEqual({ axis: null });
      expect(options.height).toBe(800);
    });

    it('names legend entries by their display label', () => {
      const rows = curves.map(row => ({ ...row, Parameter: `b_${row.Parameter}` }));
      const options = toPlotOptions(buildDensityChart({ columns: ['Parameter'], rows }));
      const format = options.color?.tickFormat;
      expect(typeof format).toBe('function');
      if (typeof format === 'function') {
        expect(format('b_a', 0)).toBe('a');
      }
    });
  });

  describe('renderChart', () => {
    it('renders a titled figure into the given document', () => {
      const { document } = new JSDOM('<!DOCTYPE html><body></body>').window;
      const chart = renderChart(buildDensityChart({ columns: ['Parameter'], rows: curves }), { document });

      expect(chart.nodeName).toBe('FIGURE');
      expect(chart.querySelector('svg')).not.toBeNull();
      expect(chart.querySelector('h2')?.textContent).toBe('Estimated Density Function');
    });

    it('renders ridges with overlays', () => {
      const { document } = new JSDOM('<!DOCTYPE html><body></body>').window;
      const chart = renderChart(
        buildDensityChart({ columns: ['Parameter'], rows: curves }, { stack: false }),
        { document }
      );

      expect(chart.querySelector('[aria-label="area"]')).not.toBeNull();
      expect(chart.querySelectorAll('[aria-label="dot"] circle')).toHaveLength(2);
    });
  });
});
