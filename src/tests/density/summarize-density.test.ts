import { describe, it, expect, vi, afterEach } from 'vitest';
import { summarizeDensity, DENSITY_METADATA } from '../../domain/density';
import type { SummaryRow } from '../../domain/density';
import { classifyParameters } from '../../core/parameters';
import {
  EmptyInputError,
  InvalidIntervalMassError,
  ReshapeError,
  UnknownCentralityError,
} from '../../core/errors';
import type { RawSampleTable } from '../../core/data';
import { drawRows, normalDraws } from '../utilities/fixtures';

const byParameter = (a: SummaryRow, b: SummaryRow) =>
  a.Parameter.localeCompare(b.Parameter) ||
  (a.Effects ?? '').localeCompare(b.Effects ?? '') ||
  (a.Component ?? '').localeCompare(b.Component ?? '');

describe('summarizeDensity', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('summary statistics', () => {
    it('summarizes a single parameter with the mean', () => {
      const result = summarizeDensity(
        { columns: ['Parameter'], rows: drawRows([{ parameter: 'a', values: [1, 2, 3, 4, 5] }]) },
        { centrality: 'mean', ci: 0.95 }
      );

      expect(result.summary).toHaveLength(1);
      const [row] = result.summary;
      expect(row.Parameter).toBe('a');
      expect(row.x).toBe(3);
      expect(row.CI_low).toBeCloseTo(1.1, 10);
      expect(row.CI_high).toBeCloseTo(4.9, 10);
      expect(row.CI_low).toBeLessThanOrEqual(row.x);
      expect(row.CI_high).toBeGreaterThanOrEqual(row.x);
    });

    it('defaults to the median and a 95% interval', () => {
      const result = summarizeDensity({
        columns: ['Parameter'],
        rows: drawRows([{ parameter: 'a', values: [1, 2, 3, 4, 100] }]),
      });
      expect(result.summary[0].x).toBe(3);
      expect(result.summary[0].CI_high).toBeCloseTo(90.4, 10);
    });

    it('uses the highest density interval when asked', () => {
      const result = summarizeDensity(
        { columns: ['Parameter'], rows: drawRows([{ parameter: 'a', values: [1, 2, 3, 4, 10] }]) },
        { ci: 0.6, ciMethod: 'hdi' }
      );
      expect(result.summary[0]).toEqual({ Parameter: 'a', x: 3, CI_low: 1, CI_high: 4 });
    });

    it('keeps the point estimate inside the interval', () => {
      const values = [0, 0, 0, 0, 0, 0, 0, 0, 0, 100];
      const result = summarizeDensity(
        { columns: ['Parameter'], rows: drawRows([{ parameter: 'a', values }]) },
        { centrality: 'mean', ci: 0.1 }
      );
      expect(result.summary[0]).toEqual({ Parameter: 'a', x: 0, CI_low: 0, CI_high: 0 });
    });

    it('brackets every centrality on random draws', () => {
      const rows = drawRows([
        { parameter: 'a', values: normalDraws(200, 0, 1, 1) },
        { parameter: 'b', values: normalDraws(200, 5, 2, 2).map(v => Math.exp(v / 5)) },
      ]);
      for (const centrality of ['mean', 'median', 'MAP']) {
        const { summary } = summarizeDensity({ columns: ['Parameter'], rows }, { centrality, ci: 0.5 });
        for (const row of summary) {
          expect(row.CI_low).toBeLessThanOrEqual(row.x);
          expect(row.x).toBeLessThanOrEqual(row.CI_high);
        }
      }
    });
  });

  describe('grouping', () => {
    it('emits one row per parameter', () => {
      const rows = drawRows([
        { parameter: 'a', values: normalDraws(100, 0, 1, 11) },
        { parameter: 'b', values: normalDraws(100, 3, 1, 12) },
      ]);
      const result = summarizeDensity({ columns: ['Parameter'], rows });

      expect(result.summary).toHaveLength(2);
      expect(new Set(result.summary.map(r => r.Parameter))).toEqual(new Set(['a', 'b']));
    });

    it('labels a table without Parameter column Distribution', () => {
      const result = summarizeDensity({ columns: [], rows: [{ x: 1 }, { x: 2 }, { x: 3 }] });

      expect(result.samples.columns).toEqual(['Parameter']);
      expect(result.samples.rows.every(r => r.Parameter === 'Distribution')).toBe(true);
      expect(result.summary.map(r => r.Parameter)).toEqual(['Distribution']);
      expect(result.parameterLevels).toEqual(['Distribution']);
    });

    it('emits one row per present Parameter × Effects combination', () => {
      const table: RawSampleTable = {
        columns: ['Parameter', 'Effects'],
        rows: drawRows([
          { parameter: 'a', Effects: 'fixed', values: [1, 2, 3] },
          { parameter: 'b', Effects: 'fixed', values: [4, 5, 6] },
          { parameter: 'a', Effects: 'random', values: [7, 8, 9] },
        ]),
      };
      const result = summarizeDensity(table, { centrality: 'median' });

      expect(result.summary).toEqual([
        { Parameter: 'b', Effects: 'Fixed effects', x: 5, CI_low: 4.05, CI_high: 5.95 },
        { Parameter: 'a', Effects: 'Fixed effects', x: 2, CI_low: 1.05, CI_high: 2.95 },
        { Parameter: 'a', Effects: 'Random effects', x: 8, CI_low: 7.05, CI_high: 8.95 },
      ].map(r => ({ ...r, CI_low: expect.closeTo(r.CI_low, 10), CI_high: expect.closeTo(r.CI_high, 10) })));
    });

    it('groups by Component when declared', () => {
      const table: RawSampleTable = {
        columns: ['Parameter', 'Component'],
        rows: drawRows([
          { parameter: 'a', Component: 'conditional', values: [1, 2] },
          { parameter: 'a', Component: 'zero_inflated', values: [3, 4] },
        ]),
      };
      const { summary } = summarizeDensity(table);
      expect(summary.map(r => r.Component)).toEqual([
        '(b) Fixed Effects (Count or Mean Model)',
        '(c) Fixed Effects (Zero-Inflated Model)',
      ]);
    });

    it('does not depend on row order', () => {
      const rows = drawRows([
        { parameter: 'a', Effects: 'fixed', values: normalDraws(50, 0, 1, 3) },
        { parameter: 'b', Effects: 'random', values: normalDraws(50, 1, 1, 4) },
        { parameter: 'a', Effects: 'random', values: normalDraws(50, 2, 1, 5) },
      ]);
      for (const centrality of ['mean', 'median', 'MAP']) {
        const forward = summarizeDensity({ columns: ['Parameter', 'Effects'], rows }, { centrality });
        const backward = summarizeDensity(
          { columns: ['Parameter', 'Effects'], rows: [...rows].reverse() },
          { centrality }
        );
        expect([...backward.summary].sort(byParameter)).toEqual([...forward.summary].sort(byParameter));
      }
    });
  });

  describe('display order', () => {
    it('reverses first appearance for samples and summary alike', () => {
      const rows = drawRows([
        { parameter: 'first', values: [1, 2] },
        { parameter: 'second', values: [3, 4] },
        { parameter: 'third', values: [5, 6] },
      ]);
      const result = summarizeDensity({ columns: ['Parameter'], rows });

      expect(result.parameterLevels).toEqual(['third', 'second', 'first']);
      expect(result.summary.map(r => r.Parameter)).toEqual(['third', 'second', 'first']);
    });

    it('keeps sample rows in input order', () => {
      const rows = drawRows([
        { parameter: 'a', values: [1] },
        { parameter: 'b', values: [2] },
      ]);
      const result = summarizeDensity({ columns: ['Parameter'], rows });
      expect(result.samples.rows.map(r => r.x)).toEqual([1, 2]);
    });
  });

  describe('classification', () => {
    const rows = drawRows([
      { parameter: 'b_Days', values: [1, 2, 3] },
      { parameter: 'r_Subject[1,Intercept]', values: [4, 5, 6] },
    ]);

    it('joins Effects and Component by parameter', () => {
      const result = summarizeDensity(
        { columns: ['Parameter'], rows },
        { classification: classifyParameters(['b_Days', 'r_Subject[1,Intercept]']) }
      );

      expect(result.classified).toBe(true);
      expect(result.samples.columns).toEqual(['Parameter', 'Effects', 'Component']);
      expect(result.summary.map(r => [r.Parameter, r.Effects, r.Component])).toEqual([
        ['r_Subject[1,Intercept]', 'Random effects', '(Count or Mean Model)'],
        ['b_Days', 'Fixed effects', '(Count or Mean Model)'],
      ]);
    });

    it('splits grouped names into Group and Label', () => {
      const result = summarizeDensity({ columns: ['Parameter'], rows });
      const grouped = result.samples.rows.find(r => r.Parameter === 'r_Subject[1,Intercept]');
      expect(grouped?.Group).toBe('Subject');
      expect(grouped?.Label).toBe('1,Intercept');
      expect(result.classified).toBe(false);
    });

    it('throws ReshapeError for unclassified parameters by default', () => {
      expect(() =>
        summarizeDensity({ columns: ['Parameter'], rows }, { classification: classifyParameters(['b_Days']) })
      ).toThrow('No classification for parameter(s): r_Subject[1,Intercept]');
      expect(() =>
        summarizeDensity({ columns: ['Parameter'], rows }, { classification: classifyParameters(['b_Days']) })
      ).toThrow(ReshapeError);
    });

    it('drops unclassified rows with a warning when asked', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      const result = summarizeDensity(
        { columns: ['Parameter'], rows },
        { classification: classifyParameters(['b_Days']), onUnmatched: 'drop' }
      );

      expect(result.samples.rows).toHaveLength(3);
      expect(result.summary.map(r => r.Parameter)).toEqual(['b_Days']);
      expect(warn).toHaveBeenCalledWith(
        '⚠️ summarizeDensity: dropped 3 row(s) of unclassified parameter(s): r_Subject[1,Intercept]'
      );
    });

    it('throws EmptyInputError when every row is dropped', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      expect(() =>
        summarizeDensity(
          { columns: ['Parameter'], rows },
          { classification: classifyParameters(['other']), onUnmatched: 'drop' }
        )
      ).toThrow(EmptyInputError);
    });
  });

  describe('result', () => {
    it('attaches the plot metadata', () => {
      const result = summarizeDensity({ columns: [], rows: [{ x: 1 }] });
      expect(result.metadata).toEqual({
        xlab: 'Values',
        ylab: 'Density',
        legendFill: 'Parameter',
        legendColor: 'Parameter',
        title: 'Estimated Density Function',
      });
      expect(result.metadata).not.toBe(DENSITY_METADATA);
    });

    it('keeps density values of curve points', () => {
      const result = summarizeDensity({
        columns: ['Parameter'],
        rows: [
          { x: 0, y: 0.1, Parameter: 'a' },
          { x: 1, y: 0.4, Parameter: 'a' },
        ],
      });
      expect(result.samples.rows.map(r => r.y)).toEqual([0.1, 0.4]);
    });
  });

  describe('errors', () => {
    it('rejects an empty table', () => {
      expect(() => summarizeDensity({ columns: ['Parameter'], rows: [] })).toThrow(EmptyInputError);
    });

    it('checks for empty input before the options', () => {
      expect(() => summarizeDensity({ columns: [], rows: [] }, { centrality: 'bogus' })).toThrow(EmptyInputError);
    });

    it('rejects an unknown centrality', () => {
      expect(() => summarizeDensity({ columns: [], rows: [{ x: 1 }] }, { centrality: 'bogus' })).toThrow(
        UnknownCentralityError
      );
    });

    it.each([0, 1.5, -1, Number.NaN])('rejects credible mass %s', ci => {
      expect(() => summarizeDensity({ columns: [], rows: [{ x: 1 }] }, { ci })).toThrow(InvalidIntervalMassError);
    });
  });
});
