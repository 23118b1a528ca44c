import * as Plot from '@observablehq/plot';
import type { AxisSpec, ChartLayer, ChartSpec, FacetCell, FacetSpec } from '../types';

export interface RenderOptions {
  /** Document to create elements in: the browser's, or a jsdom window's */
  document: Document;
}

type FacetChannels = {
  fx?: (d: { facet?: string }) => number | undefined;
  fy?: (d: { facet?: string }) => number | undefined;
};

/**
 * Facets are wrapped by hand: each row goes to the (column, row) cell of
 * its facet key, and a text mark writes the facet title into each cell.
 */
function facetChannels(facet: FacetSpec | null): FacetChannels {
  if (!facet) return {};
  const byKey = new Map<string, FacetCell>(facet.cells.map(c => [c.key, c]));
  return {
    fx: d => (d.facet === undefined ? undefined : byKey.get(d.facet)?.column),
    fy: d => (d.facet === undefined ? undefined : byKey.get(d.facet)?.row),
  };
}

function layerToMark(layer: ChartLayer, facets: FacetChannels): Plot.Markish {
  switch (layer.type) {
    case 'line':
      return Plot.line(layer.data, {
        x: 'x',
        y: 'y',
        stroke: 'Parameter',
        strokeWidth: layer.strokeWidth,
        ...facets,
      });
    case 'ridgeline': {
      const { series } = layer;
      return Plot.areaY(layer.data, {
        x: 'x',
        y1: 'baseline',
        y2: 'top',
        z: 'Parameter',
        fill: () => series,
        fillOpacity: layer.opacity,
        ...facets,
      });
    }
    case 'errorbar': {
      const { series } = layer;
      return Plot.ruleY(layer.data, {
        y: 'position',
        x1: 'CI_low',
        x2: 'CI_high',
        stroke: () => series,
        strokeWidth: layer.strokeWidth,
        ...facets,
      });
    }
    case 'point': {
      const { series } = layer;
      return Plot.dot(layer.data, {
        x: 'x',
        y: 'position',
        r: layer.radius,
        fill: layer.fill,
        stroke: () => series,
        ...facets,
      });
    }
  }
}

function yScale(axis: AxisSpec): Plot.ScaleOptions {
  if (!axis.ticks) {
    return { label: axis.label, ticks: [] };
  }
  const byPosition = new Map(axis.ticks.map(t => [t.position, t.label]));
  return {
    label: axis.label,
    ticks: axis.ticks.map(t => t.position),
    tickFormat: (v: number) => byPosition.get(v) ?? '',
  };
}

function leftMargin(axis: AxisSpec): number | undefined {
  if (!axis.ticks || axis.ticks.length === 0) return undefined;
  const longest = Math.max(...axis.ticks.map(t => t.label.length));
  return Math.max(40, longest * 7 + 16);
}

/**
 * Observable Plot options for a chart specification
 */
export function toPlotOptions(spec: ChartSpec): Plot.PlotOptions {
  const facets = facetChannels(spec.facet);
  const marks: Plot.Markish[] = spec.layers.map(layer => layerToMark(layer, facets));

  if (spec.facet) {
    marks.push(
      Plot.text(spec.facet.cells, {
        fx: 'column',
        fy: 'row',
        text: 'label',
        frameAnchor: 'top',
        dy: 4,
        fontWeight: 'bold',
      })
    );
  }

  const labels = spec.color.labels;
  return {
    title: spec.title,
    width: spec.dimensions.width,
    height: spec.dimensions.height,
    marginLeft: leftMargin(spec.axes.y),
    x: { label: spec.axes.x.label },
    y: yScale(spec.axes.y),
    color: {
      type: 'ordinal',
      domain: spec.color.domain,
      range: spec.color.range,
      legend: spec.color.legend,
      tickFormat: (v: string) => labels[v] ?? v,
    },
    ...(spec.facet ? { fx: { axis: null }, fy: { axis: null } } : {}),
    marks,
  };
}

/**
 * Render a chart specification with Observable Plot
 */
export function renderChart(spec: ChartSpec, options: RenderOptions): ReturnType<typeof Plot.plot> {
  return Plot.plot({ ...toPlotOptions(spec), document: options.document });
}
