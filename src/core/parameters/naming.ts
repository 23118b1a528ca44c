/**
 * Parameter name handling: facet titles, grouped names, display labels
 * and intercept filtering.
 */

import type { GroupingColumn, SampleRow } from '../data';

const GROUPED_NAME = /^(.+?)\[(.+)\]$/;

/**
 * Split a `group[param]` name into its grouping prefix and display label.
 * The `r_` prefix that marks group-level terms is not part of the group.
 */
export function splitGroupedName(name: string): { Group?: string; Label: string } {
  const match = GROUPED_NAME.exec(name);
  if (!match) {
    return { Label: name };
  }
  return { Group: match[1].replace(/^r_/, ''), Label: match[2] };
}

const COMPONENT_TITLES_WITH_EFFECTS: Record<string, string> = {
  conditional: '(Count or Mean Model)',
  zero_inflated: '(Zero-Inflated Model)',
  zi: '(Zero-Inflated Model)',
  dispersion: '(Dispersion)',
  sigma: '(Sigma)',
  simplex: '(Monotonic Effects)',
};

const COMPONENT_TITLES: Record<string, string> = {
  conditional: '(b) Fixed Effects (Count or Mean Model)',
  zero_inflated: '(c) Fixed Effects (Zero-Inflated Model)',
  zi: '(c) Fixed Effects (Zero-Inflated Model)',
  random: '(a) Random Effects',
};

const EFFECTS_TITLES: Record<string, string> = {
  fixed: 'Fixed effects',
  random: 'Random effects',
};

function lookup(titles: Record<string, string>, value: string): string {
  return Object.prototype.hasOwnProperty.call(titles, value) ? titles[value] : value;
}

/**
 * Replace Effects/Component codes by facet titles. Unknown codes pass
 * through unchanged.
 */
export function fixFacetNames(rows: SampleRow[], columns: readonly GroupingColumn[]): SampleRow[] {
  const withEffects = columns.includes('Effects');
  const withComponent = columns.includes('Component');
  if (!withEffects && !withComponent) return rows;

  const componentTitles = withEffects ? COMPONENT_TITLES_WITH_EFFECTS : COMPONENT_TITLES;

  return rows.map(row => {
    const out = { ...row };
    if (withComponent && out.Component !== undefined) {
      out.Component = lookup(componentTitles, out.Component);
    }
    if (withEffects && out.Effects !== undefined) {
      out.Effects = lookup(EFFECTS_TITLES, out.Effects);
    }
    return out;
  });
}

/**
 * Fill Group and Label from grouped parameter names. Parameter itself is
 * kept, since it identifies the row's bucket.
 */
export function fixGroupedNames(rows: SampleRow[]): SampleRow[] {
  return rows.map(row => {
    const { Group, Label } = splitGroupedName(row.Parameter);
    const out: SampleRow = { ...row, Label: row.Label ?? Label };
    const group = row.Group ?? Group;
    if (group !== undefined) out.Group = group;
    return out;
  });
}

const LABEL_RULES: Array<[RegExp, string]> = [
  [/^(?:b|bs|bsp|bcs)_(.*)$/, '$1'],
  [/^zi_(.*)$/, '$1 (Zero-Inflated)'],
  [/^(.*)_zi$/, '$1 (Zero-Inflated)'],
  [/^(.*)_disp$/, '$1 (Dispersion)'],
  [/^sd_(.*)$/, 'SD $1'],
  [/^r_.*\[[^,\]]*,\s*(.*)\]$/, '(re) $1'],
  [/^b\[\(Intercept\) (.*)\]$/, '(re) $1'],
  [/^b\[(.*) (.*)\]$/, '(re) $2'],
];

const GRID_SUFFIXES = [' (Zero-Inflated)', ' (Dispersion)'];

/**
 * Display label for each distinct parameter name.
 *
 * In grid mode the component is already named by the facet title, so the
 * component suffix is dropped from the label.
 */
export function cleanParameterLabels(
  parameters: Iterable<string>,
  options: { grid?: boolean } = {}
): Record<string, string> {
  const labels: Record<string, string> = {};
  for (const parameter of new Set(parameters)) {
    let label = parameter;
    for (const [pattern, replacement] of LABEL_RULES) {
      label = label.replace(pattern, replacement);
    }
    if (options.grid) {
      for (const suffix of GRID_SUFFIXES) {
        if (label.endsWith(suffix)) label = label.slice(0, -suffix.length);
      }
    }
    labels[parameter] = label.trim();
  }
  return labels;
}

const INTERCEPT_NAMES = new Set([
  '(Intercept)',
  'Intercept',
  'b_Intercept',
  'b_zi_Intercept',
  'zi_Intercept',
  '(Intercept)_zi',
]);

export function isIntercept(parameter: string): boolean {
  return INTERCEPT_NAMES.has(parameter) || /^b_Intercept\[\d+\]$/.test(parameter);
}

/**
 * Drop intercept rows unless they were asked for
 */
export function removeIntercept<T extends { Parameter: string }>(rows: T[], showIntercept = false): T[] {
  if (showIntercept) return rows;
  return rows.filter(row => !isIntercept(row.Parameter));
}
