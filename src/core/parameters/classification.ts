/**
 * Parameter classification: which model component and which kind of
 * effect each parameter belongs to. This is the metadata the summarizer
 * joins in to facet by Effects and Component.
 */

import { splitGroupedName } from './naming';

export type EffectsKind = 'fixed' | 'random';

export type ComponentKind = 'conditional' | 'zero_inflated' | 'dispersion' | 'sigma' | 'simplex';

export interface ParameterInfo {
  Parameter: string;
  Effects: EffectsKind | string;
  Component: ComponentKind | string;
  Group: string;
  Cleaned_Parameter: string;
}

const RANDOM_PATTERNS = [/^r_/, /^sd_/, /^cor_/, /^b\[/, /^Sigma\[/];

function classifyComponent(name: string): ComponentKind {
  if (/(^|_)zi(_|$)|zero_inflated/.test(name)) return 'zero_inflated';
  if (/_disp$|^disp_/.test(name)) return 'dispersion';
  if (/^sigma(_|$)/.test(name)) return 'sigma';
  if (/^simo_/.test(name)) return 'simplex';
  return 'conditional';
}

/**
 * Classify parameters from the naming conventions of common Bayesian
 * regression back ends (`b_`, `r_`, `sd_`, `zi_`, ...).
 */
export function classifyParameters(names: Iterable<string>): ParameterInfo[] {
  const out: ParameterInfo[] = [];
  for (const name of new Set(names)) {
    const random = RANDOM_PATTERNS.some(p => p.test(name));
    const { Group, Label } = splitGroupedName(name);
    out.push({
      Parameter: name,
      Effects: random ? 'random' : 'fixed',
      Component: classifyComponent(name),
      Group: Group ?? '',
      Cleaned_Parameter: Label.replace(/^(?:b|bs|bsp|bcs|simo|sd|cor)_/, ''),
    });
  }
  return out;
}

/**
 * Index classification rows by parameter name; the first row wins.
 */
export function indexClassification(info: readonly ParameterInfo[]): Map<string, ParameterInfo> {
  const byName = new Map<string, ParameterInfo>();
  for (const row of info) {
    if (!byName.has(row.Parameter)) byName.set(row.Parameter, row);
  }
  return byName;
}
