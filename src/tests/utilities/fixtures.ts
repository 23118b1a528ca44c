/**
 * Seeded test data
 */

import jStat from 'jstat';
import { RNG } from '../../core/math/random';
import type { RawSampleRow } from '../../core/data';

/**
 * Normal draws from a seeded generator
 */
export function normalDraws(n: number, mean: number, sd: number, seed: number): number[] {
  const rng = new RNG(seed);
  return rng.uniforms(n).map(u => jStat.normal.inv(u, mean, sd));
}

/**
 * Long-format rows of draws, one block per parameter
 */
export function drawRows(
  blocks: Array<{ parameter: string; values: number[]; Effects?: string; Component?: string }>
): RawSampleRow[] {
  return blocks.flatMap(b =>
    b.values.map(x => {
      const row: RawSampleRow = { x, Parameter: b.parameter };
      if (b.Effects !== undefined) row.Effects = b.Effects;
      if (b.Component !== undefined) row.Component = b.Component;
      return row;
    })
  );
}
