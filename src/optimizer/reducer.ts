// Redundancy Reducer: drop implicants whose minterms a larger one already covers

import type { Implicant } from '../types/kmap.js';

/**
 * Single sweep over the list. Implicant i is removed when another surviving
 * implicant j covers a superset of its minterms and covers strictly more.
 * Removals are not revisited within the sweep. The input is left untouched;
 * survivors keep their relative order.
 */
export function removeRedundantImplicants(implicants: readonly Implicant[]): Implicant[] {
  const working = implicants.map(imp => ({ ...imp }));

  for (let i = 0; i < working.length; i++) {
    if (working[i].size === 0) continue;

    for (let j = 0; j < working.length; j++) {
      if (i === j || working[j].size === 0) continue;

      const covered = working[i].coveredMinterms;
      if ((covered & working[j].coveredMinterms) === covered &&
          working[j].size > working[i].size) {
        working[i].size = 0;
        break;
      }
    }
  }

  return working.filter(imp => imp.size > 0);
}
