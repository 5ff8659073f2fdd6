// Coverage Validator

import type { Solution, TruthTable } from '../types/kmap.js';
import { EMPTY } from './bits.js';
import { validateTruthTable } from './truth-table.js';

/**
 * True iff the surviving implicants cover exactly the table's minterms:
 * none missing, and no cell outside them. Reports, never repairs.
 */
export function validateSolution(tt: TruthTable, solution: Solution): boolean {
  if (!validateTruthTable(tt)) return false;

  let covered = EMPTY;
  for (const imp of solution.implicants) {
    if (imp.size === 0) continue;
    covered |= imp.coveredMinterms;
  }

  return covered === tt.minterms;
}
