// Core types for the Karnaugh-map minimizer
// Cells are numbered by their input assignment: bit i of the index is variable i

import type { CellSet } from '../optimizer/bits.js';

export const MIN_VARIABLES = 2;
export const MAX_VARIABLES = 6;
export const MAX_CELLS = 1 << MAX_VARIABLES;
export const MAX_IMPLICANTS = 32;       // Fixed implicant budget of the grouping engine
export const MAX_EXPRESSION_LENGTH = 1024;
export const MAX_RENDER_VARIABLES = 8;
export const VARIABLE_NAMES = 'ABCDEFGH';

// A partially specified boolean function
export interface TruthTable {
  readonly numVars: number;
  readonly minterms: CellSet;     // Cells where the output must be 1
  readonly dontCares: CellSet;    // Cells whose output is unconstrained
  readonly mintermCount: number;  // popcount(minterms)
}

// One product term
export interface Implicant {
  // Required minterms this term satisfies (never includes don't-cares)
  coveredMinterms: CellSet;

  // Variables present in the term (bit i = variable i)
  literalMask: number;

  // Polarity of the present variables (1 = uncomplemented)
  literalValues: number;

  // popcount(coveredMinterms); 0 marks an entry removed by the reducer
  size: number;
}

export interface Solution {
  implicants: Implicant[];
  termCount: number;
  literalCount: number;
}
