// Solver: orchestrates the minimization pipeline
//
// Pipeline:
// 1. Validate the truth table
// 2. Short-cut the constant functions (no minterms, every cell a minterm)
// 3. Group implicants, then drop redundant ones
// 4. Certify the cover and render it as SOP text

import {
  MAX_EXPRESSION_LENGTH,
  MAX_IMPLICANTS,
  type Implicant,
  type Solution,
  type TruthTable,
} from '../types/kmap.js';
import { countOnes, popcount, toCells } from './bits.js';
import { fail, ok, KmapErrorType, type Result } from './errors.js';
import { groupImplicants } from './grouping.js';
import { removeRedundantImplicants } from './reducer.js';
import { generateExpression } from './sop.js';
import { isConstantOne, isConstantZero, validateTruthTable } from './truth-table.js';
import { validateSolution } from './validator.js';

export interface SolverOptions {
  // Enable verbose logging
  verbose: boolean;

  // Implicant budget of the grouping engine
  maxImplicants: number;

  // Longest expression the renderer may produce
  maxExpressionLength: number;
}

export const DEFAULT_SOLVER_OPTIONS: SolverOptions = {
  verbose: false,
  maxImplicants: MAX_IMPLICANTS,
  maxExpressionLength: MAX_EXPRESSION_LENGTH,
};

export interface MinimizeReport {
  truthTable: TruthTable;
  solution: Solution;
  expression: string;
}

/**
 * Build a solution with its term and literal counters filled in.
 */
export function makeSolution(implicants: Implicant[]): Solution {
  let literalCount = 0;
  for (const imp of implicants) {
    literalCount += countOnes(imp.literalMask);
  }
  return { implicants, termCount: implicants.length, literalCount };
}

/**
 * Find a reduced set of implicants covering exactly the table's minterms.
 */
export function findPrimeImplicants(
  tt: TruthTable,
  options: Partial<SolverOptions> = {}
): Result<Solution> {
  const opts = { ...DEFAULT_SOLVER_OPTIONS, ...options };

  if (!validateTruthTable(tt)) {
    return fail(KmapErrorType.INVALID_INPUT, 'Truth table violates its invariants');
  }

  if (isConstantZero(tt)) {
    if (opts.verbose) {
      console.log('No minterms: constant 0');
    }
    return ok(makeSolution([]));
  }

  if (isConstantOne(tt)) {
    if (opts.verbose) {
      console.log('Every cell is a minterm: constant 1');
    }
    return ok(makeSolution([{
      coveredMinterms: tt.minterms,
      literalMask: 0,
      literalValues: 0,
      size: tt.mintermCount,
    }]));
  }

  if (opts.verbose) {
    console.log(`Grouping ${tt.mintermCount} minterms, ${popcount(tt.dontCares)} don't-cares over ${tt.numVars} variables`);
  }

  const grouped = groupImplicants(tt.minterms, tt.dontCares, tt.numVars, {
    capacity: opts.maxImplicants,
    verbose: opts.verbose,
  });
  if (!grouped.ok) return grouped;

  const reduced = removeRedundantImplicants(grouped.value);

  if (opts.verbose) {
    console.log(`Reducer removed ${grouped.value.length - reduced.length} of ${grouped.value.length} implicants`);
  }

  return ok(makeSolution(reduced));
}

/**
 * Run the whole pipeline on a truth table.
 */
export function minimize(
  tt: TruthTable,
  options: Partial<SolverOptions> = {}
): Result<MinimizeReport> {
  const opts = { ...DEFAULT_SOLVER_OPTIONS, ...options };

  const found = findPrimeImplicants(tt, opts);
  if (!found.ok) return found;

  const solution = found.value;

  if (!validateSolution(tt, solution)) {
    return fail(
      KmapErrorType.INVARIANT_VIOLATION,
      `Cover does not match minterms {${toCells(tt.minterms).join(', ')}}`
    );
  }

  const rendered = generateExpression(solution, tt.numVars, opts.maxExpressionLength);
  if (!rendered.ok) return rendered;

  return ok({ truthTable: tt, solution, expression: rendered.value });
}
