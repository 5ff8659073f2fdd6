// Text in, minimized expression out

import { createTruthTable } from './optimizer/truth-table.js';
import { minimize, type MinimizeReport, type SolverOptions } from './optimizer/solver.js';
import { toCells } from './optimizer/bits.js';
import { KmapError, type Result } from './optimizer/errors.js';
import { parseInput } from './input/parser.js';

export interface SolveOptions extends SolverOptions {
  // Extra don't-care cells merged into the parsed table
  dontCares: number[];
}

/**
 * Parse a truth table from text and minimize it.
 */
export function solveKmap(input: string, options: Partial<SolveOptions> = {}): Result<MinimizeReport> {
  const { dontCares = [], ...solverOptions } = options;

  const parsed = parseInput(input);
  if (!parsed.ok) return parsed;

  let tt = parsed.value;

  if (dontCares.length > 0) {
    try {
      tt = createTruthTable({
        numVars: tt.numVars,
        minterms: toCells(tt.minterms),
        dontCares: [...toCells(tt.dontCares), ...dontCares],
      });
    } catch (e) {
      if (e instanceof KmapError) {
        return { ok: false, error: e };
      }
      throw e;
    }
  }

  return minimize(tt, solverOptions);
}
