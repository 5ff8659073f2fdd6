// kmap-minimizer - Karnaugh-map SOP minimization for 2 to 6 variables

// Types and limits
export {
  MIN_VARIABLES,
  MAX_VARIABLES,
  MAX_CELLS,
  MAX_IMPLICANTS,
  MAX_EXPRESSION_LENGTH,
  MAX_RENDER_VARIABLES,
  VARIABLE_NAMES,
  type TruthTable,
  type Implicant,
  type Solution,
} from './types/kmap.js';

// Errors
export {
  KmapError,
  KmapErrorType,
  type Result,
} from './optimizer/errors.js';

// Cell sets
export {
  cellBit,
  domainMask,
  fromCells,
  toCells,
  popcount,
  type CellSet,
} from './optimizer/bits.js';

// Truth tables
export {
  createTruthTable,
  validateTruthTable,
  isConstantZero,
  isConstantOne,
  type TruthTableSpec,
} from './optimizer/truth-table.js';

// Core minimizer
export { areAdjacent, linearToGray, grayToLinear } from './optimizer/adjacency.js';
export { groupImplicants, type GroupingOptions } from './optimizer/grouping.js';
export { removeRedundantImplicants } from './optimizer/reducer.js';
export { validateSolution } from './optimizer/validator.js';
export { generateExpression } from './optimizer/sop.js';
export {
  findPrimeImplicants,
  minimize,
  makeSolution,
  DEFAULT_SOLVER_OPTIONS,
  type SolverOptions,
  type MinimizeReport,
} from './optimizer/solver.js';

// Input and display
export {
  parseInput,
  parseMintermList,
  detectFormat,
  type InputFormat,
} from './input/parser.js';
export { renderKmap, cellPosition } from './display/kmap-grid.js';
export { solveKmap, type SolveOptions } from './solve.js';

// CLI
export { main as runCli } from './cli.js';
