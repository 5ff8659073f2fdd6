#!/usr/bin/env node
/**
 * K-map CLI
 *
 * Usage: kmap [options] <input>
 */

import { existsSync, realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { VARIABLE_NAMES } from './types/kmap.js';
import { KmapErrorType } from './optimizer/errors.js';
import { detectFormat, parseMintermList } from './input/parser.js';
import { renderKmap } from './display/kmap-grid.js';
import { solveKmap } from './solve.js';

interface CliOptions {
  input: string;
  dontCares: number[];
  visualize: boolean;
  explain: boolean;
  verbose: boolean;
}

type CliCommand =
  | { kind: 'solve'; options: CliOptions }
  | { kind: 'examples' }
  | { kind: 'benchmark' };

const BENCHMARK_CASES: Array<[string, string]> = [
  ['2 vars', '1010'],
  ['3 vars', '10110100'],
  ['4 vars', '1111000011110000'],
  ['3 vars (minterm)', '0,1,3,5'],
  ['4 vars (complex)', '0,1,2,3,8,9,10,11'],
];

const BENCHMARK_RUNS = 100;

// A binary string may start with '-' (don't-care)
const BINARY_INPUT = /^[01Xx-]{4,}$/;

function parseArgs(args: string[]): CliCommand | null {
  const cliArgs = args.slice(2); // Skip node and script path

  let input = '';
  let dontCares: number[] = [];
  let visualize = false;
  let explain = false;
  let verbose = false;

  for (let i = 0; i < cliArgs.length; i++) {
    const arg = cliArgs[i];

    if (arg === '-d' || arg === '--dont-cares') {
      if (i + 1 >= cliArgs.length) {
        console.error(`Error: ${arg} requires a cell list`);
        return null;
      }
      const list = parseMintermList(cliArgs[++i]);
      if (!list.ok) {
        console.error(`Error: ${list.error.message}`);
        return null;
      }
      dontCares = list.value;
    } else if (arg === '-v' || arg === '--visualize') {
      visualize = true;
    } else if (arg === '-e' || arg === '--explain') {
      explain = true;
    } else if (arg === '--verbose') {
      verbose = true;
    } else if (arg === '--examples') {
      return { kind: 'examples' };
    } else if (arg === '--benchmark') {
      return { kind: 'benchmark' };
    } else if (arg === '-h' || arg === '--help') {
      return null;
    } else if (!arg.startsWith('-') || BINARY_INPUT.test(arg)) {
      input = arg;
    } else {
      console.error(`Error: Unknown option '${arg}'`);
      return null;
    }
  }

  if (!input) {
    console.error('Error: No input specified');
    return null;
  }

  return { kind: 'solve', options: { input, dontCares, visualize, explain, verbose } };
}

function printUsage(): void {
  console.log(`K-map Solver

Usage: kmap [options] <input>

Options:
  -d, --dont-cares <list>  Extra don't-care cells, e.g. 0,4,6
  -v, --visualize          Show the K-map grid
  -e, --explain            Show solve time and expression statistics
  --verbose                Trace the grouping passes
  --examples               Show input examples
  --benchmark              Time a fixed set of inputs
  -h, --help               Show this help message

Examples:
  kmap 1010
  kmap 0,1,3
  kmap -v 1X1X`);
}

function printExamples(): void {
  console.log(`Input formats:
  Binary string   1010        one character per cell, highest cell first
  Minterm list    0,1,3       comma-separated cell numbers
  Don't-cares     10X1        X, x or - marks a don't-care

Examples:
  kmap 1100                   -> B
  kmap 1010                   -> A
  kmap 0,3                    -> ~A&~B + A&B
  kmap 1X1X                   -> A
  kmap 1,2,5 -d 0,4,6         -> A&~B + ~A&B`);
}

function runBenchmark(): number {
  console.log('K-map Solver Benchmark');
  console.log('='.repeat(40));

  for (const [name, input] of BENCHMARK_CASES) {
    const times: number[] = [];
    let expression = '';

    for (let run = 0; run < BENCHMARK_RUNS; run++) {
      const start = performance.now();
      const result = solveKmap(input);
      times.push(performance.now() - start);

      if (!result.ok) {
        console.error(`Benchmark failed on '${input}': ${result.error.message}`);
        return 1;
      }
      expression = result.value.expression;
    }

    const avg = times.reduce((a, b) => a + b, 0) / times.length;
    console.log(`${name.padEnd(18)} | ${avg.toFixed(3)}ms avg | ${Math.min(...times).toFixed(3)}ms min | ${Math.max(...times).toFixed(3)}ms max`);
    console.log(`${''.padEnd(18)} | Result: ${expression}`);
  }

  return 0;
}

function runSolve(options: CliOptions): number {
  const start = performance.now();
  const result = solveKmap(options.input, {
    dontCares: options.dontCares,
    verbose: options.verbose,
  });
  const elapsed = performance.now() - start;

  if (!result.ok) {
    const { error } = result;
    if (error.type === KmapErrorType.INVARIANT_VIOLATION) {
      console.error(`Internal error: ${error.message}`);
      return 2;
    }
    console.error(`Error: ${error.message}`);
    return 1;
  }

  const { truthTable, solution, expression } = result.value;

  if (options.visualize) {
    console.log(renderKmap(truthTable));
    console.log('');
  }

  console.log(`Minimal Expression: ${expression}`);

  if (options.explain) {
    const format = detectFormat(options.input) === 'minterm-list' ? 'Minterm list' : 'Binary string';
    console.log(`\nSolution found in ${elapsed.toFixed(3)}ms`);
    console.log(`Input format: ${format}`);
    console.log(`Variables: ${truthTable.numVars} (${VARIABLE_NAMES.slice(0, truthTable.numVars)})`);
    console.log(`Terms: ${solution.termCount}, literals: ${solution.literalCount}`);
    console.log('Expression type: SOP (Sum of Products)');
  }

  return 0;
}

export function main(args: string[] = process.argv): number {
  const command = parseArgs(args);

  if (!command) {
    printUsage();
    return args.some(a => a === '-h' || a === '--help') ? 0 : 1;
  }

  switch (command.kind) {
    case 'examples':
      printExamples();
      return 0;
    case 'benchmark':
      return runBenchmark();
    case 'solve':
      return runSolve(command.options);
  }
}

// Run if executed directly (argv[1] may be a bin symlink)
const entry = process.argv[1];
if (entry && existsSync(entry) && realpathSync(entry) === fileURLToPath(import.meta.url)) {
  process.exit(main());
}
