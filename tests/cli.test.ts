import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { main } from '../src/cli.js';

describe('CLI', () => {
  let consoleLogs: string[] = [];
  let consoleErrors: string[] = [];
  let originalLog: typeof console.log;
  let originalError: typeof console.error;

  beforeEach(() => {
    consoleLogs = [];
    consoleErrors = [];
    originalLog = console.log;
    originalError = console.error;
    console.log = (...args) => consoleLogs.push(args.join(' '));
    console.error = (...args) => consoleErrors.push(args.join(' '));
  });

  afterEach(() => {
    console.log = originalLog;
    console.error = originalError;
  });

  const run = (...args: string[]) => main(['node', 'cli.js', ...args]);

  describe('argument parsing', () => {
    it('should show help with no arguments', () => {
      expect(run()).toBe(1);
      expect(consoleLogs.some(l => l.includes('Usage'))).toBe(true);
      expect(consoleErrors).toEqual(['Error: No input specified']);
    });

    it('should show help with -h flag', () => {
      expect(run('-h')).toBe(0);
      expect(consoleLogs.some(l => l.includes('Usage'))).toBe(true);
    });

    it('should error on unknown option', () => {
      expect(run('--unknown')).toBe(1);
      expect(consoleErrors).toEqual(["Error: Unknown option '--unknown'"]);
    });

    it('should error when -d is missing its list', () => {
      expect(run('1010', '-d')).toBe(1);
      expect(consoleErrors).toEqual(['Error: -d requires a cell list']);
    });

    it('should error on a malformed don\'t-care list', () => {
      expect(run('1,2', '-d', '3,x')).toBe(1);
      expect(consoleErrors).toEqual(["Error: Invalid minterm 'x'"]);
    });

    it('should take a binary string that starts with a don\'t-care', () => {
      expect(run('--11')).toBe(0);
      expect(consoleLogs).toEqual(['Minimal Expression: ~B']);
    });
  });

  describe('solving', () => {
    it('should print the minimal expression', () => {
      expect(run('1010')).toBe(0);
      expect(consoleLogs).toEqual(['Minimal Expression: A']);
    });

    it('should apply don\'t-cares from -d', () => {
      expect(run('1,2,5', '-d', '0,4,6')).toBe(0);
      expect(consoleLogs).toEqual(['Minimal Expression: A&~B + ~A&B']);
    });

    it('should print 0 when only don\'t-cares are given', () => {
      expect(run('XXXX')).toBe(0);
      expect(consoleLogs).toEqual(['Minimal Expression: 0']);
    });

    it('should report invalid input', () => {
      expect(run('102')).toBe(1);
      expect(consoleErrors).toEqual(["Error: Unrecognized input format: '102'"]);
    });

    it('should draw the map with -v', () => {
      expect(run('-v', '1010')).toBe(0);
      expect(consoleLogs).toEqual([
        'K-map (2 variables):\nB\\A | 0 1\n0   | 0 1\n1   | 0 1',
        '',
        'Minimal Expression: A',
      ]);
    });

    it('should explain the solution with -e', () => {
      expect(run('-e', '0,3')).toBe(0);
      expect(consoleLogs[0]).toBe('Minimal Expression: ~A&~B + A&B');
      expect(consoleLogs).toContain('Input format: Minterm list');
      expect(consoleLogs).toContain('Variables: 2 (AB)');
      expect(consoleLogs).toContain('Terms: 2, literals: 4');
    });

    it('should trace the passes with --verbose', () => {
      expect(run('--verbose', '1010')).toBe(0);
      expect(consoleLogs).toContain('  Pair pass: 1 implicants, 0 minterms left');
      expect(consoleLogs[consoleLogs.length - 1]).toBe('Minimal Expression: A');
    });
  });

  describe('other modes', () => {
    it('should list examples', () => {
      expect(run('--examples')).toBe(0);
      expect(consoleLogs[0]).toContain('Input formats:');
    });

    it('should run the benchmark', () => {
      expect(run('--benchmark')).toBe(0);
      expect(consoleLogs[0]).toBe('K-map Solver Benchmark');
      expect(consoleLogs[3]).toBe(`${' '.repeat(18)} | Result: A`);
    });
  });
});
