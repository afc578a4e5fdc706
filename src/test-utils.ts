/**
 * Shared Test Utilities
 *
 * Lightweight test framework used by all tests. Each test file runs as its
 * own process and ends with printSummary(), which sets a failing exit code.
 * NaN-guarded: numeric assertions fail explicitly on NaN instead of silently passing.
 */

let passed = 0;
let failed = 0;

function report(name: string, err: unknown) {
  console.error(`✗ ${name}`);
  console.error(`  ${err instanceof Error ? err.message : String(err)}`);
  failed++;
}

export function test(name: string, fn: () => void) {
  try {
    fn();
    console.log(`✓ ${name}`);
    passed++;
  } catch (e) {
    report(name, e);
  }
}

/** Await at top level: `await testAsync('...', async () => { ... })` */
export async function testAsync(name: string, fn: () => Promise<void>) {
  try {
    await fn();
    console.log(`✓ ${name}`);
    passed++;
  } catch (e) {
    report(name, e);
  }
}

type ErrorClass = new (...args: never[]) => Error;

function isNumber(value: unknown): value is number {
  return typeof value === 'number';
}

function isThunk(value: unknown): value is () => unknown {
  return typeof value === 'function';
}

function numeric(actual: unknown, what: string): number {
  if (!isNumber(actual) || Number.isNaN(actual)) {
    throw new Error(`Expected a number for ${what}, got ${String(actual)}`);
  }
  return actual;
}

export function expect<T>(actual: T) {
  return {
    toBe(expected: T) {
      if (!Object.is(actual, expected)) {
        throw new Error(`Expected ${String(expected)}, got ${String(actual)}`);
      }
    },
    toEqual(expected: T) {
      if (JSON.stringify(actual) !== JSON.stringify(expected)) {
        throw new Error(`Expected ${JSON.stringify(expected)}, got ${JSON.stringify(actual)}`);
      }
    },
    toBeCloseTo(expected: number, precision: number = 2) {
      const value = numeric(actual, `~${expected}`);
      const diff = Math.abs(value - expected);
      const threshold = Math.pow(10, -precision);
      if (diff > threshold) {
        throw new Error(`Expected ~${expected}, got ${value} (diff: ${diff.toExponential(3)})`);
      }
    },
    toBeGreaterThan(expected: number) {
      const value = numeric(actual, `> ${expected}`);
      if (value <= expected) {
        throw new Error(`Expected ${value} > ${expected}`);
      }
    },
    toBeLessThan(expected: number) {
      const value = numeric(actual, `< ${expected}`);
      if (value >= expected) {
        throw new Error(`Expected ${value} < ${expected}`);
      }
    },
    toBeBetween(min: number, max: number) {
      const value = numeric(actual, `[${min}, ${max}]`);
      if (value < min || value > max) {
        throw new Error(`Expected ${value} to be between ${min} and ${max}`);
      }
    },
    toBeTrue() {
      if (actual !== true) {
        throw new Error(`Expected true, got ${String(actual)}`);
      }
    },
    toBeFalse() {
      if (actual !== false) {
        throw new Error(`Expected false, got ${String(actual)}`);
      }
    },
    toBeUndefined() {
      if (actual !== undefined) {
        throw new Error(`Expected undefined, got ${String(actual)}`);
      }
    },
    toThrow(errorClass?: ErrorClass, message?: string) {
      if (!isThunk(actual)) {
        throw new Error('Expected a function');
      }
      let thrown: unknown;
      let didThrow = false;
      try {
        actual();
      } catch (err) {
        thrown = err;
        didThrow = true;
      }
      if (!didThrow) {
        throw new Error('Expected function to throw');
      }
      if (errorClass && !(thrown instanceof errorClass)) {
        throw new Error(`Expected ${errorClass.name}, got ${String(thrown)}`);
      }
      if (message && !(thrown instanceof Error && thrown.message.includes(message))) {
        throw new Error(`Expected error containing "${message}", got "${String(thrown)}"`);
      }
    },
    async toReject(errorClass?: ErrorClass) {
      if (!(actual instanceof Promise)) {
        throw new Error('Expected a promise');
      }
      try {
        await actual;
      } catch (err) {
        if (errorClass && !(err instanceof errorClass)) {
          throw new Error(`Expected ${errorClass.name}, got ${String(err)}`);
        }
        return;
      }
      throw new Error('Expected promise to reject');
    },
    toHaveLength(expected: number) {
      if (!Array.isArray(actual) || actual.length !== expected) {
        throw new Error(`Expected length ${expected}, got ${Array.isArray(actual) ? actual.length : 'not an array'}`);
      }
    },
  };
}

export function printSummary() {
  console.log('\n=== Summary ===\n');
  console.log(`Passed: ${passed}`);
  console.log(`Failed: ${failed}`);
  console.log(`Total:  ${passed + failed}`);
  if (failed > 0) {
    process.exitCode = 1;
  }
}
