/**
 * Nelder-Mead Downhill Simplex
 *
 * Derivative-free minimizer for expensive, non-smooth objectives such as a
 * full simulation run. Works on n-dimensional points; the simplex is n + 1
 * vertices.
 *
 * Usage:
 *   const result = minimize(x => cost(x[0]), [[1.9], [2.1]], { maxIterations: 500 });
 *   if (!result.converged) console.warn('budget exhausted');
 */

import { standardDeviation } from '../primitives/math.js';

// =============================================================================
// TYPES
// =============================================================================

export type Point = readonly number[];

export type Objective = (x: Point) => number;

export interface NelderMeadOptions {
  /** Iteration cap (default 10,000) */
  maxIterations?: number;
  /**
   * Cost spread: the std. deviation of vertex costs must fall below this
   * (default Number.EPSILON). Equal costs alone can be a tie away from the
   * minimum (|x| at -1 and 1), so `xTolerance` must hold as well.
   */
  sdTolerance?: number;
  /** Simplex size: largest coordinate distance from the best vertex (default 1e-8) */
  xTolerance?: number;
  /** Reflection coefficient (default 1) */
  alpha?: number;
  /** Expansion coefficient (default 2) */
  gamma?: number;
  /** Contraction coefficient (default 0.5) */
  rho?: number;
  /** Shrink coefficient (default 0.5) */
  sigma?: number;
}

/**
 * - converged: both tolerances met
 * - stalled: an iteration left every vertex where it was (floating-point resolution)
 * - max-iterations: budget exhausted
 */
export type TerminationReason = 'converged' | 'stalled' | 'max-iterations';

export interface NelderMeadResult {
  best: number[];
  bestCost: number;
  iterations: number;
  evaluations: number;
  converged: boolean;
  terminationReason: TerminationReason;
}

interface Vertex {
  x: number[];
  cost: number;
}

const DEFAULTS: Required<NelderMeadOptions> = {
  maxIterations: 10_000,
  sdTolerance: Number.EPSILON,
  xTolerance: 1e-8,
  alpha: 1,
  gamma: 2,
  rho: 0.5,
  sigma: 0.5,
};

// =============================================================================
// VECTOR HELPERS
// =============================================================================

/** a + t * (b - a) */
function along(a: Point, b: Point, t: number): number[] {
  return a.map((ai, i) => ai + t * (b[i] - ai));
}

function centroid(vertices: readonly Vertex[]): number[] {
  const dims = vertices[0].x.length;
  const c = new Array<number>(dims).fill(0);
  for (const v of vertices) {
    for (let i = 0; i < dims; i++) {
      c[i] += v.x[i] / vertices.length;
    }
  }
  return c;
}

function byCost(a: Vertex, b: Vertex): number {
  return a.cost - b.cost;
}

/** Largest coordinate distance of any vertex from the first (best) one */
function spread(vertices: readonly Vertex[]): number {
  const best = vertices[0].x;
  let widest = 0;
  for (const v of vertices) {
    for (let i = 0; i < best.length; i++) {
      widest = Math.max(widest, Math.abs(v.x[i] - best[i]));
    }
  }
  return widest;
}

function samePoints(a: readonly Vertex[], b: readonly Vertex[]): boolean {
  return a.every((v, i) => v.x.every((xi, d) => xi === b[i].x[d]));
}

// =============================================================================
// MINIMIZE
// =============================================================================

/**
 * Minimize `objective` starting from `initialSimplex` (n + 1 points of dimension n).
 *
 * Running out of iterations is not an error: the best vertex found is
 * returned with `converged: false`.
 */
export function minimize(
  objective: Objective,
  initialSimplex: readonly Point[],
  options: NelderMeadOptions = {}
): NelderMeadResult {
  const { maxIterations, sdTolerance, xTolerance, alpha, gamma, rho, sigma } = { ...DEFAULTS, ...options };

  const dims = initialSimplex[0]?.length ?? 0;
  if (dims === 0 || initialSimplex.length !== dims + 1) {
    throw new RangeError(
      `Simplex needs n + 1 points of dimension n >= 1, got ${initialSimplex.length} of dimension ${dims}`
    );
  }
  if (initialSimplex.some(p => p.length !== dims)) {
    throw new RangeError('Simplex points differ in dimension');
  }

  let evaluations = 0;
  const evaluate = (x: number[]): Vertex => {
    evaluations++;
    return { x, cost: objective(x) };
  };

  const simplex = initialSimplex.map(p => evaluate([...p])).sort(byCost);
  let iterations = 0;

  function step(): void {
    const n = simplex.length - 1;
    const best = simplex[0];
    const secondWorst = simplex[n - 1];
    const worst = simplex[n];
    const c = centroid(simplex.slice(0, n));

    const reflected = evaluate(along(c, worst.x, -alpha));

    if (reflected.cost >= best.cost && reflected.cost < secondWorst.cost) {
      simplex[n] = reflected;
      return;
    }

    if (reflected.cost < best.cost) {
      const expanded = evaluate(along(c, reflected.x, gamma));
      simplex[n] = expanded.cost < reflected.cost ? expanded : reflected;
      return;
    }

    // Reflection no better than the second-worst vertex: contract towards the worst
    const contracted = evaluate(along(c, worst.x, rho));
    if (contracted.cost < worst.cost) {
      simplex[n] = contracted;
      return;
    }

    for (let i = 1; i <= n; i++) {
      simplex[i] = evaluate(along(best.x, simplex[i].x, sigma));
    }
  }

  function finish(terminationReason: TerminationReason): NelderMeadResult {
    const best = simplex[0];
    return {
      best: [...best.x],
      bestCost: best.cost,
      iterations,
      evaluations,
      converged: terminationReason === 'converged' ||
        (terminationReason === 'stalled' && spread(simplex) <= xTolerance),
      terminationReason,
    };
  }

  while (true) {
    if (standardDeviation(simplex.map(v => v.cost)) < sdTolerance && spread(simplex) <= xTolerance) {
      return finish('converged');
    }
    if (iterations >= maxIterations) {
      return finish('max-iterations');
    }

    const before = simplex.map(v => ({ ...v }));
    step();
    simplex.sort(byCost);
    iterations++;

    if (samePoints(simplex, before)) {
      return finish('stalled');
    }
  }
}
