/**
 * Simulation Benchmark
 *
 * Times repeated 10,000-year runs of ten billion people.
 *
 * Usage:
 *   npx tsx scripts/benchmark.ts [--runs=5]
 */

import { run, populationModule, summarize } from '../src/index.js';

const params = populationModule.mergeParams({
  initialPopulation: 10_000_000_000,
  nYears: 10_000,
  maxAge: 120,
  malesPer100Females: 105,
  targetTotalFertilityRate: 2.0802,
  infantMortalityRate: 0.005,
});

async function main() {
  let runs = 5;
  for (const arg of process.argv.slice(2)) {
    if (arg.startsWith('--runs=')) {
      runs = Number.parseInt(arg.split('=')[1], 10);
    }
  }
  if (!Number.isInteger(runs) || runs < 1) {
    throw new Error(`--runs must be a positive integer, got ${runs}`);
  }

  console.log('=== Simulation Benchmark ===\n');
  console.log(`${params.nYears} years, maxAge ${params.maxAge}, ${runs} runs\n`);

  // Warm-up
  run({ ...params, nYears: 100 });

  const times: number[] = [];
  for (let i = 0; i < runs; i++) {
    const t0 = Date.now();
    const result = run(params);
    const elapsed = Date.now() - t0;
    times.push(elapsed);

    const { finalPopulation, completedFertility } = summarize(result);
    console.log(
      `run ${String(i + 1).padStart(2)}: ${String(elapsed).padStart(6)} ms  ` +
      `final=${finalPopulation.toExponential(4)}  ` +
      `cohortTFR=${completedFertility?.toFixed(4) ?? 'n/a'}`
    );
  }

  const sorted = [...times].sort((a, b) => a - b);
  const mean = times.reduce((s, t) => s + t, 0) / times.length;
  console.log('\n' + '-'.repeat(40));
  console.log(`min ${sorted[0]} ms, median ${sorted[Math.floor(sorted.length / 2)]} ms, mean ${mean.toFixed(1)} ms`);
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
