/**
 * Fertility Sweep
 *
 * Runs a scenario across a range of target fertility rates and reports the
 * final population, its ratio to the start and the completed fertility of
 * the cohorts inside the run.
 *
 * Usage:
 *   npx tsx scripts/fertility-sweep.ts [scenario] [--from=1.6] [--to=2.6] [--step=0.1] [--years=500]
 */

import {
  getScenarioPath,
  loadScenarioAsParams,
  run,
  summarize,
} from '../src/index.js';

function numberArg(name: string, fallback: number): number {
  const prefix = `--${name}=`;
  const arg = process.argv.slice(2).find(a => a.startsWith(prefix));
  if (arg === undefined) return fallback;
  const value = Number(arg.slice(prefix.length));
  if (!Number.isFinite(value)) {
    throw new Error(`${prefix} expects a number, got "${arg.slice(prefix.length)}"`);
  }
  return value;
}

async function main() {
  const scenarioName = process.argv.slice(2).find(a => !a.startsWith('--')) ?? 'default';
  const from = numberArg('from', 1.6);
  const to = numberArg('to', 2.6);
  const step = numberArg('step', 0.1);
  const years = numberArg('years', 500);
  if (step <= 0) {
    throw new Error('--step must be positive');
  }

  const { scenario, params } = await loadScenarioAsParams(getScenarioPath(scenarioName), { nYears: years });

  console.log(`=== Fertility Sweep: ${scenario.name} ===\n`);
  console.log(`${params.initialPopulation.toExponential(2)} people, ${params.nYears} years\n`);
  console.log('TFR      Final pop      Final/Start  Cohort TFR');
  console.log('-----    -------------  -----------  ----------');

  const t0 = Date.now();
  // Integer steps avoid drift from repeated float addition
  const count = Math.floor((to - from) / step + 1e-9);
  for (let i = 0; i <= count; i++) {
    const tfr = from + i * step;
    const result = run({ ...params, targetTotalFertilityRate: tfr });
    const { finalPopulation, completedFertility } = summarize(result);
    console.log(
      `${tfr.toFixed(3).padEnd(7)}  ` +
      `${finalPopulation.toExponential(4).padStart(13)}  ` +
      `${(finalPopulation / params.initialPopulation).toFixed(4).padStart(11)}  ` +
      `${(completedFertility?.toFixed(4) ?? 'n/a').padStart(10)}`
    );
  }

  console.log(`\n${count + 1} runs in ${((Date.now() - t0) / 1000).toFixed(1)}s`);
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
