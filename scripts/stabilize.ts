/**
 * Stabilize a Scenario
 *
 * Finds the fertility rate that keeps a scenario's population level, runs
 * it, and optionally stores the full result as JSON.
 *
 * Usage:
 *   npx tsx scripts/stabilize.ts [scenario] [--feedback] [--verbose] [--output=results/stable.json]
 */

import * as fs from 'fs';
import * as path from 'path';
import {
  getScenarioPath,
  loadScenarioAsParams,
  run,
  stabilize,
  stabilizeByFeedback,
  summarize,
} from '../src/index.js';

async function main() {
  const args = process.argv.slice(2);
  const scenarioName = args.find(a => !a.startsWith('--')) ?? 'default';
  const feedback = args.includes('--feedback');
  const verbose = args.includes('--verbose');
  const outputPath = args.find(a => a.startsWith('--output='))?.split('=')[1];

  const { scenario, params } = await loadScenarioAsParams(getScenarioPath(scenarioName));
  console.log(`=== Stabilize: ${scenario.name} ===\n`);
  console.log(`Method: ${feedback ? 'PI feedback' : 'Nelder-Mead'}`);
  console.log(`Starting TFR: ${params.targetTotalFertilityRate}\n`);

  const t0 = Date.now();
  const stable = feedback ? stabilizeByFeedback(params, { verbose }) : stabilize(params, { verbose });
  const elapsed = ((Date.now() - t0) / 1000).toFixed(1);

  if (!stable.converged) {
    console.warn(`[stabilize] Warning: stopped after ${stable.iterations} iterations without converging`);
  }
  console.log(`Stable TFR:  ${stable.parameters.targetTotalFertilityRate.toFixed(6)}`);
  console.log(`Iterations:  ${stable.iterations} (${stable.evaluations} runs, ${elapsed}s)`);
  console.log(`Cost:        ${stable.cost.toExponential(3)}`);

  const result = run(stable.parameters);
  const { finalPopulation, completedFertility } = summarize(result);
  console.log(`Final pop:   ${finalPopulation.toExponential(4)} (${(finalPopulation / params.initialPopulation).toFixed(4)}x)`);
  console.log(`Cohort TFR:  ${completedFertility?.toFixed(4) ?? 'n/a'}`);

  if (outputPath) {
    const outputDir = path.dirname(outputPath);
    if (!fs.existsSync(outputDir)) {
      fs.mkdirSync(outputDir, { recursive: true });
    }
    const json = JSON.stringify({ parameters: stable.parameters, result });
    fs.writeFileSync(outputPath, json);
    console.log(`\nStored ${json.length} bytes to ${outputPath}`);
  }
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
