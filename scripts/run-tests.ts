/**
 * Test Runner
 *
 * Runs every *.test.ts file under src/ in its own process and exits with the
 * worst exit code, so a failing file never hides the ones after it.
 *
 * Usage:
 *   npx tsx scripts/run-tests.ts [filter]
 */

import { spawnSync } from 'child_process';
import { readdirSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const root = join(dirname(fileURLToPath(import.meta.url)), '..');

function findTestFiles(filter: string | undefined): string[] {
  return readdirSync(join(root, 'src'), { recursive: true, encoding: 'utf-8' })
    .filter(f => f.endsWith('.test.ts'))
    .map(f => join('src', f))
    .filter(f => filter === undefined || f.includes(filter))
    .sort();
}

async function main() {
  const files = findTestFiles(process.argv[2]);
  if (files.length === 0) {
    throw new Error(`No test files found${process.argv[2] ? ` matching "${process.argv[2]}"` : ''}`);
  }

  const results: { file: string; status: number }[] = [];
  for (const file of files) {
    const child = spawnSync(process.execPath, ['--import', 'tsx', file], { cwd: root, stdio: 'inherit' });
    if (child.error) throw child.error;
    // null status means the child was killed by a signal
    results.push({ file, status: child.status ?? 1 });
  }

  console.log('\n' + '='.repeat(50));
  for (const { file, status } of results) {
    console.log(`${status === 0 ? 'ok  ' : 'FAIL'}  ${file}`);
  }
  const failed = results.filter(r => r.status !== 0).length;
  console.log(`\n${results.length - failed}/${results.length} test files passed`);

  process.exitCode = Math.max(...results.map(r => r.status));
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
