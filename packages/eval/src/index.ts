/**
 * eval-check: runs the verification harness and fails the process when any
 * case fails. Intended for CI and pre-deploy gates.
 *
 * Usage: npm run eval [-- <suite.json>]
 *
 * Offline (CFGSQL_EVAL_OFFLINE=1, or no OPENAI_API_KEY): seeded SQLite plus
 * recorded outcomes. Online: the configured catalog, engine and model.
 */

import {
  defaultEvalCases,
  errorMessage,
  formatEvalReport,
  loadEnvFile,
  loadEvalSuite,
  summarize,
  type EvalRun,
} from '@cfgsql/core';
import { createTarget, runEvalCheck } from './check.js';

async function main(): Promise<void> {
  loadEnvFile();
  const suitePath = process.argv[2];
  const cases = suitePath ? await loadEvalSuite(suitePath) : defaultEvalCases();

  const target = createTarget(process.env);
  console.log(`Running ${cases.length} evals, ${target.label}`);

  let run: EvalRun;
  try {
    run = await runEvalCheck(cases, target);
  } finally {
    target.cleanup();
  }

  console.log('');
  console.log(formatEvalReport(run.results));

  if (run.error) {
    const summary = summarize(run.results);
    console.error('');
    console.error(`Evals failed (${summary.failed} of ${summary.total}): ${run.error}`);
    process.exitCode = 1;
    return;
  }
  console.log('');
  console.log('All evals passed');
}

main().catch((err: unknown) => {
  console.error(`eval-check failed: ${errorMessage(err)}`);
  process.exitCode = 1;
});
