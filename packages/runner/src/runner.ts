import type { RunConfigInput } from '@evalgate/schemas';
import { resolveRunConfig } from './config.js';
import { persistReport } from './report.js';
import type { EvaluationSuite } from './suite.js';
import { TestRunner } from './testRunner.js';
import type { ResultReport, RunObserver } from './types.js';

export interface SuiteRun {
  report: ResultReport;
  /** Where the report was persisted, when a results folder is configured. */
  persistedTo?: string;
}

/**
 * Runs every test case of the suite against all of its metrics. Missing
 * options fall back to the environment (EVALGATE_RESULTS_FOLDER) and then to
 * the schema defaults.
 */
export async function runSuite(
  suite: EvaluationSuite,
  input: RunConfigInput & { observers?: readonly RunObserver[]; env?: NodeJS.ProcessEnv } = {}
): Promise<SuiteRun> {
  const { observers, env, ...options } = input;
  const config = resolveRunConfig(
    { ...options, suiteName: options.suiteName ?? suite.name },
    env
  );

  const runner = new TestRunner({
    suiteName: config.suiteName,
    workers: config.workers,
    hyperparameters: config.hyperparameters,
    observers
  });
  const report = await runner.runCases(suite.testCases, suite.metrics);

  if (config.resultsFolder === undefined) {
    return { report };
  }
  return { report, persistedTo: persistReport(report, config.resultsFolder) };
}
