import type {
  FinalUnitStatus,
  Hyperparameters,
  Measurement,
  RunReport,
  UnitResult
} from '@evalgate/schemas';
import type { Metric } from './metric.js';
import type { TestCase } from './testCase.js';

/** One scheduled piece of work: a test case and the metrics to apply to it. */
export interface TestUnit {
  testCase: TestCase;
  metrics: readonly Metric[];
}

export interface UnitOutcome {
  index: number;
  testCase: TestCase;
  status: FinalUnitStatus;
  measurements: readonly Measurement[];
}

export interface RunStartInfo {
  runId: string;
  suiteName: string;
  workers: number;
  totalUnits: number;
  hyperparameters: Hyperparameters;
  startedAt: string;
}

/**
 * Instrumentation hooks. Observers are called synchronously at explicit run
 * and unit boundaries; an observer that throws aborts the run.
 */
export interface RunObserver {
  onRunStart?(info: RunStartInfo): void;
  onUnitStart?(index: number, testCase: TestCase): void;
  onUnitEnd?(outcome: UnitOutcome): void;
  onRunEnd?(report: ResultReport): void;
}

export type ResultReport = Readonly<
  Omit<RunReport, 'results'> & { results: readonly Readonly<UnitResult>[] }
>;
