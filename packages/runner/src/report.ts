import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import {
  runReportSchema,
  type Hyperparameters,
  type RunSummary,
  type UnitResult
} from '@evalgate/schemas';
import { toTestCaseRecord } from './testCase.js';
import type { ResultReport, UnitOutcome } from './types.js';

export function summarize(outcomes: readonly UnitOutcome[]): RunSummary {
  return {
    total: outcomes.length,
    succeeded: outcomes.filter((o) => o.status === 'succeeded').length,
    failed: outcomes.filter((o) => o.status === 'failed').length,
    errored: outcomes.filter((o) => o.status === 'errored').length
  };
}

/** True iff every measurement of every unit succeeded. Errored units never pass. */
export function allPassed(outcomes: readonly UnitOutcome[]): boolean {
  return outcomes.every(
    (o) => o.status !== 'errored' && o.measurements.every((m) => m.success && m.error === undefined)
  );
}

export function buildReport(input: {
  runId: string;
  suiteName: string;
  startedAt: string;
  finishedAt: string;
  workers: number;
  hyperparameters: Hyperparameters;
  outcomes: readonly UnitOutcome[];
}): ResultReport {
  const ordered = [...input.outcomes].sort((a, b) => a.index - b.index);
  const results: UnitResult[] = ordered.map((o) => ({
    index: o.index,
    testCase: toTestCaseRecord(o.testCase),
    status: o.status,
    measurements: [...o.measurements]
  }));

  return deepFreeze({
    runId: input.runId,
    suiteName: input.suiteName,
    startedAt: input.startedAt,
    finishedAt: input.finishedAt,
    workers: input.workers,
    hyperparameters: { ...input.hyperparameters },
    allPassed: allPassed(ordered),
    summary: summarize(ordered),
    results
  });
}

export function exitCodeFor(report: ResultReport): number {
  return report.allPassed ? 0 : 1;
}

export function writeReport(report: ResultReport, outputPath: string): void {
  mkdirSync(dirname(outputPath), { recursive: true });
  writeFileSync(outputPath, JSON.stringify(report, null, 2), 'utf8');
}

export function reportFileName(report: ResultReport): string {
  return `${report.runId.replace(/[^A-Za-z0-9._-]/g, '-')}.json`;
}

/** Writes the report into `folder` as `<runId>.json` and returns the path. */
export function persistReport(report: ResultReport, folder: string): string {
  const outputPath = join(folder, reportFileName(report));
  writeReport(report, outputPath);
  return outputPath;
}

export function loadReport(path: string): ResultReport {
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf8'));
  return deepFreeze(runReportSchema.parse(parsed));
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
