import type { RunTraceEvent } from '@evalgate/schemas';
import type { TestCase } from './testCase.js';
import type { ResultReport, RunObserver, RunStartInfo, UnitOutcome } from './types.js';

function now(): string {
  return new Date().toISOString();
}

/** Observer that keeps a typed event log of a run. */
export class TraceRecorder implements RunObserver {
  private readonly events: RunTraceEvent[] = [];

  onRunStart(info: RunStartInfo): void {
    this.events.push({
      type: 'run_started',
      timestamp: info.startedAt,
      runId: info.runId,
      suiteName: info.suiteName,
      workers: info.workers,
      totalUnits: info.totalUnits,
      hyperparameters: { ...info.hyperparameters }
    });
  }

  onUnitStart(index: number, _testCase: TestCase): void {
    this.events.push({ type: 'unit_started', timestamp: now(), index });
  }

  onUnitEnd(outcome: UnitOutcome): void {
    const timestamp = now();
    for (const measurement of outcome.measurements) {
      this.events.push({
        type: 'metric_result',
        timestamp,
        index: outcome.index,
        metricName: measurement.metricName,
        score: measurement.score,
        success: measurement.success,
        ...(measurement.error ? { errorMessage: measurement.error.message } : {})
      });
    }
    this.events.push({ type: 'unit_finished', timestamp, index: outcome.index, status: outcome.status });
  }

  onRunEnd(report: ResultReport): void {
    this.events.push({
      type: 'run_finished',
      timestamp: report.finishedAt,
      allPassed: report.allPassed,
      summary: { ...report.summary }
    });
  }

  list(): RunTraceEvent[] {
    return [...this.events];
  }

  listByUnit(index: number): RunTraceEvent[] {
    return this.events.filter((event) => 'index' in event && event.index === index);
  }
}
