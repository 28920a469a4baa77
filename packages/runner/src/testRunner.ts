import { runConfigSchema, type Measurement, type RunConfigInput, type UnitStatus } from '@evalgate/schemas';
import { toMeasurementError } from './errors.js';
import { brokenMetricMeasurement, evaluateMetric, metricContractViolation, statusOf } from './evaluate.js';
import { erroredMeasurement } from './measurement.js';
import type { Metric } from './metric.js';
import { runPool } from './pool.js';
import { buildReport } from './report.js';
import type { TestCase } from './testCase.js';
import type { ResultReport, RunObserver, TestUnit, UnitOutcome } from './types.js';

export interface TestRunnerOptions extends Omit<RunConfigInput, 'resultsFolder'> {
  observers?: readonly RunObserver[];
  now?: () => Date;
}

/**
 * Runs (test case, metrics) units on a fixed pool of workers.
 *
 * Each unit moves pending → running → succeeded | failed | errored. Units get
 * their own clones of every metric, and a unit that errors is recorded and
 * never stops the others. The report always lists units in input order.
 */
export class TestRunner {
  readonly suiteName: string;
  readonly workers: number;
  private readonly hyperparameters: Record<string, string | number | boolean>;
  private readonly observers: readonly RunObserver[];
  private readonly now: () => Date;
  private states: UnitStatus[] = [];

  constructor(options: TestRunnerOptions = {}) {
    const config = runConfigSchema.parse({
      suiteName: options.suiteName,
      workers: options.workers,
      hyperparameters: options.hyperparameters
    });
    this.suiteName = config.suiteName;
    this.workers = config.workers;
    this.hyperparameters = config.hyperparameters;
    this.observers = options.observers ?? [];
    this.now = options.now ?? (() => new Date());
  }

  /**
   * State of each unit of the most recently started run, by input index.
   * Overlapping runs each keep their own states.
   */
  unitStates(): readonly UnitStatus[] {
    return [...this.states];
  }

  async runCases(testCases: readonly TestCase[], metrics: readonly Metric[]): Promise<ResultReport> {
    return this.run(testCases.map((testCase) => ({ testCase, metrics })));
  }

  async run(units: readonly TestUnit[]): Promise<ResultReport> {
    const startedAt = this.now().toISOString();
    const runId = `${startedAt}_${this.suiteName}`;
    const states = units.map((): UnitStatus => 'pending');
    this.states = states;

    this.emit((observer) =>
      observer.onRunStart?.({
        runId,
        suiteName: this.suiteName,
        workers: this.workers,
        totalUnits: units.length,
        hyperparameters: { ...this.hyperparameters },
        startedAt
      })
    );

    const outcomes = await runPool(units, this.workers, (unit, index) => this.runUnit(unit, index, states));

    const report = buildReport({
      runId,
      suiteName: this.suiteName,
      startedAt,
      finishedAt: this.now().toISOString(),
      workers: this.workers,
      hyperparameters: this.hyperparameters,
      outcomes
    });

    this.emit((observer) => observer.onRunEnd?.(report));
    return report;
  }

  private async runUnit(unit: TestUnit, index: number, states: UnitStatus[]): Promise<UnitOutcome> {
    states[index] = 'running';
    this.emit((observer) => observer.onUnitStart?.(index, unit.testCase));

    const measurements: Measurement[] = [];
    for (const metric of unit.metrics) {
      measurements.push(await this.measureIsolated(metric, unit.testCase));
    }

    const outcome: UnitOutcome = {
      index,
      testCase: unit.testCase,
      status: statusOf(measurements),
      measurements: Object.freeze(measurements)
    };
    states[index] = outcome.status;
    this.emit((observer) => observer.onUnitEnd?.(outcome));
    return outcome;
  }

  private async measureIsolated(metric: Metric, testCase: TestCase): Promise<Measurement> {
    const violation = metricContractViolation(metric);
    if (violation !== undefined) {
      return brokenMetricMeasurement(metric, violation);
    }

    let own: Metric;
    try {
      own = metric.clone();
    } catch (error) {
      return erroredMeasurement({
        metricName: metric.name,
        minimumScore: metric.minimumScore,
        consumedFields: metric.requiredFields,
        error: toMeasurementError(error)
      });
    }
    return evaluateMetric(own, testCase);
  }

  private emit(call: (observer: RunObserver) => void): void {
    for (const observer of this.observers) {
      call(observer);
    }
  }
}
