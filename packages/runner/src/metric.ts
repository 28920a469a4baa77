import type { Measurement, TestCaseField } from '@evalgate/schemas';
import {
  ConfigurationError,
  EvalError,
  MetricImplementationError,
  StateError,
  errorMessage
} from './errors.js';
import { assertScoreInRange, createMeasurement } from './measurement.js';
import { missingFields, type TestCase } from './testCase.js';

export const DEFAULT_MINIMUM_SCORE = 0.5;

/**
 * Contract every metric satisfies, built-in or user-supplied. The runner only
 * talks to metrics through this interface.
 */
export interface Metric {
  readonly name: string;
  readonly minimumScore: number;
  readonly requiredFields: readonly TestCaseField[];
  measure(testCase: TestCase): Promise<Measurement>;
  /** Result of the last `measure` call. Throws a StateError before the first one. */
  isSuccessful(): boolean;
  /** Fresh instance with the same configuration and no measurement state. */
  clone(): Metric;
}

export interface MetricOptions {
  name: string;
  minimumScore?: number;
  requiredFields?: readonly TestCaseField[];
}

export type ScoreFn = (testCase: TestCase) => number | Promise<number>;

export function checkMinimumScore(name: string, minimumScore: number): number {
  if (!Number.isFinite(minimumScore) || minimumScore < 0 || minimumScore > 1) {
    throw new ConfigurationError(
      `Metric "${name}" has minimumScore ${minimumScore}; thresholds must be in [0, 1]`
    );
  }
  return minimumScore;
}

/** Throws a ConfigurationError naming every required field the test case lacks. */
export function validateRequiredFields(
  metric: Pick<Metric, 'name' | 'requiredFields'>,
  testCase: TestCase
): void {
  const missing = missingFields(testCase, metric.requiredFields);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Metric "${metric.name}" requires ${missing.join(', ')} but the test case does not provide ${
        missing.length === 1 ? 'it' : 'them'
      }`,
      missing
    );
  }
}

export abstract class BaseMetric implements Metric {
  readonly name: string;
  readonly minimumScore: number;
  readonly requiredFields: readonly TestCaseField[];
  private lastMeasurement: Measurement | undefined;

  protected constructor(options: MetricOptions) {
    this.name = options.name;
    this.minimumScore = checkMinimumScore(options.name, options.minimumScore ?? DEFAULT_MINIMUM_SCORE);
    this.requiredFields = Object.freeze(
      withBaseFields(options.requiredFields ?? [])
    );
  }

  protected abstract computeScore(testCase: TestCase): number | Promise<number>;

  abstract clone(): Metric;

  get score(): number | undefined {
    return this.lastMeasurement?.score;
  }

  validate(testCase: TestCase): void {
    validateRequiredFields(this, testCase);
  }

  async measure(testCase: TestCase): Promise<Measurement> {
    this.validate(testCase);

    let raw: number;
    try {
      raw = await this.computeScore(testCase);
    } catch (error) {
      if (error instanceof EvalError) throw error;
      throw new MetricImplementationError(
        `Metric "${this.name}" failed while scoring: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const measurement = createMeasurement({
      metricName: this.name,
      score: assertScoreInRange(this.name, raw),
      minimumScore: this.minimumScore,
      consumedFields: this.requiredFields
    });
    this.lastMeasurement = measurement;
    return measurement;
  }

  isSuccessful(): boolean {
    if (this.lastMeasurement === undefined) {
      throw new StateError(`Metric "${this.name}" has not been measured yet`);
    }
    return this.lastMeasurement.success;
  }
}

/** Metric around an arbitrary, possibly asynchronous, scoring function. */
export class FunctionMetric extends BaseMetric {
  private readonly options: MetricOptions & { score: ScoreFn };

  constructor(options: MetricOptions & { score: ScoreFn }) {
    super(options);
    this.options = options;
  }

  protected computeScore(testCase: TestCase): number | Promise<number> {
    return this.options.score(testCase);
  }

  clone(): FunctionMetric {
    return new FunctionMetric(this.options);
  }
}

export function defineMetric(options: MetricOptions & { score: ScoreFn }): FunctionMetric {
  return new FunctionMetric(options);
}

// Every metric reads the prompt and the generated text.
function withBaseFields(fields: readonly TestCaseField[]): TestCaseField[] {
  const all: TestCaseField[] = ['input', 'actualOutput'];
  for (const field of fields) {
    if (!all.includes(field)) all.push(field);
  }
  return all;
}
