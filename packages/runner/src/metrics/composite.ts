import type { Measurement, TestCaseField } from '@evalgate/schemas';
import { ConfigurationError, StateError } from '../errors.js';
import { evaluateMetric } from '../evaluate.js';
import { createMeasurement, erroredMeasurement } from '../measurement.js';
import { DEFAULT_MINIMUM_SCORE, checkMinimumScore, validateRequiredFields, type Metric } from '../metric.js';
import { TEST_CASE_FIELDS, type TestCase } from '../testCase.js';

/**
 * N / Σ(1/sᵢ). Any zero score makes the mean undefined; it is reported as 0.
 * Terms are summed in ascending order so every permutation of the same
 * scores yields the same result bit for bit.
 */
export function harmonicMean(scores: readonly number[]): number {
  if (scores.length === 0) {
    throw new ConfigurationError('Harmonic mean of an empty score list is undefined');
  }
  if (scores.some((score) => score === 0)) {
    return 0;
  }
  const denominator = [...scores]
    .sort((a, b) => a - b)
    .reduce((acc, score) => acc + 1 / score, 0);
  return scores.length / denominator;
}

export interface CompositeMetricOptions {
  name?: string;
  minimumScore?: number;
  metrics: readonly Metric[];
}

/**
 * Scores a test case with several metrics and reduces their scores with the
 * harmonic mean (the RAGAS-style aggregate). A failing sub-metric errors the
 * whole composite instead of being dropped from the reduction.
 */
export class CompositeMetric implements Metric {
  readonly name: string;
  readonly minimumScore: number;
  readonly requiredFields: readonly TestCaseField[];
  readonly metrics: readonly Metric[];
  private lastMeasurement: Measurement | undefined;

  constructor(options: CompositeMetricOptions) {
    this.name = options.name ?? 'composite';
    if (options.metrics.length === 0) {
      throw new ConfigurationError(`Composite metric "${this.name}" needs at least one sub-metric`);
    }
    this.minimumScore = checkMinimumScore(this.name, options.minimumScore ?? DEFAULT_MINIMUM_SCORE);
    this.metrics = Object.freeze([...options.metrics]);
    const used = new Set(options.metrics.flatMap((metric) => metric.requiredFields));
    this.requiredFields = Object.freeze(TEST_CASE_FIELDS.filter((field) => used.has(field)));
  }

  validate(testCase: TestCase): void {
    validateRequiredFields(this, testCase);
  }

  async measure(testCase: TestCase): Promise<Measurement> {
    this.validate(testCase);

    const components = await Promise.all(
      this.metrics.map((metric) => evaluateMetric(metric, testCase))
    );

    const failed = components.find((component) => component.error !== undefined);
    const measurement = failed?.error
      ? erroredMeasurement({
          metricName: this.name,
          minimumScore: this.minimumScore,
          consumedFields: this.requiredFields,
          components,
          error: {
            kind: failed.error.kind,
            message: `Sub-metric "${failed.metricName}" errored: ${failed.error.message}`
          }
        })
      : createMeasurement({
          metricName: this.name,
          score: harmonicMean(components.map((component) => component.score)),
          minimumScore: this.minimumScore,
          consumedFields: this.requiredFields,
          components
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

  clone(): CompositeMetric {
    return new CompositeMetric({
      name: this.name,
      minimumScore: this.minimumScore,
      metrics: this.metrics.map((metric) => metric.clone())
    });
  }
}
