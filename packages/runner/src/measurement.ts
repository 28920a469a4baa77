import type { Measurement, MeasurementError, TestCaseField } from '@evalgate/schemas';
import { MetricImplementationError } from './errors.js';

export interface MeasurementInput {
  metricName: string;
  score: number;
  minimumScore: number;
  consumedFields: readonly TestCaseField[];
  components?: readonly Measurement[];
}

/**
 * Builds an immutable measurement. `success` is always derived here from the
 * score and threshold, never taken from the metric.
 */
export function createMeasurement(input: MeasurementInput): Measurement {
  const measurement: Measurement = {
    metricName: input.metricName,
    score: input.score,
    minimumScore: input.minimumScore,
    success: input.score >= input.minimumScore,
    consumedFields: [...input.consumedFields],
    ...(input.components !== undefined ? { components: [...input.components] } : {})
  };
  return freezeMeasurement(measurement);
}

export function erroredMeasurement(
  input: Omit<MeasurementInput, 'score'> & { error: MeasurementError }
): Measurement {
  const measurement: Measurement = {
    metricName: input.metricName,
    score: 0,
    minimumScore: input.minimumScore,
    success: false,
    consumedFields: [...input.consumedFields],
    error: { ...input.error },
    ...(input.components !== undefined ? { components: [...input.components] } : {})
  };
  return freezeMeasurement(measurement);
}

export function assertScoreInRange(metricName: string, score: unknown): number {
  if (typeof score !== 'number' || !Number.isFinite(score) || score < 0 || score > 1) {
    throw new MetricImplementationError(
      `Metric "${metricName}" returned ${String(score)}; scores must be numbers in [0, 1]`
    );
  }
  return score;
}

function freezeMeasurement(measurement: Measurement): Measurement {
  Object.freeze(measurement.consumedFields);
  if (measurement.error) Object.freeze(measurement.error);
  if (measurement.components) Object.freeze(measurement.components);
  return Object.freeze(measurement);
}
