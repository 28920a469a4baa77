import {
  measurementErrorSchema,
  type FinalUnitStatus,
  type Measurement,
  type TestCaseField
} from '@evalgate/schemas';
import {
  AssertionFailedError,
  ConfigurationError,
  MetricImplementationError,
  toMeasurementError
} from './errors.js';
import { assertScoreInRange, createMeasurement, erroredMeasurement } from './measurement.js';
import type { Metric } from './metric.js';
import { missingFields, TEST_CASE_FIELDS, type TestCase } from './testCase.js';

export interface TestResult {
  testCase: TestCase;
  status: FinalUnitStatus;
  measurements: Measurement[];
  success: boolean;
}

/**
 * Problems with the metric object itself, or undefined when it honours the
 * Metric interface. Metrics from module suites are only checked structurally.
 */
export function metricContractViolation(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null) {
    return `Expected a metric, got ${String(value)}`;
  }
  const name = nameOf(value);
  if (name === undefined) {
    return 'Metric has no name';
  }
  if (!('minimumScore' in value) || !isThreshold(value.minimumScore)) {
    const minimumScore = 'minimumScore' in value ? value.minimumScore : undefined;
    return `Metric "${name}" has minimumScore ${String(minimumScore)}; thresholds must be in [0, 1]`;
  }
  if (
    !('requiredFields' in value) ||
    !Array.isArray(value.requiredFields) ||
    !value.requiredFields.every(isTestCaseField)
  ) {
    return `Metric "${name}" does not declare its requiredFields as a list of test case fields`;
  }
  if (!('measure' in value) || typeof value.measure !== 'function') {
    return `Metric "${name}" has no measure method`;
  }
  if (!('isSuccessful' in value) || typeof value.isSuccessful !== 'function') {
    return `Metric "${name}" has no isSuccessful method`;
  }
  if (!('clone' in value) || typeof value.clone !== 'function') {
    return `Metric "${name}" has no clone method`;
  }
  return undefined;
}

function nameOf(value: object): string | undefined {
  return 'name' in value && typeof value.name === 'string' && value.name.length > 0 ? value.name : undefined;
}

function isThreshold(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= 1;
}

function isTestCaseField(value: unknown): value is TestCaseField {
  return TEST_CASE_FIELDS.some((field) => field === value);
}

// Score range and success are checked afterwards; this only makes the fields readable.
function isMeasurementShaped(value: unknown): value is Measurement {
  if (typeof value !== 'object' || value === null) return false;
  if (!('score' in value) || typeof value.score !== 'number') return false;
  if (!('consumedFields' in value) || !Array.isArray(value.consumedFields)) return false;
  if (!value.consumedFields.every(isTestCaseField)) return false;
  if ('error' in value && value.error !== undefined && !measurementErrorSchema.safeParse(value.error).success) {
    return false;
  }
  if ('components' in value && value.components !== undefined && !Array.isArray(value.components)) {
    return false;
  }
  return true;
}

/** Errored measurement for a metric object that cannot be trusted to describe itself. */
export function brokenMetricMeasurement(metric: unknown, message: string): Measurement {
  const described = typeof metric === 'object' && metric !== null ? metric : undefined;
  const minimumScore = described && 'minimumScore' in described ? described.minimumScore : undefined;
  return erroredMeasurement({
    metricName: (described && nameOf(described)) ?? 'unnamed',
    minimumScore: isThreshold(minimumScore) ? minimumScore : 0,
    consumedFields: [],
    error: toMeasurementError(new MetricImplementationError(message))
  });
}

/**
 * Applies one metric to one test case and never throws for per-metric
 * failures: missing fields, bad scores, scorer exceptions and metrics that do
 * not honour the interface come back as an errored measurement. Required
 * fields are checked before `measure` is called.
 */
export async function evaluateMetric(metric: Metric, testCase: TestCase): Promise<Measurement> {
  const violation = metricContractViolation(metric);
  if (violation !== undefined) {
    return brokenMetricMeasurement(metric, violation);
  }

  const base = {
    metricName: metric.name,
    minimumScore: metric.minimumScore,
    consumedFields: metric.requiredFields
  };

  const missing = missingFields(testCase, metric.requiredFields);
  if (missing.length > 0) {
    const error = new ConfigurationError(
      `Metric "${metric.name}" requires ${missing.join(', ')}, missing from test case`,
      missing
    );
    return erroredMeasurement({ ...base, error: toMeasurementError(error) });
  }

  let measured: unknown;
  try {
    measured = await metric.measure(testCase);
  } catch (error) {
    return erroredMeasurement({ ...base, error: toMeasurementError(error) });
  }

  if (!isMeasurementShaped(measured)) {
    return erroredMeasurement({
      ...base,
      error: toMeasurementError(
        new MetricImplementationError(`Metric "${metric.name}" did not return a measurement`)
      )
    });
  }
  const result = measured;

  if (result.error) {
    return erroredMeasurement({
      ...base,
      consumedFields: result.consumedFields,
      error: result.error,
      components: result.components
    });
  }

  try {
    // Custom metrics are not trusted with the range or the success flag.
    return createMeasurement({
      metricName: metric.name,
      score: assertScoreInRange(metric.name, result.score),
      minimumScore: metric.minimumScore,
      consumedFields: result.consumedFields,
      components: result.components
    });
  } catch (error) {
    return erroredMeasurement({ ...base, error: toMeasurementError(error) });
  }
}

export function statusOf(measurements: readonly Measurement[]): FinalUnitStatus {
  if (measurements.some((m) => m.error !== undefined)) return 'errored';
  return measurements.every((m) => m.success) ? 'succeeded' : 'failed';
}

/** Evaluates every metric against the test case, in order, without raising. */
export async function runTest(testCase: TestCase, metrics: readonly Metric[]): Promise<TestResult> {
  const measurements: Measurement[] = [];
  for (const metric of metrics) {
    measurements.push(await evaluateMetric(metric, testCase));
  }
  const status = statusOf(measurements);
  return { testCase, status, measurements, success: status === 'succeeded' };
}

/** Like `runTest`, but throws an AssertionFailedError naming every unsuccessful metric. */
export async function assertTest(testCase: TestCase, metrics: readonly Metric[]): Promise<TestResult> {
  const result = await runTest(testCase, metrics);
  const failures = result.measurements.filter((m) => !m.success);
  if (failures.length > 0) {
    throw new AssertionFailedError(failures);
  }
  return result;
}
