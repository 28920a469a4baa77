import type { Measurement, MeasurementError, TestCaseField } from '@evalgate/schemas';

export type EvalErrorCode = 'configuration' | 'metric_implementation' | 'state' | 'assertion';

export class EvalError extends Error {
  readonly code: EvalErrorCode;

  constructor(code: EvalErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A metric was applied to a test case that lacks one of its required fields. */
export class ConfigurationError extends EvalError {
  readonly missingFields: TestCaseField[];

  constructor(message: string, missingFields: TestCaseField[] = []) {
    super('configuration', message);
    this.missingFields = missingFields;
  }
}

/**
 * A scoring function returned a value outside [0, 1] or threw. Failures of
 * remote scorers (network, model calls) surface as this error too.
 */
export class MetricImplementationError extends EvalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('metric_implementation', message, options);
  }
}

export class StateError extends EvalError {
  constructor(message: string) {
    super('state', message);
  }
}

export class AssertionFailedError extends EvalError {
  readonly failures: Measurement[];

  constructor(failures: Measurement[]) {
    super('assertion', describeFailures(failures));
    this.failures = failures;
  }
}

function describeFailures(failures: Measurement[]): string {
  const lines = failures.map((m) =>
    m.error
      ? `${m.metricName}: errored (${m.error.message})`
      : `${m.metricName}: score ${m.score} is below minimum ${m.minimumScore}`
  );
  return `Metrics not successful:\n${lines.map((line) => `  - ${line}`).join('\n')}`;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toMeasurementError(error: unknown): MeasurementError {
  if (error instanceof ConfigurationError) {
    return { kind: 'configuration', message: error.message };
  }
  return { kind: 'metric_implementation', message: errorMessage(error) };
}
