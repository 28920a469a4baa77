import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import {
  evaluationFileSchema,
  testCaseSchema,
  type TestCaseInput
} from '@evalgate/schemas';
import { ConfigurationError } from './errors.js';
import { metricContractViolation } from './evaluate.js';
import type { Metric } from './metric.js';
import { createDefaultRegistry, type MetricRegistry } from './registry.js';
import { createTestCase, type TestCase } from './testCase.js';

export interface EvaluationSuite {
  name?: string;
  testCases: readonly TestCase[];
  metrics: readonly Metric[];
}

export function defineSuite(input: {
  name?: string;
  testCases: readonly (TestCase | TestCaseInput)[];
  metrics: readonly Metric[];
}): EvaluationSuite {
  return {
    ...(input.name !== undefined ? { name: input.name } : {}),
    testCases: input.testCases.map((testCase) =>
      Object.isFrozen(testCase) ? testCase : createTestCase(toInput(testCase))
    ),
    metrics: [...input.metrics]
  };
}

function toInput(testCase: TestCase | TestCaseInput): TestCaseInput {
  return testCaseSchema.parse(testCase);
}

function isMetric(value: unknown): value is Metric {
  return metricContractViolation(value) === undefined;
}

interface SuiteExport {
  name?: unknown;
  testCases: unknown[];
  metrics: unknown[];
}

function isSuiteExport(value: unknown): value is SuiteExport {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'testCases' in value &&
    Array.isArray(value.testCases) &&
    'metrics' in value &&
    Array.isArray(value.metrics)
  );
}

function suiteFromExport(path: string, exported: SuiteExport): EvaluationSuite {
  exported.metrics.forEach((metric, index) => {
    const violation = metricContractViolation(metric);
    if (violation !== undefined) {
      throw new ConfigurationError(`${path}: metric #${index} cannot be used. ${violation}`);
    }
  });
  return defineSuite({
    ...(typeof exported.name === 'string' ? { name: exported.name } : {}),
    testCases: exported.testCases.map((testCase) => testCaseSchema.parse(testCase)),
    metrics: exported.metrics.filter(isMetric)
  });
}

export function parseEvaluationFile(
  raw: unknown,
  registry: MetricRegistry = createDefaultRegistry()
): EvaluationSuite {
  const file = evaluationFileSchema.parse(raw);
  return {
    ...(file.suiteName !== undefined ? { name: file.suiteName } : {}),
    testCases: file.cases.map((testCase) => createTestCase(testCase)),
    metrics: file.metrics.map((spec) => registry.build(spec))
  };
}

/**
 * Loads an evaluation target. JSON files are declarative suites built through
 * the registry; anything else is imported as a module whose default (or
 * `suite`) export is an EvaluationSuite.
 */
export async function loadEvaluationFile(
  path: string,
  registry: MetricRegistry = createDefaultRegistry()
): Promise<EvaluationSuite> {
  const fullPath = resolve(path);

  if (extname(fullPath) === '.json') {
    const raw: unknown = JSON.parse(await readFile(fullPath, 'utf8'));
    return parseEvaluationFile(raw, registry);
  }

  const mod: unknown = await import(pathToFileURL(fullPath).href);
  const exported =
    typeof mod === 'object' && mod !== null
      ? 'default' in mod && isSuiteExport(mod.default)
        ? mod.default
        : 'suite' in mod && isSuiteExport(mod.suite)
          ? mod.suite
          : undefined
      : undefined;

  if (exported === undefined) {
    throw new Error(
      `${path} does not export an evaluation suite. Export one as default or as "suite" (see defineSuite).`
    );
  }

  return suiteFromExport(path, exported);
}
