import { describe, expect, it } from 'vitest';
import {
  envConfigSchema,
  evaluationFileSchema,
  measurementSchema,
  runConfigSchema,
  runTraceEventSchema,
  testCaseSchema
} from './index.js';

describe('schemas', () => {
  it('requires input and actualOutput on a test case', () => {
    expect(testCaseSchema.safeParse({ input: 'q', actualOutput: 'a' }).success).toBe(true);
    expect(testCaseSchema.safeParse({ input: 'q' }).success).toBe(false);
    expect(testCaseSchema.safeParse({ input: 'q', actualOutput: 'a', context: 'not a list' }).success).toBe(false);
  });

  it('accepts nested measurements and rejects out-of-range scores', () => {
    const composite = {
      metricName: 'rag',
      score: 0,
      minimumScore: 0.5,
      success: false,
      consumedFields: ['input', 'actualOutput', 'context'],
      error: { kind: 'metric_implementation', message: 'Sub-metric "x" errored' },
      components: [
        { metricName: 'x', score: 0, minimumScore: 0.5, success: false, consumedFields: ['input'] }
      ]
    };
    expect(measurementSchema.safeParse(composite).success).toBe(true);
    expect(measurementSchema.safeParse({ ...composite, score: 1.01 }).success).toBe(false);
  });

  it('applies run config defaults', () => {
    expect(runConfigSchema.parse({})).toEqual({ suiteName: 'default', workers: 1, hyperparameters: {} });
    expect(runConfigSchema.safeParse({ workers: 1.5 }).success).toBe(false);
  });

  it('blanks out an empty results folder setting', () => {
    expect(envConfigSchema.parse({ EVALGATE_RESULTS_FOLDER: '' }).EVALGATE_RESULTS_FOLDER).toBeUndefined();
  });

  it('parses recursive metric specs in evaluation files', () => {
    const parsed = evaluationFileSchema.parse({
      schemaVersion: '0.1.0',
      metrics: [{ metric: 'composite', metrics: [{ metric: 'exact_match', minimumScore: 1 }] }],
      cases: [{ input: 'q', actualOutput: 'a' }]
    });
    expect(parsed.metrics[0].metrics?.[0]).toEqual({ metric: 'exact_match', minimumScore: 1 });
    expect(
      evaluationFileSchema.safeParse({ schemaVersion: '0.2.0', metrics: [{ metric: 'x' }], cases: [] }).success
    ).toBe(false);
  });

  it('discriminates trace events by type', () => {
    const event = runTraceEventSchema.parse({
      type: 'unit_finished',
      timestamp: '2026-01-01T00:00:00.000Z',
      index: 3,
      status: 'errored'
    });
    expect(event.type).toBe('unit_finished');
    expect(
      runTraceEventSchema.safeParse({ type: 'unit_finished', timestamp: 'yesterday', index: 3, status: 'errored' })
        .success
    ).toBe(false);
  });
});
