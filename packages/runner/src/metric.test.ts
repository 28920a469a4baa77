import { describe, expect, it, vi } from 'vitest';
import { ConfigurationError, MetricImplementationError, StateError } from './errors.js';
import { defineMetric, FunctionMetric } from './metric.js';
import { createTestCase } from './testCase.js';

const refundCase = createTestCase({
  input: "What if these shoes don't fit?",
  actualOutput: 'We offer a 30-day full refund at no extra cost.',
  context: ['All customers are eligible for a 30 day full refund at no extra cost.']
});

describe('BaseMetric', () => {
  it('passes when the score reaches the threshold', async () => {
    const metric = defineMetric({
      name: 'factual_consistency',
      minimumScore: 0.7,
      requiredFields: ['context'],
      score: () => 0.9
    });

    const measurement = await metric.measure(refundCase);

    expect(measurement.success).toBe(true);
    expect(measurement.score).toBe(0.9);
    expect(metric.isSuccessful()).toBe(true);
    expect(measurement.consumedFields).toEqual(['input', 'actualOutput', 'context']);
  });

  it('fails the same case under a stricter threshold', async () => {
    const metric = defineMetric({
      name: 'factual_consistency',
      minimumScore: 0.95,
      requiredFields: ['context'],
      score: () => 0.9
    });

    const measurement = await metric.measure(refundCase);

    expect(measurement.success).toBe(false);
    expect(metric.isSuccessful()).toBe(false);
  });

  it('treats a score equal to the threshold as success', async () => {
    for (const threshold of [0, 0.25, 0.5, 1]) {
      const metric = defineMetric({ name: 'boundary', minimumScore: threshold, score: () => threshold });
      expect((await metric.measure(refundCase)).success).toBe(true);
    }
  });

  it('defaults the threshold to 0.5', () => {
    expect(defineMetric({ name: 'default', score: () => 1 }).minimumScore).toBe(0.5);
  });

  it('rejects thresholds outside [0, 1]', () => {
    expect(() => defineMetric({ name: 'bad', minimumScore: 1.5, score: () => 1 })).toThrow(
      ConfigurationError
    );
  });

  it('validates required fields before scoring', async () => {
    const score = vi.fn(() => 1);
    const metric = defineMetric({ name: 'needs_expected', requiredFields: ['expectedOutput'], score });

    await expect(metric.measure(refundCase)).rejects.toBeInstanceOf(ConfigurationError);
    expect(score).not.toHaveBeenCalled();
  });

  it('reports which fields are missing', async () => {
    const metric = defineMetric({
      name: 'retrieval',
      requiredFields: ['expectedOutput', 'retrievalContext'],
      score: () => 1
    });

    const error = await metric.measure(refundCase).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof ConfigurationError && error.missingFields).toEqual([
      'expectedOutput',
      'retrievalContext'
    ]);
  });

  it('rejects scores outside [0, 1]', async () => {
    for (const bad of [1.2, -0.1, Number.NaN, Number.POSITIVE_INFINITY]) {
      const metric = defineMetric({ name: 'broken', score: () => bad });
      await expect(metric.measure(refundCase)).rejects.toBeInstanceOf(MetricImplementationError);
    }
  });

  it('wraps scorer exceptions as metric implementation errors', async () => {
    const metric = defineMetric({
      name: 'remote',
      score: async () => {
        throw new Error('connection reset');
      }
    });

    await expect(metric.measure(refundCase)).rejects.toThrow(
      'Metric "remote" failed while scoring: connection reset'
    );
  });

  it('throws a StateError when asked for success before measuring', () => {
    const metric = defineMetric({ name: 'fresh', score: () => 1 });
    expect(() => metric.isSuccessful()).toThrow(StateError);
    expect(metric.score).toBeUndefined();
  });

  it('returns frozen measurements', async () => {
    const metric = defineMetric({ name: 'frozen', score: () => 0.4 });
    const measurement = await metric.measure(refundCase);
    expect(Object.isFrozen(measurement)).toBe(true);
    expect(Object.isFrozen(measurement.consumedFields)).toBe(true);
  });

  it('clones without carrying measurement state', async () => {
    const metric = new FunctionMetric({ name: 'cloned', minimumScore: 0.3, score: () => 0.6 });
    await metric.measure(refundCase);

    const copy = metric.clone();

    expect(copy).not.toBe(metric);
    expect(copy.minimumScore).toBe(0.3);
    expect(copy.score).toBeUndefined();
    expect(() => copy.isSuccessful()).toThrow(StateError);
  });
});
