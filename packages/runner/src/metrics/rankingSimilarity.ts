import { AssertionFailedError, ConfigurationError } from '../errors.js';
import { createMeasurement } from '../measurement.js';
import { BaseMetric, checkMinimumScore } from '../metric.js';
import type { TestCase } from '../testCase.js';

export type RankedItem = string | { readonly text: string };

export const DEFAULT_PERSISTENCE = 1;

function validPersistence(persistence: number): boolean {
  return persistence > 0 && persistence <= 1;
}

function keyOf(item: RankedItem): string {
  return typeof item === 'string' ? item : item.text;
}

/**
 * Extrapolated rank-biased overlap of two rankings. `persistence` (p) weights
 * the head of the lists: smaller values care more about the top ranks. At
 * p = 1 the score is the overlap of the full lists, so `[a, b]` against
 * `[b, c]` scores 0.5. Identical rankings score 1, disjoint ones 0.
 */
export function rankingSimilarity(
  reference: readonly RankedItem[],
  candidate: readonly RankedItem[],
  persistence: number = DEFAULT_PERSISTENCE
): number {
  if (!validPersistence(persistence)) {
    throw new RangeError(`persistence must be in (0, 1], got ${persistence}`);
  }
  const depth = Math.max(reference.length, candidate.length);
  if (depth === 0) return 1;
  if (reference.length === 0 || candidate.length === 0) return 0;

  const seenReference = new Set<string>();
  const seenCandidate = new Set<string>();
  let overlap = 0;
  let weighted = 0;

  for (let d = 1; d <= depth; d++) {
    const left = d <= reference.length ? keyOf(reference[d - 1]) : undefined;
    const right = d <= candidate.length ? keyOf(candidate[d - 1]) : undefined;

    if (left !== undefined && !seenReference.has(left)) {
      seenReference.add(left);
      if (seenCandidate.has(left)) overlap++;
    }
    if (right !== undefined && !seenCandidate.has(right)) {
      seenCandidate.add(right);
      if (seenReference.has(right)) overlap++;
    }

    weighted += (overlap / d) * persistence ** d;
  }

  const value = (overlap / depth) * persistence ** depth + ((1 - persistence) / persistence) * weighted;
  // float error can push identical rankings a hair past 1
  return Math.min(1, Math.max(0, value));
}

/** Throws an AssertionFailedError when the rankings are less similar than `minimumScore`. */
export function assertRankingSimilarity(
  reference: readonly RankedItem[],
  candidate: readonly RankedItem[],
  minimumScore: number,
  persistence: number = DEFAULT_PERSISTENCE
): number {
  checkMinimumScore('ranking_similarity', minimumScore);
  const measurement = createMeasurement({
    metricName: 'ranking_similarity',
    score: rankingSimilarity(reference, candidate, persistence),
    minimumScore,
    consumedFields: []
  });
  if (!measurement.success) {
    throw new AssertionFailedError([measurement]);
  }
  return measurement.score;
}

export interface RankingSimilarityOptions {
  name?: string;
  minimumScore?: number;
  persistence?: number;
}

/** Compares the order of `retrievalContext` against the reference `context`. */
export class RankingSimilarityMetric extends BaseMetric {
  private readonly options: RankingSimilarityOptions;

  constructor(options: RankingSimilarityOptions = {}) {
    super({
      name: options.name ?? 'ranking_similarity',
      minimumScore: options.minimumScore,
      requiredFields: ['context', 'retrievalContext']
    });
    const { persistence } = options;
    if (persistence !== undefined && !validPersistence(persistence)) {
      throw new ConfigurationError(`Metric "${this.name}" has persistence ${persistence}; it must be in (0, 1]`);
    }
    this.options = options;
  }

  protected computeScore(testCase: TestCase): number {
    return rankingSimilarity(
      testCase.context ?? [],
      testCase.retrievalContext ?? [],
      this.options.persistence
    );
  }

  clone(): RankingSimilarityMetric {
    return new RankingSimilarityMetric(this.options);
  }
}
