import { BaseMetric } from '../metric.js';
import type { TestCase } from '../testCase.js';

export interface ExactMatchOptions {
  name?: string;
  minimumScore?: number;
  caseSensitive?: boolean;
}

/** 1 when the trimmed output equals the expected output, 0 otherwise. */
export class ExactMatchMetric extends BaseMetric {
  private readonly options: ExactMatchOptions;

  constructor(options: ExactMatchOptions = {}) {
    super({
      name: options.name ?? 'exact_match',
      minimumScore: options.minimumScore,
      requiredFields: ['expectedOutput']
    });
    this.options = options;
  }

  protected computeScore(testCase: TestCase): number {
    const normalize = (text: string): string =>
      this.options.caseSensitive === false ? text.trim().toLowerCase() : text.trim();
    return normalize(testCase.actualOutput) === normalize(testCase.expectedOutput ?? '') ? 1 : 0;
  }

  clone(): ExactMatchMetric {
    return new ExactMatchMetric(this.options);
  }
}
