import { Chalk } from 'chalk';
import { createTestCase, defineMetric, TestRunner } from '@evalgate/runner';
import { describe, expect, it } from 'vitest';
import { ConsoleReporter } from './reporter.js';

describe('ConsoleReporter', () => {
  it('prints each unit and the verdict', async () => {
    const lines: string[] = [];
    const reporter = new ConsoleReporter((line) => lines.push(line), new Chalk({ level: 0 }));
    const runner = new TestRunner({ suiteName: 'demo', observers: [reporter] });

    await runner.runCases(
      [
        createTestCase({ input: 'first question', actualOutput: 'answer' }),
        createTestCase({ input: 'second question', actualOutput: 'answer' })
      ],
      [
        defineMetric({ name: 'quality', minimumScore: 0.5, score: (tc) => (tc.input.startsWith('first') ? 0.75 : 0.25) }),
        defineMetric({ name: 'grounded', requiredFields: ['context'], score: () => 1 })
      ]
    );

    expect(lines).toEqual([
      'Running 2 test case(s) of "demo" on 1 worker(s)',
      'ERRORED   #0 first question',
      '    quality: score 0.750 (minimum 0.5)',
      '    grounded: Metric "grounded" requires context, missing from test case',
      'ERRORED   #1 second question',
      '    quality: score 0.250 (minimum 0.5)',
      '    grounded: Metric "grounded" requires context, missing from test case',
      '2 total, 0 passed, 0 failed, 2 errored',
      'Some tests failed'
    ]);
  });
});
