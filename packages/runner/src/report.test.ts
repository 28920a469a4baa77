import { mkdtempSync, readdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { defineMetric } from './metric.js';
import { exitCodeFor, loadReport, persistReport, reportFileName, writeReport } from './report.js';
import { createTestCase } from './testCase.js';
import { TestRunner } from './testRunner.js';

const now = () => new Date('2026-03-04T05:06:07.000Z');
const testCases = [
  createTestCase({ input: 'one', actualOutput: 'first', context: ['a', 'b'] }),
  createTestCase({ input: 'two', actualOutput: 'second' })
];

describe('report', () => {
  const dirs: string[] = [];
  function tempDir(): string {
    const dir = mkdtempSync(join(tmpdir(), 'evalgate-report-'));
    dirs.push(dir);
    return dir;
  }

  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });

  it('maps allPassed onto the exit code', async () => {
    const pass = await new TestRunner({ now }).runCases(testCases, [defineMetric({ name: 'ok', score: () => 1 })]);
    const fail = await new TestRunner({ now }).runCases(testCases, [
      defineMetric({ name: 'half', minimumScore: 0.6, score: () => 0.5 })
    ]);

    expect(exitCodeFor(pass)).toBe(0);
    expect(exitCodeFor(fail)).toBe(1);
  });

  it('uses a filesystem-safe file name', async () => {
    const report = await new TestRunner({ now, suiteName: 'nightly run' }).runCases(testCases, []);
    expect(reportFileName(report)).toBe('2026-03-04T05-06-07.000Z_nightly-run.json');
  });

  it('persists into a results folder and reads it back', async () => {
    const report = await new TestRunner({ now, suiteName: 'persist' }).runCases(testCases, [
      defineMetric({ name: 'ok', score: () => 0.7 })
    ]);
    const folder = join(tempDir(), 'nested', 'results');

    const path = persistReport(report, folder);

    expect(readdirSync(folder)).toEqual(['2026-03-04T05-06-07.000Z_persist.json']);
    expect(loadReport(path)).toEqual(report);
  });

  it('writes to an explicit path', async () => {
    const report = await new TestRunner({ now }).runCases(testCases.slice(0, 1), []);
    const path = join(tempDir(), 'out', 'report.json');

    writeReport(report, path);

    expect(loadReport(path).results[0].testCase).toEqual({ input: 'one', actualOutput: 'first', context: ['a', 'b'] });
  });

  it('treats a run without metrics as passed', async () => {
    const report = await new TestRunner({ now }).runCases(testCases, []);
    expect(report.allPassed).toBe(true);
    expect(report.summary).toEqual({ total: 2, succeeded: 2, failed: 0, errored: 0 });
  });
});
