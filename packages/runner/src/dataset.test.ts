import { describe, expect, it } from 'vitest';
import { testCasesFromRecords } from './dataset.js';

describe('testCasesFromRecords', () => {
  it('maps records 1:1, in order, answering each input', async () => {
    const records = [
      { input: 'What is 2 + 2?', expectedOutput: '4' },
      { input: 'Name a primary colour', context: ['red', 'yellow', 'blue'] }
    ];

    const testCases = await testCasesFromRecords(records, async (record) => `answer to ${record.input}`);

    expect(testCases).toEqual([
      { input: 'What is 2 + 2?', actualOutput: 'answer to What is 2 + 2?', expectedOutput: '4' },
      {
        input: 'Name a primary colour',
        actualOutput: 'answer to Name a primary colour',
        context: ['red', 'yellow', 'blue']
      }
    ]);
    expect(Object.isFrozen(testCases[1].context)).toBe(true);
  });

  it('rejects malformed records', async () => {
    await expect(testCasesFromRecords([{ prompt: 'missing input' }], () => 'x')).rejects.toThrow();
  });
});
