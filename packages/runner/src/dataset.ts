import { datasetRecordSchema, type DatasetRecord } from '@evalgate/schemas';
import { createTestCase, type TestCase } from './testCase.js';

export type Responder = (record: DatasetRecord) => string | Promise<string>;

/**
 * Maps raw dataset records 1:1 onto test cases, producing each
 * `actualOutput` with `respond`. Records are answered one at a time and the
 * result keeps the record order.
 */
export async function testCasesFromRecords(
  records: readonly unknown[],
  respond: Responder
): Promise<TestCase[]> {
  const testCases: TestCase[] = [];
  for (const raw of records) {
    const record = datasetRecordSchema.parse(raw);
    const actualOutput = await respond(record);
    testCases.push(createTestCase({ ...record, actualOutput }));
  }
  return testCases;
}
