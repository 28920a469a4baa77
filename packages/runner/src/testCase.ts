import { testCaseSchema, type TestCaseField, type TestCaseInput } from '@evalgate/schemas';

export interface TestCase {
  readonly input: string;
  readonly actualOutput: string;
  readonly expectedOutput?: string;
  readonly context?: readonly string[];
  readonly retrievalContext?: readonly string[];
}

export const TEST_CASE_FIELDS: readonly TestCaseField[] = [
  'input',
  'actualOutput',
  'expectedOutput',
  'context',
  'retrievalContext'
];

/**
 * Validates the raw record and returns a deeply frozen test case. Test cases
 * are shared read-only between workers.
 */
export function createTestCase(input: TestCaseInput): TestCase {
  const parsed = testCaseSchema.parse(input);
  const testCase: TestCase = {
    input: parsed.input,
    actualOutput: parsed.actualOutput,
    ...(parsed.expectedOutput !== undefined ? { expectedOutput: parsed.expectedOutput } : {}),
    ...(parsed.context !== undefined ? { context: Object.freeze([...parsed.context]) } : {}),
    ...(parsed.retrievalContext !== undefined
      ? { retrievalContext: Object.freeze([...parsed.retrievalContext]) }
      : {})
  };
  return Object.freeze(testCase);
}

export function hasField(testCase: TestCase, field: TestCaseField): boolean {
  return testCase[field] !== undefined;
}

export function missingFields(
  testCase: TestCase,
  fields: readonly TestCaseField[]
): TestCaseField[] {
  return fields.filter((field) => !hasField(testCase, field));
}

/** Plain, mutable copy suitable for serialisation into a report. */
export function toTestCaseRecord(testCase: TestCase): TestCaseInput {
  return {
    input: testCase.input,
    actualOutput: testCase.actualOutput,
    ...(testCase.expectedOutput !== undefined ? { expectedOutput: testCase.expectedOutput } : {}),
    ...(testCase.context !== undefined ? { context: [...testCase.context] } : {}),
    ...(testCase.retrievalContext !== undefined
      ? { retrievalContext: [...testCase.retrievalContext] }
      : {})
  };
}
