// A plain-object metric that never declares its threshold or required fields.
export const suite = {
  name: 'undeclared',
  testCases: [{ input: 'Greet the user', actualOutput: 'Hello there!' }],
  metrics: [
    {
      name: 'bare',
      measure: async () => ({ metricName: 'bare', score: 1, minimumScore: 0.5, success: true, consumedFields: [] }),
      isSuccessful: () => true,
      clone() {
        return this;
      }
    }
  ]
};
