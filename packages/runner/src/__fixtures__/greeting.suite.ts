import { defineMetric } from '../metric.js';
import { defineSuite } from '../suite.js';

export default defineSuite({
  name: 'greeting',
  testCases: [
    { input: 'Greet the user', actualOutput: 'Hello there!' },
    { input: 'Greet the user politely', actualOutput: 'hey' }
  ],
  metrics: [
    defineMetric({
      name: 'greets',
      minimumScore: 1,
      score: (testCase) => (/hello/i.test(testCase.actualOutput) ? 1 : 0)
    })
  ]
});
