import { z } from 'zod';

// ─── Test cases ───────────────────────────────────────────────────────────────

export const testCaseFieldSchema = z.enum([
  'input',
  'actualOutput',
  'expectedOutput',
  'context',
  'retrievalContext'
]);

export const testCaseSchema = z.object({
  input: z.string(),
  actualOutput: z.string(),
  expectedOutput: z.string().optional(),
  // reference ground truth
  context: z.array(z.string()).optional(),
  // what the retrieval step actually returned
  retrievalContext: z.array(z.string()).optional()
});

export const datasetRecordSchema = z.object({
  input: z.string(),
  expectedOutput: z.string().optional(),
  context: z.array(z.string()).optional()
});

// ─── Measurements ─────────────────────────────────────────────────────────────

export const measurementErrorKindSchema = z.enum(['configuration', 'metric_implementation']);

export const measurementErrorSchema = z.object({
  kind: measurementErrorKindSchema,
  message: z.string()
});

export interface Measurement {
  metricName: string;
  score: number;
  minimumScore: number;
  success: boolean;
  consumedFields: TestCaseField[];
  error?: MeasurementError;
  components?: Measurement[];
}

export const measurementSchema: z.ZodType<Measurement> = z.lazy(() =>
  z.object({
    metricName: z.string().min(1),
    score: z.number().min(0).max(1),
    minimumScore: z.number().min(0).max(1),
    success: z.boolean(),
    consumedFields: z.array(testCaseFieldSchema),
    error: measurementErrorSchema.optional(),
    components: z.array(measurementSchema).optional()
  })
);

export const unitStatusSchema = z.enum(['pending', 'running', 'succeeded', 'failed', 'errored']);

export const finalUnitStatusSchema = z.enum(['succeeded', 'failed', 'errored']);

// ─── Evaluation files ─────────────────────────────────────────────────────────

export interface MetricSpec {
  metric: string;
  name?: string;
  minimumScore?: number;
  options?: Record<string, unknown>;
  metrics?: MetricSpec[];
}

export const metricSpecSchema: z.ZodType<MetricSpec> = z.lazy(() =>
  z.object({
    metric: z.string().min(1),
    name: z.string().min(1).optional(),
    minimumScore: z.number().min(0).max(1).optional(),
    options: z.record(z.unknown()).optional(),
    metrics: z.array(metricSpecSchema).min(1).optional()
  })
);

export const evaluationFileSchema = z.object({
  schemaVersion: z.literal('0.1.0'),
  suiteName: z.string().min(1).optional(),
  metrics: z.array(metricSpecSchema).min(1),
  cases: z.array(testCaseSchema).min(1)
});

// ─── MCP scorer transport configuration ──────────────────────────────────────

export const mcpTransportConfigSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('stdio'),
    command: z.string().min(1),
    args: z.array(z.string()).default([])
  }),
  z.object({
    type: z.literal('sse'),
    url: z.string().url()
  }),
  z.object({
    type: z.literal('streamable-http'),
    url: z.string().url()
  })
]);

// ─── Run configuration ────────────────────────────────────────────────────────

export const hyperparametersSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export const runConfigSchema = z.object({
  suiteName: z.string().min(1).default('default'),
  workers: z.number().int().min(1).default(1),
  resultsFolder: z.string().min(1).optional(),
  hyperparameters: hyperparametersSchema.default({})
});

export const envConfigSchema = z.object({
  EVALGATE_RESULTS_FOLDER: z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? undefined : value))
});

// ─── Run trace events ─────────────────────────────────────────────────────────

export const runSummarySchema = z.object({
  total: z.number().int().min(0),
  succeeded: z.number().int().min(0),
  failed: z.number().int().min(0),
  errored: z.number().int().min(0)
});

export const runTraceEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('run_started'),
    timestamp: z.string().datetime(),
    runId: z.string(),
    suiteName: z.string(),
    workers: z.number().int().min(1),
    totalUnits: z.number().int().min(0),
    hyperparameters: hyperparametersSchema
  }),
  z.object({
    type: z.literal('unit_started'),
    timestamp: z.string().datetime(),
    index: z.number().int().min(0)
  }),
  z.object({
    type: z.literal('metric_result'),
    timestamp: z.string().datetime(),
    index: z.number().int().min(0),
    metricName: z.string(),
    score: z.number(),
    success: z.boolean(),
    errorMessage: z.string().optional()
  }),
  z.object({
    type: z.literal('unit_finished'),
    timestamp: z.string().datetime(),
    index: z.number().int().min(0),
    status: finalUnitStatusSchema
  }),
  z.object({
    type: z.literal('run_finished'),
    timestamp: z.string().datetime(),
    allPassed: z.boolean(),
    summary: runSummarySchema
  })
]);

// ─── Reports ──────────────────────────────────────────────────────────────────

export const unitResultSchema = z.object({
  index: z.number().int().min(0),
  testCase: testCaseSchema,
  status: finalUnitStatusSchema,
  measurements: z.array(measurementSchema)
});

export const runReportSchema = z.object({
  runId: z.string().min(1),
  suiteName: z.string().min(1),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  workers: z.number().int().min(1),
  hyperparameters: hyperparametersSchema,
  allPassed: z.boolean(),
  summary: runSummarySchema,
  results: z.array(unitResultSchema)
});

export type TestCaseField = z.infer<typeof testCaseFieldSchema>;
export type TestCaseInput = z.infer<typeof testCaseSchema>;
export type DatasetRecord = z.infer<typeof datasetRecordSchema>;
export type MeasurementErrorKind = z.infer<typeof measurementErrorKindSchema>;
export type MeasurementError = z.infer<typeof measurementErrorSchema>;
export type UnitStatus = z.infer<typeof unitStatusSchema>;
export type FinalUnitStatus = z.infer<typeof finalUnitStatusSchema>;
export type EvaluationFile = z.infer<typeof evaluationFileSchema>;
export type McpTransportConfig = z.infer<typeof mcpTransportConfigSchema>;
export type McpTransportConfigInput = z.input<typeof mcpTransportConfigSchema>;
export type Hyperparameters = z.infer<typeof hyperparametersSchema>;
export type RunConfig = z.infer<typeof runConfigSchema>;
export type RunConfigInput = z.input<typeof runConfigSchema>;
export type EnvConfig = z.infer<typeof envConfigSchema>;
export type RunSummary = z.infer<typeof runSummarySchema>;
export type RunTraceEvent = z.infer<typeof runTraceEventSchema>;
export type UnitResult = z.infer<typeof unitResultSchema>;
export type RunReport = z.infer<typeof runReportSchema>;
