import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { z } from 'zod';
import {
  mcpTransportConfigSchema,
  testCaseFieldSchema,
  type McpTransportConfig,
  type McpTransportConfigInput,
  type TestCaseField
} from '@evalgate/schemas';
import { ConfigurationError, MetricImplementationError } from './errors.js';
import { BaseMetric } from './metric.js';
import type { MetricFactory } from './registry.js';
import type { TestCase } from './testCase.js';

/** A connection to an MCP server that exposes scoring tools. */
export interface ScorerSession {
  readonly serverName: string;
  readonly availableTools: ReadonlySet<string>;
  score(toolName: string, args: Record<string, unknown>): Promise<number>;
  close(): Promise<void>;
}

const toolResultSchema = z.object({
  isError: z.boolean().optional(),
  structuredContent: z.record(z.unknown()).optional(),
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }).passthrough())
    .default([])
});

const scorePayloadSchema = z.union([z.number(), z.object({ score: z.number() }).passthrough()]);

/**
 * Reads a score from a tool result: `structuredContent.score`, or the first
 * text block holding either a bare number or JSON with a `score` field.
 */
export function parseScoreResult(toolName: string, result: unknown): number {
  const parsed = toolResultSchema.safeParse(result);
  if (!parsed.success) {
    throw new MetricImplementationError(`Tool "${toolName}" returned an unrecognised result`);
  }

  const text = parsed.data.content.find((block) => block.type === 'text')?.text;
  if (parsed.data.isError) {
    throw new MetricImplementationError(`Tool "${toolName}" failed: ${text ?? 'no details'}`);
  }

  const structured = parsed.data.structuredContent?.score;
  if (typeof structured === 'number') {
    return structured;
  }

  if (text !== undefined) {
    const trimmed = text.trim();
    const asNumber = Number(trimmed);
    if (trimmed !== '' && Number.isFinite(asNumber)) {
      return asNumber;
    }
    try {
      const payload = scorePayloadSchema.safeParse(JSON.parse(trimmed));
      if (payload.success) {
        return typeof payload.data === 'number' ? payload.data : payload.data.score;
      }
    } catch (error) {
      throw new MetricImplementationError(`Tool "${toolName}" returned a non-numeric score: ${trimmed}`, {
        cause: error
      });
    }
  }

  throw new MetricImplementationError(`Tool "${toolName}" returned no score`);
}

// ─── Dry-run stub ─────────────────────────────────────────────────────────────

export function makeDryRunSession(serverName: string, fixedScore = 1): ScorerSession {
  return {
    serverName,
    availableTools: new Set<string>(),
    async score(_toolName: string, _args: Record<string, unknown>) {
      return fixedScore;
    },
    async close() {
      // no-op
    }
  };
}

// ─── Live session ─────────────────────────────────────────────────────────────

export async function openScorerSession(serverName: string, transport: Transport): Promise<ScorerSession> {
  const client = new Client({ name: 'evalgate', version: '0.1.0' }, { capabilities: {} });

  await client.connect(transport);

  const toolsResult = await client.listTools();
  const availableTools = new Set(toolsResult.tools.map((tool) => tool.name));

  return {
    serverName,
    availableTools,
    async score(toolName: string, args: Record<string, unknown>) {
      if (!availableTools.has(toolName)) {
        throw new MetricImplementationError(
          `MCP server "${serverName}" has no tool named "${toolName}"`
        );
      }
      const result = await client.callTool({ name: toolName, arguments: args });
      return parseScoreResult(toolName, result);
    },
    async close() {
      await client.close();
    }
  };
}

function createTransport(transportConfig: McpTransportConfig): Transport {
  if (transportConfig.type === 'stdio') {
    return new StdioClientTransport({
      command: transportConfig.command,
      args: transportConfig.args
    });
  }
  if (transportConfig.type === 'sse') {
    return new SSEClientTransport(new URL(transportConfig.url));
  }
  return new StreamableHTTPClientTransport(new URL(transportConfig.url));
}

// ─── Public API ───────────────────────────────────────────────────────────────

export async function connectScorer(
  serverName: string,
  dryRun: boolean,
  transportConfig?: McpTransportConfigInput
): Promise<ScorerSession> {
  if (dryRun) {
    return makeDryRunSession(serverName);
  }

  if (transportConfig === undefined) {
    throw new Error(
      'A live MCP scorer needs a transport configuration. ' +
        'Use dry-run for offline evaluation, or provide a stdio command or an SSE / streamable-http URL.'
    );
  }

  return openScorerSession(serverName, createTransport(mcpTransportConfigSchema.parse(transportConfig)));
}

export interface McpToolMetricOptions {
  name?: string;
  minimumScore?: number;
  requiredFields?: readonly TestCaseField[];
  toolName: string;
  session: ScorerSession;
}

/**
 * Delegates scoring to a tool on an MCP server. The tool receives the fields
 * the metric requires, by name, and must answer with a score in [0, 1].
 */
export class McpToolMetric extends BaseMetric {
  private readonly options: McpToolMetricOptions;

  constructor(options: McpToolMetricOptions) {
    super({
      name: options.name ?? options.toolName,
      minimumScore: options.minimumScore,
      requiredFields: options.requiredFields
    });
    this.options = options;
  }

  protected computeScore(testCase: TestCase): Promise<number> {
    const args: Record<string, unknown> = {};
    for (const field of this.requiredFields) {
      const value = testCase[field];
      args[field] = typeof value === 'string' ? value : value === undefined ? undefined : [...value];
    }
    return this.options.session.score(this.options.toolName, args);
  }

  // Sessions multiplex concurrent requests, so clones share one.
  clone(): McpToolMetric {
    return new McpToolMetric(this.options);
  }
}

const mcpToolOptionsSchema = z
  .object({
    tool: z.string().min(1),
    requiredFields: z.array(testCaseFieldSchema).optional()
  })
  .strict();

/** Registry factory for `{ "metric": "mcp_tool", "options": { "tool": ... } }` specs. */
export function mcpToolFactory(session: ScorerSession): MetricFactory {
  return ({ name, minimumScore, options }) => {
    const parsed = mcpToolOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Invalid options for metric "mcp_tool": ${parsed.error.issues.map((i) => i.message).join('; ')}`
      );
    }
    return new McpToolMetric({
      name,
      minimumScore,
      toolName: parsed.data.tool,
      requiredFields: parsed.data.requiredFields,
      session
    });
  };
}
