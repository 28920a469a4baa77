import { resolve } from 'node:path';
import {
  connectScorer,
  createDefaultRegistry,
  exitCodeFor,
  loadEvaluationFile,
  mcpToolFactory,
  runSuite,
  writeReport,
  type MetricRegistry,
  type RunObserver,
  type ScorerSession
} from '@evalgate/runner';
import type { Hyperparameters, McpTransportConfigInput } from '@evalgate/schemas';

export interface ScorerOptions {
  serverName: string;
  dryRun: boolean;
  transport?: McpTransportConfigInput;
}

export interface RunCommandOptions {
  workers: number;
  suite?: string;
  out?: string;
  hyperparameters?: Hyperparameters;
  /** Connects an MCP scorer and makes `mcp_tool` metrics available to JSON suites. */
  scorer?: ScorerOptions;
  registry?: MetricRegistry;
  observers?: readonly RunObserver[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface RunCommandResult {
  exitCode: number;
  reportPaths: string[];
}

/** Loads the target, runs it and writes the report(s). Exit code 0 iff all passed. */
export async function runCommand(target: string, options: RunCommandOptions): Promise<RunCommandResult> {
  const cwd = options.cwd ?? process.cwd();
  let registry = options.registry ?? createDefaultRegistry();

  let session: ScorerSession | undefined;
  if (options.scorer !== undefined) {
    session = await connectScorer(options.scorer.serverName, options.scorer.dryRun, options.scorer.transport);
    // scoped to this run: the session is closed when it ends
    registry = registry.copy().register('mcp_tool', mcpToolFactory(session));
  }

  try {
    const suite = await loadEvaluationFile(resolve(cwd, target), registry);

    const { report, persistedTo } = await runSuite(suite, {
      suiteName: options.suite,
      workers: options.workers,
      hyperparameters: options.hyperparameters,
      observers: options.observers,
      env: options.env
    });

    const reportPaths = persistedTo !== undefined ? [persistedTo] : [];
    if (options.out !== undefined) {
      const outPath = resolve(cwd, options.out);
      writeReport(report, outPath);
      reportPaths.push(outPath);
    }

    return { exitCode: exitCodeFor(report), reportPaths };
  } finally {
    await session?.close();
  }
}
