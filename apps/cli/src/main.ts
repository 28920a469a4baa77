#!/usr/bin/env node
import { config as loadDotenv } from 'dotenv';
import { Command } from 'commander';
import { buildTransportConfig, collectHyperparameter, parseWorkers } from './options.js';
import { ConsoleReporter } from './reporter.js';
import { runCommand } from './run.js';

loadDotenv();

interface RunFlags {
  workers: number;
  suite?: string;
  out?: string;
  hyperparameter?: Record<string, string | number | boolean>;
  scorer?: string;
  dryRunScorer: boolean;
  transport?: string;
  mcpCommand?: string;
  mcpArgs?: string;
  mcpUrl?: string;
}

const program = new Command();

program
  .name('evalgate')
  .description('Turn metric scores on generated text into pass/fail test results');

program
  .command('run')
  .description('Run an evaluation file (.json suite, or a module exporting a suite)')
  .argument('<file>', 'evaluation file')
  .option('-n, --workers <count>', 'number of parallel workers', parseWorkers, 1)
  .option('--suite <name>', 'suite name used in the run id and report')
  .option('--out <path>', 'also write the JSON report to this path')
  .option('--hyperparameter <key=value>', 'record a hyperparameter with the run (repeatable)', collectHyperparameter)
  .option('--scorer <name>', 'MCP scorer server identifier', 'mcp-scorer')
  .option('--dry-run-scorer', 'answer mcp_tool metrics with a fixed score instead of a live server', false)
  .option('--transport <type>', 'MCP transport type: stdio | sse | streamable-http')
  .option('--mcp-command <cmd>', 'command to launch the MCP scorer (stdio transport)')
  .option('--mcp-args <args>', 'space-separated arguments for the MCP scorer command')
  .option('--mcp-url <url>', 'URL of a running MCP scorer (sse or streamable-http transport)')
  .action(async (file: string, options: RunFlags) => {
    const transport = buildTransportConfig(options);
    const useScorer = options.dryRunScorer || transport !== undefined;

    const result = await runCommand(file, {
      workers: options.workers,
      suite: options.suite,
      out: options.out,
      hyperparameters: options.hyperparameter,
      scorer: useScorer
        ? { serverName: options.scorer ?? 'mcp-scorer', dryRun: options.dryRunScorer, transport }
        : undefined,
      observers: [new ConsoleReporter()]
    });

    for (const path of result.reportPaths) {
      console.log(`Report written to ${path}`);
    }
    process.exitCode = result.exitCode;
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
