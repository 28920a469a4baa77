import { InvalidArgumentError } from 'commander';
import type { Hyperparameters, McpTransportConfigInput } from '@evalgate/schemas';

export function parseWorkers(value: string): number {
  const workers = Number(value);
  if (!Number.isInteger(workers) || workers < 1) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return workers;
}

/** Collects repeated `key=value` flags. Numbers and booleans are recognised. */
export function collectHyperparameter(value: string, previous: Hyperparameters = {}): Hyperparameters {
  const separator = value.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError('expected key=value');
  }
  const key = value.slice(0, separator).trim();
  const raw = value.slice(separator + 1).trim();
  let parsed: string | number | boolean = raw;
  if (raw === 'true' || raw === 'false') {
    parsed = raw === 'true';
  } else if (raw !== '' && Number.isFinite(Number(raw))) {
    parsed = Number(raw);
  }
  return { ...previous, [key]: parsed };
}

export interface ScorerFlags {
  transport?: string;
  mcpCommand?: string;
  mcpArgs?: string;
  mcpUrl?: string;
}

/** Turns the scorer flags into a transport configuration, or undefined when none were given. */
export function buildTransportConfig(options: ScorerFlags): McpTransportConfigInput | undefined {
  if (options.transport === undefined && options.mcpCommand === undefined && options.mcpUrl === undefined) {
    return undefined;
  }

  const transportType = options.transport ?? (options.mcpUrl !== undefined ? 'streamable-http' : 'stdio');

  if (transportType === 'stdio') {
    if (!options.mcpCommand) {
      throw new InvalidArgumentError('stdio transport requires --mcp-command <cmd>.');
    }
    const args = options.mcpArgs ? options.mcpArgs.split(' ').filter((arg) => arg !== '') : [];
    return { type: 'stdio', command: options.mcpCommand, args };
  }

  if (transportType === 'sse' || transportType === 'streamable-http') {
    if (!options.mcpUrl) {
      throw new InvalidArgumentError(`${transportType} transport requires --mcp-url <url>.`);
    }
    return { type: transportType, url: options.mcpUrl };
  }

  throw new InvalidArgumentError(
    `Unknown transport type: ${transportType}. Valid values: stdio, sse, streamable-http`
  );
}
