import { envConfigSchema, runConfigSchema, type RunConfig, type RunConfigInput } from '@evalgate/schemas';

export interface EnvSettings {
  resultsFolder?: string;
}

/** Reads the recognised environment settings. */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvSettings {
  const parsed = envConfigSchema.parse(env);
  return parsed.EVALGATE_RESULTS_FOLDER !== undefined
    ? { resultsFolder: parsed.EVALGATE_RESULTS_FOLDER }
    : {};
}

/** Explicit options win over the environment. */
export function resolveRunConfig(
  input: RunConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): RunConfig {
  const fromEnv = loadEnvConfig(env);
  return runConfigSchema.parse({
    ...input,
    resultsFolder: input.resultsFolder ?? fromEnv.resultsFolder
  });
}
