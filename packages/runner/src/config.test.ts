import { describe, expect, it } from 'vitest';
import { loadEnvConfig, resolveRunConfig } from './config.js';

describe('config', () => {
  it('reads the results folder from the environment', () => {
    expect(loadEnvConfig({ EVALGATE_RESULTS_FOLDER: '/tmp/results' })).toEqual({ resultsFolder: '/tmp/results' });
  });

  it('treats an absent or blank setting as no persistence', () => {
    expect(loadEnvConfig({})).toEqual({});
    expect(loadEnvConfig({ EVALGATE_RESULTS_FOLDER: '  ' })).toEqual({});
  });

  it('fills defaults and lets explicit options win', () => {
    expect(resolveRunConfig({}, {})).toEqual({ suiteName: 'default', workers: 1, hyperparameters: {} });
    expect(
      resolveRunConfig({ workers: 4, resultsFolder: 'explicit' }, { EVALGATE_RESULTS_FOLDER: 'from-env' })
    ).toEqual({ suiteName: 'default', workers: 4, resultsFolder: 'explicit', hyperparameters: {} });
    expect(resolveRunConfig({}, { EVALGATE_RESULTS_FOLDER: 'from-env' }).resultsFolder).toBe('from-env');
  });

  it('rejects a non-positive worker count', () => {
    expect(() => resolveRunConfig({ workers: 0 }, {})).toThrow();
  });
});
