/**
 * Tests for experiment configuration
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  applyTestSize,
  configuredModels,
  defaultExperimentConfig,
  loadExperimentConfig,
  mergeExperimentConfig
} from '../../ranking/config';
import { ConfigurationError } from '../../shared/errors/types';

describe('Experiment Configuration', () => {
  beforeEach(() => {
    vi.stubEnv('RANK_RESULTS_DIR', '');
    vi.stubEnv('RANK_MAX_RETRIES', '');
    vi.stubEnv('RANK_RETRY_DELAY_MS', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should default to every pipeline and one model per provider', () => {
    const config = mergeExperimentConfig();

    expect(config).toEqual(defaultExperimentConfig());
    expect(config.pipelines).toEqual(['one_shot', 'chain_of_thought', 'multi_layer', 'decomposed_algorithmic']);
    expect(config.retry).toEqual({ maxRetries: 2, delayMs: 500 });
    expect(config.criteria.map(c => c.key)).toEqual(['zero_to_one', 'technical_t_shape', 'recruitment_mastery']);
    expect(config.blind).toBe(false);
  });

  it('should lay file settings over the defaults', () => {
    const config = mergeExperimentConfig({
      providers: { openai: { models: ['gpt-a', 'gpt-b'], temperature: 0.2 } },
      pipelines: { multi_layer: { enabled: false } },
      retry: { maxRetries: 1 },
      blind: true
    });

    expect(config.providers.openai).toEqual({ models: ['gpt-a', 'gpt-b'], temperature: 0.2, maxTokens: undefined });
    expect(config.providers.anthropic.models).toEqual(['claude-3-5-sonnet-20240620']);
    expect(config.pipelines).toEqual(['one_shot', 'chain_of_thought', 'decomposed_algorithmic']);
    expect(config.retry).toEqual({ maxRetries: 1, delayMs: 500 });
    expect(config.blind).toBe(true);
  });

  it('should let the environment win over the file', () => {
    vi.stubEnv('RANK_MAX_RETRIES', '5');
    vi.stubEnv('RANK_RESULTS_DIR', '/tmp/rank-out');

    const config = mergeExperimentConfig({ retry: { maxRetries: 1 }, resultsDir: 'from-file' });

    expect(config.retry.maxRetries).toBe(5);
    expect(config.resultsDir).toBe('/tmp/rank-out');
  });

  it('should reject a malformed numeric environment value', () => {
    vi.stubEnv('RANK_RETRY_DELAY_MS', 'soon');
    expect(() => mergeExperimentConfig()).toThrow(ConfigurationError);
  });

  describe('loadExperimentConfig', () => {
    let tmpDir: string;

    beforeEach(async () => {
      tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rank-config-'));
    });

    afterEach(async () => {
      await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it('should use defaults without a path', async () => {
      expect(await loadExperimentConfig()).toEqual(defaultExperimentConfig());
    });

    it('should read and validate a config file', async () => {
      const file = path.join(tmpDir, 'config.json');
      await fs.writeFile(file, JSON.stringify({ modelProviders: { 'my-model': 'anthropic' } }), 'utf-8');

      const config = await loadExperimentConfig(file);
      expect(config.modelProviders).toEqual({ 'my-model': 'anthropic' });
    });

    it('should reject a missing file', async () => {
      await expect(loadExperimentConfig(path.join(tmpDir, 'nope.json'))).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should reject values outside the schema', async () => {
      const file = path.join(tmpDir, 'config.json');
      await fs.writeFile(file, JSON.stringify({ providers: { openai: { temperature: 5 } } }), 'utf-8');

      await expect(loadExperimentConfig(file)).rejects.toThrow('providers.openai.temperature');
    });
  });

  it('should trim candidates to the preset size', () => {
    const items = Array.from({ length: 12 }, (_, i) => i);
    expect(applyTestSize(items, 'quick')).toEqual([0, 1, 2]);
    expect(applyTestSize(items, 'small')).toHaveLength(10);
    expect(applyTestSize(items, 'full')).toHaveLength(12);
  });

  it('should list configured models per provider', () => {
    const config = defaultExperimentConfig();
    expect(configuredModels(config)).toHaveLength(3);
    expect(configuredModels(config, ['anthropic'])).toEqual([
      { provider: 'anthropic', model: 'claude-3-5-sonnet-20240620' }
    ]);
  });
});
