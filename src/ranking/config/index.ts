/**
 * Experiment Configuration
 *
 * Which providers, models and pipelines a run uses. Sources are merged in
 * order: built-in defaults, then an optional JSON file, then environment
 * variables (RANK_RESULTS_DIR, RANK_MAX_RETRIES, RANK_RETRY_DELAY_MS).
 */

import { promises as fs } from 'fs';
import { ConfigurationError } from '../../shared/errors/types';
import { getEnvNumber } from '../../shared/config';
import type { ProviderName } from '../../shared/llm/types';
import { DEFAULT_MODELS } from '../../shared/llm/types';
import { PROVIDER_NAMES } from '../../shared/llm/factory';
import { ExperimentConfigFile, ExperimentConfigFileSchema } from '../../shared/validation/schemas';
import { parseInputFile } from '../../shared/validation/validator';
import { DEFAULT_RETRY_POLICY, RetryPolicy } from '../pipelines/base';
import { CriterionDefinition, DEFAULT_CRITERIA, PIPELINE_NAMES, PipelineName } from '../types';

export interface ProviderSettings {
  models: string[];
  temperature?: number;
  maxTokens?: number;
}

export interface ExperimentConfig {
  providers: Record<ProviderName, ProviderSettings>;
  /** Explicit model → provider routing; wins over name prefixes */
  modelProviders: Record<string, ProviderName>;
  pipelines: PipelineName[];
  criteria: CriterionDefinition[];
  retry: RetryPolicy;
  resultsDir: string;
  blind: boolean;
}

/**
 * Candidate-count presets for trial runs
 */
export const TEST_SIZE_PRESETS = {
  quick: 3,
  small: 10
} as const;

export type TestSize = keyof typeof TEST_SIZE_PRESETS | 'full';

export function isTestSize(value: string): value is TestSize {
  return value === 'full' || value === 'quick' || value === 'small';
}

export function defaultExperimentConfig(): ExperimentConfig {
  return {
    providers: {
      openai: { models: [DEFAULT_MODELS.openai] },
      anthropic: { models: [DEFAULT_MODELS.anthropic] },
      gemini: { models: [DEFAULT_MODELS.gemini] }
    },
    modelProviders: {},
    pipelines: [...PIPELINE_NAMES],
    criteria: DEFAULT_CRITERIA.map(c => ({ ...c })),
    retry: { ...DEFAULT_RETRY_POLICY },
    resultsDir: 'results',
    blind: false
  };
}

/**
 * Lay a parsed config file and the environment over the defaults
 */
export function mergeExperimentConfig(file: ExperimentConfigFile = {}): ExperimentConfig {
  const config = defaultExperimentConfig();

  for (const provider of PROVIDER_NAMES) {
    const settings = file.providers?.[provider];
    if (settings) {
      config.providers[provider] = {
        models: settings.models,
        temperature: settings.temperature,
        maxTokens: settings.maxTokens
      };
    }
  }

  if (file.modelProviders) {
    config.modelProviders = { ...file.modelProviders };
  }

  if (file.pipelines) {
    const toggles = file.pipelines;
    config.pipelines = PIPELINE_NAMES.filter(name => toggles[name]?.enabled ?? true);
  }

  if (file.criteria) {
    config.criteria = file.criteria.map(c => ({ name: c.name, key: c.key }));
  }

  config.retry = {
    maxRetries: file.retry?.maxRetries ?? config.retry.maxRetries,
    delayMs: file.retry?.delayMs ?? config.retry.delayMs
  };
  config.resultsDir = file.resultsDir ?? config.resultsDir;
  config.blind = file.blind ?? config.blind;

  // Environment wins over the file
  config.resultsDir = process.env.RANK_RESULTS_DIR || config.resultsDir;
  config.retry = {
    maxRetries: getEnvNumber('RANK_MAX_RETRIES', config.retry.maxRetries),
    delayMs: getEnvNumber('RANK_RETRY_DELAY_MS', config.retry.delayMs)
  };

  if (config.retry.maxRetries < 0 || config.retry.delayMs < 0) {
    throw new ConfigurationError('Retry settings must not be negative', { retry: config.retry });
  }

  return config;
}

/**
 * Load the experiment config. Without a path only defaults and the
 * environment apply; a path that does not exist is a configuration error.
 */
export async function loadExperimentConfig(configPath?: string): Promise<ExperimentConfig> {
  if (!configPath) {
    return mergeExperimentConfig();
  }

  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch {
    throw new ConfigurationError(`Config file not found: ${configPath}`, { path: configPath });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(
      `Config file is not valid JSON: ${configPath} (${error instanceof Error ? error.message : String(error)})`,
      { path: configPath }
    );
  }

  return mergeExperimentConfig(parseInputFile(ExperimentConfigFileSchema, data, configPath));
}

/**
 * Trim a candidate list to a preset size
 */
export function applyTestSize<T>(candidates: readonly T[], size: TestSize): T[] {
  return size === 'full' ? [...candidates] : candidates.slice(0, TEST_SIZE_PRESETS[size]);
}

export interface ModelTarget {
  provider: ProviderName;
  model: string;
}

/**
 * Every configured (provider, model) pair, optionally restricted to some
 * providers
 */
export function configuredModels(
  config: ExperimentConfig,
  providers: readonly ProviderName[] = PROVIDER_NAMES
): ModelTarget[] {
  return providers.flatMap(provider =>
    config.providers[provider].models.map(model => ({ provider, model }))
  );
}
