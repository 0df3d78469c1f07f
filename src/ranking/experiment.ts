/**
 * Experiment runner
 *
 * Runs every selected pipeline against every selected model. A
 * combination that throws is logged and skipped; the rest still run.
 */

import { ErrorHandler } from '../shared/errors/handler';
import { AppError } from '../shared/errors/types';
import { createProvider, resolveProviderName } from '../shared/llm/factory';
import type { CompletionProvider } from '../shared/llm/provider';
import type { GenerationConfig, ProviderName } from '../shared/llm/types';
import { loggers } from '../shared/logging/logger';
import { ExperimentConfig, ModelTarget, configuredModels } from './config';
import { blindCandidates } from './data/blind';
import { createPipeline } from './pipelines/registry';
import { Candidate, JobDocuments, PipelineName, PipelineRunResult } from './types';

const logger = loggers.experiment;

export type ProviderFactory = (
  provider: ProviderName,
  model: string,
  generation: Partial<GenerationConfig>
) => CompletionProvider;

export interface ExperimentRequest {
  candidates: readonly Candidate[];
  job: JobDocuments;
  config: ExperimentConfig;
  /** Explicit models; otherwise every configured model */
  models?: readonly string[];
  providers?: readonly ProviderName[];
  pipelines?: readonly PipelineName[];
  providerFactory?: ProviderFactory;
}

export interface SkippedCombination {
  pipeline: PipelineName;
  model: string;
  error: string;
}

export interface ExperimentOutcome {
  results: PipelineRunResult[];
  skipped: SkippedCombination[];
}

function resolveTargets(request: ExperimentRequest): ModelTarget[] {
  if (request.models && request.models.length > 0) {
    return request.models.map(model => ({
      provider: resolveProviderName(model, request.config.modelProviders),
      model
    }));
  }
  return configuredModels(request.config, request.providers);
}

export async function runExperiment(request: ExperimentRequest): Promise<ExperimentOutcome> {
  const { job, config } = request;
  // Redacted before any prompt is built
  const candidates = config.blind ? blindCandidates(request.candidates) : request.candidates;
  const factory = request.providerFactory ?? createProvider;
  const pipelines = request.pipelines ?? config.pipelines;
  const targets = resolveTargets(request);

  const results: PipelineRunResult[] = [];
  const skipped: SkippedCombination[] = [];

  logger.info(
    { models: targets.map(t => t.model), pipelines, candidates: candidates.length },
    'Experiment started'
  );

  for (const target of targets) {
    const settings = config.providers[target.provider];
    const generation: Partial<GenerationConfig> = {};
    if (settings.temperature !== undefined) generation.temperature = settings.temperature;
    if (settings.maxTokens !== undefined) generation.maxTokens = settings.maxTokens;

    for (const pipelineName of pipelines) {
      try {
        const provider = factory(target.provider, target.model, generation);
        const pipeline = createPipeline(pipelineName, provider, {
          blind: config.blind,
          criteria: config.criteria,
          retry: config.retry
        });
        results.push(await pipeline.analyze(candidates, job.jobDescription, job.criteria));
      } catch (error) {
        const message = error instanceof AppError
          ? ErrorHandler.formatUserMessage(error)
          : error instanceof Error ? error.message : String(error);
        ErrorHandler.logError(
          error instanceof Error ? error : ErrorHandler.createUnexpectedError(error),
          { pipeline: pipelineName, model: target.model }
        );
        logger.warn({ pipeline: pipelineName, model: target.model }, 'Skipping combination');
        skipped.push({ pipeline: pipelineName, model: target.model, error: message });
      }
    }
  }

  logger.info({ completed: results.length, skipped: skipped.length }, 'Experiment finished');
  return { results, skipped };
}
