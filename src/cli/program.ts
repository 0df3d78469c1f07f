/**
 * rank-cvs command line
 *
 *   rank-cvs run       rank candidates with the selected pipelines and models
 *   rank-cvs sanitize  shuffle candidates and replace their ids
 *   rank-cvs analyze   per-CV ranking spread for a saved run
 *   rank-cvs models    list the models a provider credential can use
 */

import { promises as fs } from 'fs';
import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { AppError } from '../shared/errors/types';
import { ErrorHandler } from '../shared/errors/handler';
import { createProvider, isProviderName, PROVIDER_NAMES } from '../shared/llm/factory';
import { DEFAULT_MODELS, ProviderName } from '../shared/llm/types';
import { loggers, serializeError } from '../shared/logging/logger';
import { IdMapping } from '../shared/validation/schemas';
import {
  analyzeDifferences,
  DIFFERENCES_FILE,
  formatDifferences,
  ResultCollector
} from '../ranking/collector';
import { applyTestSize, isTestSize, loadExperimentConfig, TestSize } from '../ranking/config';
import {
  loadCandidateRecords,
  loadCandidates,
  loadIdMapping,
  loadJobDocuments,
  sanitizeCandidates,
  selectCandidates
} from '../ranking/data';
import { runExperiment, ProviderFactory } from '../ranking/experiment';
import { isPipelineName } from '../ranking/pipelines/registry';
import type { PipelineName } from '../ranking/types';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

export interface ProgramOptions {
  io?: CliIO;
  providerFactory?: ProviderFactory;
}

const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line)
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parseProvider(value: string, previous: ProviderName[]): ProviderName[] {
  if (!isProviderName(value)) {
    throw new InvalidArgumentError(`Expected one of: ${PROVIDER_NAMES.join(', ')}`);
  }
  return [...previous, value];
}

function parsePipeline(value: string, previous: PipelineName[]): PipelineName[] {
  if (!isPipelineName(value)) {
    throw new InvalidArgumentError(`Unknown pipeline: ${value}`);
  }
  return [...previous, value];
}

function parseTestSize(value: string): TestSize {
  if (!isTestSize(value)) {
    throw new InvalidArgumentError('Expected quick, small or full');
  }
  return value;
}

function describeFailure(error: unknown): string {
  if (error instanceof AppError) {
    return ErrorHandler.formatUserMessage(error);
  }
  return error instanceof Error ? error.message : String(error);
}

async function writeJson(filePath: string, value: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(value, null, 2), 'utf-8');
}

interface RunOptions {
  config?: string;
  candidates: string;
  job: string;
  provider: ProviderName[];
  model: string[];
  pipeline: PipelineName[];
  cv: string[];
  name?: string;
  size: TestSize;
  blind: boolean;
  resultsDir?: string;
}

interface SanitizeOptions {
  input: string;
  output: string;
  mapping: string;
}

interface AnalyzeOptions {
  mapping?: string;
  resultsDir?: string;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const io = options.io ?? consoleIO;
  const program = new Command();

  // Report failures and set the exit code instead of throwing out of parseAsync
  const guarded = <A extends unknown[]>(action: (...args: A) => Promise<void>) =>
    async (...args: A): Promise<void> => {
      try {
        await action(...args);
      } catch (error) {
        loggers.cli.error({ err: serializeError(error) }, 'Command failed');
        io.err(describeFailure(error));
        process.exitCode = 1;
      }
    };

  program
    .name('rank-cvs')
    .description('Rank CVs against a job description with several LLM pipelines');

  program
    .command('run')
    .description('Run the selected pipelines over the candidates and save the results')
    .option('-c, --config <path>', 'Experiment config JSON file')
    .option('--candidates <path>', 'Candidate file', 'data/candidates.json')
    .option('--job <path>', 'Job documents file', 'data/job.json')
    .option('-p, --provider <name>', 'Provider to use (repeatable)', parseProvider, [])
    .option('-m, --model <name>', 'Model to use (repeatable; overrides providers)', collect, [])
    .option('--pipeline <name>', 'Pipeline to run (repeatable)', parsePipeline, [])
    .option('--cv <id>', 'Only rank this candidate (repeatable)', collect, [])
    .option('-n, --name <run>', 'Run name (default: experiment_<timestamp>)')
    .option('-s, --size <size>', 'Candidate preset: quick, small or full', parseTestSize, 'full')
    .option('--blind', 'Redact candidate names from the CVs before evaluation', false)
    .option('--results-dir <dir>', 'Results directory')
    .action(guarded(async (opts: RunOptions) => {
      const config = await loadExperimentConfig(opts.config);
      if (opts.blind) config.blind = true;
      if (opts.resultsDir) config.resultsDir = opts.resultsDir;

      const job = await loadJobDocuments(opts.job);
      let candidates = await loadCandidates(opts.candidates);
      if (opts.cv.length > 0) {
        candidates = selectCandidates(candidates, opts.cv);
      }
      candidates = applyTestSize(candidates, opts.size);

      io.out(`Ranking ${candidates.length} candidates`);

      const { results, skipped } = await runExperiment({
        candidates,
        job,
        config,
        models: opts.model,
        providers: opts.provider.length > 0 ? opts.provider : undefined,
        pipelines: opts.pipeline.length > 0 ? opts.pipeline : undefined,
        providerFactory: options.providerFactory
      });

      for (const skip of skipped) {
        io.err(`Skipped ${skip.pipeline} on ${skip.model}: ${skip.error}`);
      }

      if (results.length === 0) {
        io.err('No results to save');
        process.exitCode = 1;
        return;
      }

      const collector = new ResultCollector({ resultsDir: config.resultsDir });
      const saved = await collector.collect(results, opts.name);
      io.out(`Results saved to ${saved.directory}`);
    }));

  program
    .command('sanitize')
    .description('Shuffle candidates and replace their ids with random codes')
    .option('--input <path>', 'Original candidate file', 'data/candidates.original.json')
    .option('--output <path>', 'Sanitized candidate file', 'data/candidates.json')
    .option('--mapping <path>', 'ID mapping file', 'data/id_mapping.json')
    .action(guarded(async (opts: SanitizeOptions) => {
      const records = await loadCandidateRecords(opts.input);
      const { candidates, mapping } = sanitizeCandidates(records);

      await writeJson(opts.output, candidates);
      await writeJson(opts.mapping, mapping);

      io.out(`Sanitized ${candidates.length} CVs`);
      io.out(`Sanitized CVs saved to: ${opts.output}`);
      io.out(`ID mapping saved to: ${opts.mapping}`);
    }));

  program
    .command('analyze')
    .description('Show how differently each CV was ranked within a saved run')
    .argument('<run>', 'Run name')
    .option('--mapping <path>', 'ID mapping file for original ids and names')
    .option('--results-dir <dir>', 'Results directory')
    .action(guarded(async (runName: string, opts: AnalyzeOptions) => {
      const collector = new ResultCollector(opts.resultsDir ? { resultsDir: opts.resultsDir } : {});
      const results = await collector.loadRun(runName);
      const mapping: IdMapping = opts.mapping ? await loadIdMapping(opts.mapping) : {};

      const reports = analyzeDifferences(results, mapping);
      const target = path.join(collector.runDirectory(runName), DIFFERENCES_FILE);
      await writeJson(target, reports);

      io.out(formatDifferences(reports));
      io.out(`Analysis saved to ${target}`);
    }));

  program
    .command('models')
    .description('List the models available to a provider credential')
    .argument('<provider>', `One of: ${PROVIDER_NAMES.join(', ')}`)
    .action(guarded(async (provider: string) => {
      if (!isProviderName(provider)) {
        throw new InvalidArgumentError(`Unknown provider: ${provider}`);
      }
      const backend = createProvider(provider, DEFAULT_MODELS[provider]);
      const models = await backend.listModels();
      models.forEach(model => io.out(model));
    }));

  return program;
}
