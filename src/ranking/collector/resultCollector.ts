/**
 * Result Collector
 *
 * Persists pipeline runs as a flat directory per run:
 *
 *   <resultsDir>/<runName>/
 *     <pipeline>_<provider>_<model>.json
 *     <pipeline>_<provider>_<model>_rankings.txt
 *     summary.json
 *     comparison.csv
 */

import { promises as fs } from 'fs';
import path from 'path';
import { StorageError } from '../../shared/errors/types';
import { env } from '../../shared/config';
import { loggers } from '../../shared/logging/logger';
import { PipelineRunResultSchema } from '../../shared/validation/schemas';
import { toValidationErrors } from '../../shared/validation/validator';
import { PipelineRunResult, rankingLabel } from '../types';

const logger = loggers.collector;

export const SUMMARY_FILE = 'summary.json';
export const COMPARISON_FILE = 'comparison.csv';
export const DIFFERENCES_FILE = 'differences.json';

const RESERVED_FILES = [SUMMARY_FILE, DIFFERENCES_FILE];

export const COMPARISON_COLUMNS = [
  'cv_id',
  'name',
  'pipeline',
  'provider',
  'model',
  'ranking',
  'ranking_label',
  'reasoning',
  'total_tokens',
  'prompt_tokens',
  'completion_tokens'
] as const;

export type ComparisonColumn = typeof COMPARISON_COLUMNS[number];
export type ComparisonRow = Record<ComparisonColumn, string | number>;

export interface PipelineSummary {
  count: number;
  models: string[];
  totalTokens: number;
  cvCount: number;
}

export interface RunSummary {
  runName: string;
  timestamp: string;
  totalRuns: number;
  pipelines: Record<string, PipelineSummary>;
  providers: Record<string, number>;
  models: Record<string, number>;
  cvIds: string[];
  failedUnits: number;
}

export interface CollectedRun {
  runName: string;
  directory: string;
  files: string[];
  summary: RunSummary;
}

export interface ResultCollectorOptions {
  resultsDir?: string;
  /** Clock for run names and timestamps */
  now?: () => Date;
}

// ============================================================================
// Pure report builders
// ============================================================================

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `experiment_YYYYMMDD_HHMMSS` in local time
 */
export function defaultRunName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `experiment_${day}_${time}`;
}

/**
 * File name stem for a run; path separators in model names become `-`
 */
export function resultFileStem(result: PipelineRunResult): string {
  const safe = (part: string) => part.replace(/[\\/:*?"<>|\s]+/g, '-');
  return `${safe(result.pipelineName)}_${safe(result.providerName)}_${safe(result.modelName)}`;
}

/**
 * Human-readable listing, sorted by ranking descending then by name
 */
export function formatRankingListing(result: PipelineRunResult): string {
  const rule = '='.repeat(60);
  const divider = '-'.repeat(60);

  const sorted = [...result.rankings].sort((a, b) => {
    if (a.ranking !== b.ranking) {
      return b.ranking - a.ranking;
    }
    if (a.displayName === b.displayName) return 0;
    return a.displayName < b.displayName ? -1 : 1;
  });

  const lines = [
    `Pipeline: ${result.pipelineName}`,
    `Provider: ${result.providerName}`,
    `Model: ${result.modelName}`,
    rule,
    ''
  ];

  for (const ranking of sorted) {
    lines.push(
      `Ranking: ${ranking.ranking} (${rankingLabel(ranking.ranking)})`,
      `Name: ${ranking.displayName}`,
      `CV ID: ${ranking.candidateId}`,
      `Reasoning: ${ranking.reasoning}`,
      divider,
      ''
    );
  }

  return lines.join('\n');
}

export function buildSummary(results: readonly PipelineRunResult[], runName: string, timestamp: Date): RunSummary {
  const pipelines: Record<string, PipelineSummary> = {};
  const pipelineCvs: Record<string, Set<string>> = {};
  const providers: Record<string, number> = {};
  const models: Record<string, number> = {};
  const cvIds = new Set<string>();
  let failedUnits = 0;

  for (const result of results) {
    const entry = pipelines[result.pipelineName] ?? { count: 0, models: [], totalTokens: 0, cvCount: 0 };
    const seen = pipelineCvs[result.pipelineName] ?? new Set<string>();

    entry.count++;
    if (!entry.models.includes(result.modelName)) {
      entry.models.push(result.modelName);
    }
    entry.totalTokens += result.metadata.usage.totalTokens;
    result.rankings.forEach(r => seen.add(r.candidateId));
    entry.cvCount = seen.size;

    pipelines[result.pipelineName] = entry;
    pipelineCvs[result.pipelineName] = seen;
    providers[result.providerName] = (providers[result.providerName] ?? 0) + 1;
    models[result.modelName] = (models[result.modelName] ?? 0) + 1;
    result.rankings.forEach(r => cvIds.add(r.candidateId));
    failedUnits += result.metadata.failedUnits;
  }

  return {
    runName,
    timestamp: timestamp.toISOString(),
    totalRuns: results.length,
    pipelines,
    providers,
    models,
    cvIds: [...cvIds].sort(),
    failedUnits
  };
}

/**
 * One row per (candidate, run). Token columns carry the run's totals.
 */
export function buildComparisonRows(results: readonly PipelineRunResult[]): ComparisonRow[] {
  return results.flatMap(result =>
    result.rankings.map(ranking => ({
      cv_id: ranking.candidateId,
      name: ranking.displayName,
      pipeline: result.pipelineName,
      provider: result.providerName,
      model: result.modelName,
      ranking: ranking.ranking,
      ranking_label: rankingLabel(ranking.ranking),
      reasoning: ranking.reasoning,
      total_tokens: result.metadata.usage.totalTokens,
      prompt_tokens: result.metadata.usage.promptTokens,
      completion_tokens: result.metadata.usage.completionTokens
    }))
  );
}

/**
 * Quote a CSV field when it holds a comma, quote or line break
 */
export function escapeCsvField(value: string | number): string {
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function toCsv(rows: readonly ComparisonRow[]): string {
  const lines = [COMPARISON_COLUMNS.join(',')];
  for (const row of rows) {
    lines.push(COMPARISON_COLUMNS.map(column => escapeCsvField(row[column])).join(','));
  }
  return lines.join('\n') + '\n';
}

// ============================================================================
// Collector
// ============================================================================

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

export class ResultCollector {
  readonly resultsDir: string;
  private readonly now: () => Date;

  constructor(options: ResultCollectorOptions = {}) {
    this.resultsDir = options.resultsDir ?? env.resultsDir;
    this.now = options.now ?? (() => new Date());
  }

  runDirectory(runName: string): string {
    return path.join(this.resultsDir, runName);
  }

  /**
   * Write every artifact for a batch of runs. An empty batch is rejected
   * before anything touches the disk.
   */
  async collect(results: readonly PipelineRunResult[], runName?: string): Promise<CollectedRun> {
    if (results.length === 0) {
      throw new StorageError('No results to save', 'The run produced no pipeline results');
    }

    const timestamp = this.now();
    const name = runName ?? defaultRunName(timestamp);
    const directory = this.runDirectory(name);

    const reused = await exists(directory);
    if (reused) {
      logger.warn({ runName: name, directory }, 'Run directory already exists; replacing its contents');
    }

    const files: string[] = [];
    const write = async (fileName: string, content: string) => {
      const target = path.join(directory, fileName);
      await fs.writeFile(target, content, 'utf-8');
      files.push(target);
    };

    try {
      // A reused name starts from an empty directory
      if (reused) {
        await fs.rm(directory, { recursive: true, force: true });
      }
      await fs.mkdir(directory, { recursive: true });

      for (const result of results) {
        const stem = resultFileStem(result);
        await write(`${stem}.json`, JSON.stringify(result, null, 2));
        await write(`${stem}_rankings.txt`, formatRankingListing(result));
      }

      const summary = buildSummary(results, name, timestamp);
      await write(SUMMARY_FILE, JSON.stringify(summary, null, 2));
      await write(COMPARISON_FILE, toCsv(buildComparisonRows(results)));

      logger.info({ runName: name, directory, runs: results.length }, 'Results saved');
      return { runName: name, directory, files, summary };
    } catch (error) {
      throw new StorageError(
        'Failed to save results',
        error instanceof Error ? error.message : String(error),
        { directory }
      );
    }
  }

  /**
   * Reload the pipeline results of a saved run
   */
  async loadRun(runName: string): Promise<PipelineRunResult[]> {
    const directory = this.runDirectory(runName);
    if (!(await exists(directory))) {
      throw new StorageError(`Run ${runName} not found`, `No directory at ${directory}`, { runName });
    }

    const entries = (await fs.readdir(directory))
      .filter(file => file.endsWith('.json') && !RESERVED_FILES.includes(file))
      .sort();

    const results: PipelineRunResult[] = [];
    for (const file of entries) {
      const content = await fs.readFile(path.join(directory, file), 'utf-8');
      let data: unknown;
      try {
        data = JSON.parse(content);
      } catch (error) {
        throw new StorageError(
          `Unreadable result file ${file}`,
          error instanceof Error ? error.message : String(error),
          { runName, file }
        );
      }

      const parsed = PipelineRunResultSchema.safeParse(data);
      if (!parsed.success) {
        const fields = toValidationErrors(parsed.error).map(e => `${e.field}: ${e.message}`).join('; ');
        throw new StorageError(`Invalid result file ${file}`, fields, { runName, file });
      }
      results.push(parsed.data);
    }

    logger.debug({ runName, files: results.length }, 'Run loaded');
    return results;
  }

  /**
   * Names of saved runs, oldest name first
   */
  async listRuns(): Promise<string[]> {
    if (!(await exists(this.resultsDir))) {
      return [];
    }
    const entries = await fs.readdir(this.resultsDir, { withFileTypes: true });
    return entries.filter(e => e.isDirectory()).map(e => e.name).sort();
  }
}
