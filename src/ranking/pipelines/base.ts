/**
 * Ranking Pipeline base
 *
 * Shared plumbing for every strategy: concurrent fan-out over candidates,
 * per-run call accounting, display names and the failed-unit sentinel.
 * Strategies only decide how a single candidate becomes a ranking.
 */

import type { CompletionProvider } from '../../shared/llm/provider';
import {
  addUsage,
  CompletionResult,
  EMPTY_USAGE,
  GenerationConfig,
  TokenUsage
} from '../../shared/llm/types';
import { loggers, serializeError } from '../../shared/logging/logger';
import {
  Candidate,
  CriterionDefinition,
  DEFAULT_CRITERIA,
  JobDocuments,
  PipelineName,
  PipelineRunResult,
  RankingResult,
  UsageTotals
} from '../types';

export const UNKNOWN_NAME = 'Unknown';
export const REDACTED_NAME = '[REDACTED]';

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Fixed delay between attempts */
  delayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  delayMs: 500
};

export interface PipelineOptions {
  /** Replace every display name with the redaction marker */
  blind?: boolean;
  criteria?: readonly CriterionDefinition[];
  generation?: Partial<GenerationConfig>;
  retry?: RetryPolicy;
}

// ============================================================================
// Task groups
// ============================================================================

export type TaskOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

function settle<T>(task: () => Promise<T>): Promise<TaskOutcome<T>> {
  try {
    return task().then(
      (value): TaskOutcome<T> => ({ ok: true, value }),
      (error: unknown): TaskOutcome<T> => ({ ok: false, error })
    );
  } catch (error) {
    return Promise.resolve({ ok: false, error });
  }
}

/**
 * Start every task, then wait for all of them. A failing task never
 * cancels or hides its siblings; outcomes come back in task order.
 */
export async function runTaskGroup<T>(tasks: ReadonlyArray<() => Promise<T>>): Promise<TaskOutcome<T>[]> {
  const started = tasks.map(settle);
  return Promise.all(started);
}

// ============================================================================
// Call accounting
// ============================================================================

/**
 * Counts calls and sums token usage for one pipeline run
 */
export class CallLedger {
  private usage: TokenUsage = { ...EMPTY_USAGE };
  private calls = 0;
  private failedCalls = 0;

  constructor(
    private readonly provider: CompletionProvider,
    private readonly generation: Partial<GenerationConfig> = {}
  ) {}

  async complete(prompt: string): Promise<CompletionResult> {
    this.calls++;
    try {
      const result = await this.provider.generate(prompt, this.generation);
      this.usage = addUsage(this.usage, result.usage);
      return result;
    } catch (error) {
      this.failedCalls++;
      throw error;
    }
  }

  totals(): UsageTotals {
    return { ...this.usage, calls: this.calls, failedCalls: this.failedCalls };
  }
}

// ============================================================================
// Shared policies
// ============================================================================

/**
 * First line of the CV with `#` and `_` removed
 */
export function extractDisplayName(content: string, blind = false): string {
  if (blind) {
    return REDACTED_NAME;
  }
  if (!content) {
    return UNKNOWN_NAME;
  }
  const name = content.split('\n')[0].replace(/[#_]/g, '').trim();
  return name || UNKNOWN_NAME;
}

/**
 * Failed-unit result. Ranking 0 stays visible in every report.
 */
export function sentinelResult(candidateId: string, displayName: string, raw = ''): RankingResult {
  return { candidateId, displayName, ranking: 0, reasoning: raw };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Pipeline
// ============================================================================

/**
 * What a strategy produces for one candidate
 */
export interface CandidateOutcome {
  result: RankingResult;
  /** Strategy-specific trace, stored in the run's analysis */
  trace?: unknown;
}

export interface RankingContext extends JobDocuments {
  ledger: CallLedger;
}

export abstract class RankingPipeline {
  abstract readonly name: PipelineName;

  protected readonly blind: boolean;
  protected readonly criteria: readonly CriterionDefinition[];
  protected readonly retry: RetryPolicy;
  protected readonly logger = loggers.pipeline;

  constructor(
    protected readonly provider: CompletionProvider,
    protected readonly options: PipelineOptions = {}
  ) {
    this.blind = options.blind ?? false;
    this.criteria = options.criteria ?? DEFAULT_CRITERIA;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
  }

  /**
   * Rank a batch. Output has one result per input candidate, in input order.
   */
  async analyze(
    candidates: readonly Candidate[],
    jobDescription: string,
    criteriaText: string
  ): Promise<PipelineRunResult> {
    const startedAt = new Date();
    const ledger = new CallLedger(this.provider, this.options.generation);
    const context: RankingContext = { jobDescription, criteria: criteriaText, ledger };
    const labels = {
      pipeline: this.name,
      provider: this.provider.providerName(),
      model: this.provider.modelName()
    };

    this.logger.info({ ...labels, candidates: candidates.length }, 'Pipeline started');

    const outcomes = await runTaskGroup(
      candidates.map(candidate => () => this.rankCandidate(candidate, context))
    );

    const rankings: RankingResult[] = [];
    const traces: Record<string, unknown> = {};

    outcomes.forEach((outcome, index) => {
      const candidate = candidates[index];
      if (outcome.ok) {
        rankings.push(outcome.value.result);
        if (outcome.value.trace !== undefined) {
          traces[candidate.id] = outcome.value.trace;
        }
        return;
      }
      this.logger.warn(
        { ...labels, candidateId: candidate.id, err: serializeError(outcome.error) },
        'Candidate evaluation failed'
      );
      rankings.push(sentinelResult(candidate.id, this.displayName(candidate)));
    });

    const completedAt = new Date();
    const failedUnits = rankings.filter(r => r.ranking === 0).length;
    const usage = ledger.totals();

    this.logger.info(
      { ...labels, durationMs: completedAt.getTime() - startedAt.getTime(), failedUnits, calls: usage.calls },
      'Pipeline finished'
    );

    return {
      pipelineName: this.name,
      providerName: labels.provider,
      modelName: labels.model,
      rankings,
      analysis: this.buildAnalysis(candidates, traces),
      metadata: {
        usage,
        startedAt: startedAt.toISOString(),
        completedAt: completedAt.toISOString(),
        durationMs: completedAt.getTime() - startedAt.getTime(),
        candidateCount: candidates.length,
        failedUnits
      }
    };
  }

  protected displayName(candidate: Candidate): string {
    return extractDisplayName(candidate.content, this.blind);
  }

  protected abstract rankCandidate(candidate: Candidate, context: RankingContext): Promise<CandidateOutcome>;

  protected abstract buildAnalysis(
    candidates: readonly Candidate[],
    traces: Record<string, unknown>
  ): Record<string, unknown>;
}
