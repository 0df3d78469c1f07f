/**
 * Ranking Types
 *
 * Core data model for candidate ranking runs.
 */

import type { TokenUsage } from '../../shared/llm/types';

// ============================================================================
// Inputs
// ============================================================================

/**
 * A CV being evaluated. Never mutated; transforms return new values.
 */
export interface Candidate {
  readonly id: string;
  readonly content: string;
}

/**
 * The two documents every pipeline receives whole
 */
export interface JobDocuments {
  jobDescription: string;
  criteria: string;
}

/**
 * One named hiring dimension scored independently
 */
export interface CriterionDefinition {
  /** Heading text in the criteria document, e.g. "Technical T-Shape" */
  name: string;
  /** Stable key used in analysis output and reasoning, e.g. "technical_t_shape" */
  key: string;
}

export const DEFAULT_CRITERIA: readonly CriterionDefinition[] = [
  { name: 'Zero-to-One Operator', key: 'zero_to_one' },
  { name: 'Technical T-Shape', key: 'technical_t_shape' },
  { name: 'Recruitment Mastery', key: 'recruitment_mastery' }
];

// ============================================================================
// Evaluations and rankings
// ============================================================================

/**
 * Result of evaluating one candidate against one criterion.
 * `rating` keeps the model's own wording; the aggregator maps it by substring.
 */
export interface CriterionEvaluation {
  candidateId: string;
  rating: string;
  evidence?: string;
  error?: string;
  /** Raw model text, kept when the response could not be used */
  raw?: string;
  attempts: number;
}

/**
 * 4 = Excellent fit, 3 = Good fit, 2 = Borderline, 1 = Not a fit,
 * 0 = could not be determined
 */
export type RankingValue = 0 | 1 | 2 | 3 | 4;

export interface RankingResult {
  candidateId: string;
  displayName: string;
  ranking: RankingValue;
  reasoning: string;
}

export const RANKING_LABELS: Record<number, string> = {
  4: 'Excellent Fit',
  3: 'Good Fit',
  2: 'Borderline',
  1: 'Not a Fit'
};

export function rankingLabel(ranking: number): string {
  return RANKING_LABELS[ranking] ?? 'Unknown';
}

// ============================================================================
// Pipeline runs
// ============================================================================

export const PIPELINE_NAMES = [
  'one_shot',
  'chain_of_thought',
  'multi_layer',
  'decomposed_algorithmic'
] as const;

export type PipelineName = typeof PIPELINE_NAMES[number];

export interface UsageTotals extends TokenUsage {
  calls: number;
  failedCalls: number;
}

export interface RunMetadata {
  usage: UsageTotals;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  candidateCount: number;
  /** Candidates whose ranking is the 0 sentinel */
  failedUnits: number;
}

/**
 * One pipeline × model execution over a candidate batch
 */
export interface PipelineRunResult {
  pipelineName: PipelineName;
  providerName: string;
  modelName: string;
  /** One per input candidate, in input order */
  rankings: RankingResult[];
  analysis: Record<string, unknown>;
  metadata: RunMetadata;
}
