/**
 * decomposed_algorithmic: the same per-criterion calls as multi_layer, with
 * a retry budget, followed by deterministic aggregation instead of a
 * synthesis call.
 */

import { aggregate } from '../aggregation/aggregator';
import type { Candidate } from '../types';
import { CandidateOutcome, RankingContext, RankingPipeline } from './base';
import { evaluateAllCriteria } from './criterionEvaluator';

export class DecomposedAlgorithmicPipeline extends RankingPipeline {
  readonly name = 'decomposed_algorithmic' as const;

  protected async rankCandidate(candidate: Candidate, context: RankingContext): Promise<CandidateOutcome> {
    const evaluations = await evaluateAllCriteria(candidate, this.criteria, context, this.retry);
    const { ranking, reasoning } = aggregate(evaluations, this.criteria);

    return {
      result: {
        candidateId: candidate.id,
        displayName: this.displayName(candidate),
        ranking,
        reasoning
      },
      trace: evaluations
    };
  }

  protected buildAnalysis(candidates: readonly Candidate[], traces: Record<string, unknown>): Record<string, unknown> {
    return {
      note: `Criteria evaluated separately (${this.criteria.length} calls per CV), aggregated algorithmically`,
      totalCandidates: candidates.length,
      criteriaEvaluations: traces,
      aggregationMethod: 'Simple average of criteria scores (no weights), rounded half-up',
      retryPolicy: this.retry
    };
  }
}
