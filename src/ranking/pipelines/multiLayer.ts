/**
 * multi_layer: one call per criterion, then a synthesis call that turns the
 * three ratings into a ranking. Four calls per candidate, no retries.
 */

import { decodeRanking, readString } from '../extraction/responseParser';
import type { Candidate } from '../types';
import {
  CandidateOutcome,
  describeError,
  RankingContext,
  RankingPipeline,
  sentinelResult
} from './base';
import { evaluateAllCriteria, SINGLE_ATTEMPT } from './criterionEvaluator';
import { buildSynthesisPrompt } from './prompts';

export class MultiLayerPipeline extends RankingPipeline {
  readonly name = 'multi_layer' as const;

  protected async rankCandidate(candidate: Candidate, context: RankingContext): Promise<CandidateOutcome> {
    const displayName = this.displayName(candidate);
    const evaluations = await evaluateAllCriteria(candidate, this.criteria, context, SINGLE_ATTEMPT);

    let text: string;
    try {
      const response = await context.ledger.complete(
        buildSynthesisPrompt(candidate, context.jobDescription, evaluations)
      );
      text = response.text;
    } catch (error) {
      this.logger.warn(
        { pipeline: this.name, candidateId: candidate.id, error: describeError(error) },
        'Synthesis failed'
      );
      return {
        result: sentinelResult(candidate.id, displayName),
        trace: { criteriaEvaluations: evaluations, synthesis: { error: describeError(error) } }
      };
    }

    const decoded = decodeRanking(text);
    const reasoning = decoded.source === 'none'
      ? text
      : readString(decoded.value, 'reasoning') ?? text;

    return {
      result: { candidateId: candidate.id, displayName, ranking: decoded.ranking, reasoning },
      trace: {
        criteriaEvaluations: evaluations,
        synthesis: decoded.value ?? { raw_response: text }
      }
    };
  }

  protected buildAnalysis(candidates: readonly Candidate[], traces: Record<string, unknown>): Record<string, unknown> {
    return {
      note: `Criteria evaluated separately (${this.criteria.length} calls per CV), combined by a synthesis call`,
      totalCandidates: candidates.length,
      criteria: this.criteria.map(c => c.key),
      evaluations: traces
    };
  }
}
