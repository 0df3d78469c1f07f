/**
 * Single-call strategies
 *
 * one_shot and chain_of_thought issue one completion per candidate and read
 * `ranking` through the decode ladder. A provider failure or an unreadable
 * response becomes the ranking-0 sentinel.
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
import { buildChainOfThoughtPrompt, buildOneShotPrompt } from './prompts';

abstract class SingleCallPipeline extends RankingPipeline {
  /** Response field holding the model's explanation */
  protected abstract readonly reasoningField: string;

  protected abstract buildPrompt(candidate: Candidate, context: RankingContext): string;

  /** Part of the decoded response kept in the analysis */
  protected abstract traceOf(value: Record<string, unknown> | undefined, raw: string): unknown;

  protected async rankCandidate(candidate: Candidate, context: RankingContext): Promise<CandidateOutcome> {
    const displayName = this.displayName(candidate);

    let text: string;
    try {
      const response = await context.ledger.complete(this.buildPrompt(candidate, context));
      text = response.text;
    } catch (error) {
      this.logger.warn(
        { pipeline: this.name, candidateId: candidate.id, error: describeError(error) },
        'Completion failed'
      );
      return { result: sentinelResult(candidate.id, displayName), trace: { error: describeError(error) } };
    }

    const decoded = decodeRanking(text);
    if (decoded.source === 'none') {
      this.logger.warn({ pipeline: this.name, candidateId: candidate.id }, 'No ranking in response');
      return { result: sentinelResult(candidate.id, displayName, text), trace: { raw_response: text } };
    }

    return {
      result: {
        candidateId: candidate.id,
        displayName,
        ranking: decoded.ranking,
        reasoning: readString(decoded.value, this.reasoningField) ?? text
      },
      trace: this.traceOf(decoded.value, text)
    };
  }
}

export class OneShotPipeline extends SingleCallPipeline {
  readonly name = 'one_shot' as const;
  protected readonly reasoningField = 'reasoning';

  protected buildPrompt(candidate: Candidate, context: RankingContext): string {
    return buildOneShotPrompt(candidate, context.jobDescription, context.criteria);
  }

  protected traceOf(value: Record<string, unknown> | undefined, raw: string): unknown {
    return value ?? { raw_response: raw };
  }

  protected buildAnalysis(candidates: readonly Candidate[], traces: Record<string, unknown>): Record<string, unknown> {
    return {
      note: 'Single completion per CV',
      totalCandidates: candidates.length,
      responses: traces
    };
  }
}

export class ChainOfThoughtPipeline extends SingleCallPipeline {
  readonly name = 'chain_of_thought' as const;
  protected readonly reasoningField = 'final_reasoning';

  protected buildPrompt(candidate: Candidate, context: RankingContext): string {
    return buildChainOfThoughtPrompt(candidate, context.jobDescription, context.criteria);
  }

  protected traceOf(value: Record<string, unknown> | undefined, raw: string): unknown {
    return value?.step_by_step_reasoning ?? { raw_response: raw };
  }

  protected buildAnalysis(candidates: readonly Candidate[], traces: Record<string, unknown>): Record<string, unknown> {
    return {
      note: 'Single completion per CV with five explicit reasoning steps',
      totalCandidates: candidates.length,
      stepReasoning: traces
    };
  }
}
