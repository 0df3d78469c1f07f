/**
 * Criterion evaluation
 *
 * One completion per (candidate, criterion), asking for a qualitative
 * rating. Shared by multi_layer and decomposed_algorithmic.
 */

import { ErrorHandler } from '../../shared/errors/handler';
import { extractStructured, readString } from '../extraction/responseParser';
import { extractCriterionSection } from '../criteria/criteriaSection';
import type { Candidate, CriterionDefinition, CriterionEvaluation } from '../types';
import { describeError, RankingContext, RetryPolicy, runTaskGroup } from './base';
import { buildCriterionPrompt } from './prompts';
import { loggers } from '../../shared/logging/logger';

export const UNKNOWN_RATING = 'Unknown';

/** No retries: a single attempt */
export const SINGLE_ATTEMPT: RetryPolicy = { maxRetries: 0, delayMs: 0 };

/**
 * Evaluate one criterion. Retries only this call, with a fixed delay, when
 * the provider fails or the response carries no `rating` string. Once the
 * budget is spent the evaluation is recorded as "Unknown" with the error.
 */
export async function evaluateCriterion(
  candidate: Candidate,
  criterion: CriterionDefinition,
  context: RankingContext,
  retry: RetryPolicy
): Promise<CriterionEvaluation> {
  const section = extractCriterionSection(context.criteria, criterion.name);
  const prompt = buildCriterionPrompt(candidate, context.jobDescription, criterion, section);

  let attempts = 0;
  let lastRaw: string | undefined;

  try {
    return await ErrorHandler.retry(
      async () => {
        attempts++;
        const response = await context.ledger.complete(prompt);
        lastRaw = response.text;

        const extraction = extractStructured(response.text);
        const value = extraction.kind === 'none' ? undefined : extraction.value;
        const rating = readString(value, 'rating');
        if (rating === undefined) {
          throw ErrorHandler.createParsingError(
            'No rating in criterion response',
            `Criterion ${criterion.key} for ${candidate.id} returned no rating field`,
            { candidateId: candidate.id, criterion: criterion.key }
          );
        }

        const evaluation: CriterionEvaluation = {
          candidateId: candidate.id,
          rating,
          evidence: readString(value, 'evidence') ?? '',
          attempts
        };
        return evaluation;
      },
      {
        maxAttempts: retry.maxRetries + 1,
        delayMs: retry.delayMs,
        backoffMultiplier: 1,
        onRetry: (error, attempt) => {
          loggers.pipeline.debug(
            { candidateId: candidate.id, criterion: criterion.key, attempt, error: error.message },
            'Retrying criterion evaluation'
          );
        }
      }
    );
  } catch (error) {
    loggers.pipeline.warn(
      { candidateId: candidate.id, criterion: criterion.key, attempts, error: describeError(error) },
      'Criterion evaluation gave up'
    );
    const failed: CriterionEvaluation = {
      candidateId: candidate.id,
      rating: UNKNOWN_RATING,
      error: describeError(error),
      attempts
    };
    if (lastRaw !== undefined) {
      failed.raw = lastRaw;
    }
    return failed;
  }
}

/**
 * Evaluate every criterion for one candidate concurrently, keyed by
 * criterion key
 */
export async function evaluateAllCriteria(
  candidate: Candidate,
  criteria: readonly CriterionDefinition[],
  context: RankingContext,
  retry: RetryPolicy
): Promise<Record<string, CriterionEvaluation>> {
  const outcomes = await runTaskGroup(
    criteria.map(criterion => () => evaluateCriterion(candidate, criterion, context, retry))
  );

  const evaluations: Record<string, CriterionEvaluation> = {};
  outcomes.forEach((outcome, index) => {
    const { key } = criteria[index];
    evaluations[key] = outcome.ok
      ? outcome.value
      : { candidateId: candidate.id, rating: UNKNOWN_RATING, error: describeError(outcome.error), attempts: 0 };
  });
  return evaluations;
}
