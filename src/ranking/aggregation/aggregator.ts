/**
 * Aggregation Engine
 *
 * Deterministic combination of per-criterion ratings into one ranking.
 * No model call is involved and no input makes it fail: a missing or
 * malformed evaluation falls back to the borderline score.
 */

import { roundHalfUp } from '../extraction/coercion';
import { DEFAULT_CRITERIA, CriterionDefinition } from '../types';

/** Score used for missing evaluations and unrecognised ratings */
export const NEUTRAL_SCORE = 2;

export interface CriterionScore {
  key: string;
  rating: string | null;
  score: number;
}

export interface Aggregation {
  ranking: 1 | 2 | 3 | 4;
  average: number;
  reasoning: string;
  breakdown: CriterionScore[];
}

/**
 * Map free-form rating text to a score. Case-insensitive substring match,
 * checked in order: excellent, good, weak/borderline, not a fit/not fit.
 */
export function mapRatingToScore(rating: string): number {
  const text = rating.trim().toLowerCase();

  if (text.includes('excellent')) return 4;
  if (text.includes('good')) return 3;
  if (text.includes('weak') || text.includes('borderline')) return 2;
  if (text.includes('not a fit') || text.includes('not fit')) return 1;
  return NEUTRAL_SCORE;
}

function clampRanking(value: number): 1 | 2 | 3 | 4 {
  if (value <= 1) return 1;
  if (value === 2) return 2;
  if (value === 3) return 3;
  return 4;
}

function readRating(evaluation: unknown): string | null {
  if (typeof evaluation !== 'object' || evaluation === null || Array.isArray(evaluation)) {
    return null;
  }
  const rating: unknown = Reflect.get(evaluation, 'rating');
  return typeof rating === 'string' ? rating : 'Unknown';
}

/**
 * Aggregate criterion evaluations keyed by criterion key.
 * The mean is rounded half-up (2.5 → 3) and clamped to 1–4.
 */
export function aggregate(
  evaluations: Record<string, unknown>,
  criteria: readonly CriterionDefinition[] = DEFAULT_CRITERIA
): Aggregation {
  const breakdown: CriterionScore[] = [];
  const lines: string[] = [];

  for (const { key } of criteria) {
    const rating = readRating(evaluations[key]);

    if (rating === null) {
      breakdown.push({ key, rating: null, score: NEUTRAL_SCORE });
      lines.push(`${key}: Error in evaluation`);
      continue;
    }

    const score = mapRatingToScore(rating);
    breakdown.push({ key, rating, score });
    lines.push(`${key}: ${rating} (score: ${score})`);
  }

  if (breakdown.length === 0) {
    return {
      ranking: 2,
      average: NEUTRAL_SCORE,
      reasoning: 'No valid criteria evaluations',
      breakdown
    };
  }

  const average = breakdown.reduce((sum, c) => sum + c.score, 0) / breakdown.length;
  const ranking = clampRanking(roundHalfUp(average));

  const reasoning = [
    `Algorithmic aggregation: Average of criteria scores = ${average.toFixed(2)} → ${ranking}`,
    ...lines
  ].join('\n');

  return { ranking, average, reasoning, breakdown };
}
