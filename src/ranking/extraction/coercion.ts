/**
 * Ranking coercion
 *
 * Models return the ranking field as an integer, a float, a numeric string
 * or occasionally a map of sub-scores. Every pipeline funnels the field
 * through {@link coerceRanking}.
 */

import type { RankingValue } from '../types';

/**
 * Round half-up: 2.5 → 3. Rankings are never negative, so this matches
 * Math.round for every value that reaches it.
 */
export function roundHalfUp(value: number): number {
  return Math.round(value);
}

function toRankingValue(value: number): RankingValue {
  switch (value) {
    case 1:
    case 2:
    case 3:
    case 4:
      return value;
    default:
      return 0;
  }
}

function parseNumeric(value: string): number | null {
  const trimmed = value.trim();
  if (trimmed === '') {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Coerce a raw `ranking` field into the 0–4 scale.
 *
 * - integer → as-is
 * - float or numeric string → truncated
 * - object of sub-scores → mean of its numeric values, rounded half-up
 * - anything else → 0
 *
 * Values outside 1–4 become 0.
 */
export function coerceRanking(value: unknown): RankingValue {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? toRankingValue(Math.trunc(value)) : 0;
  }

  if (typeof value === 'string') {
    const parsed = parseNumeric(value);
    return parsed === null ? 0 : toRankingValue(Math.trunc(parsed));
  }

  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    const numbers = Object.values(value).filter(
      (v): v is number => typeof v === 'number' && Number.isFinite(v)
    );
    if (numbers.length === 0) {
      return 0;
    }
    const mean = numbers.reduce((sum, n) => sum + n, 0) / numbers.length;
    return toRankingValue(roundHalfUp(mean));
  }

  return 0;
}
