/**
 * Candidate sanitizer
 *
 * Shuffles candidates and replaces their ids with random 8-character codes,
 * returning the mapping needed to de-anonymize reports afterwards.
 */

import type { CandidateInput, IdMapping } from '../../shared/validation/schemas';
import type { Candidate } from '../types';

export const SANITIZED_ID_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
export const SANITIZED_ID_LENGTH = 8;

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

export interface SanitizedCandidates {
  candidates: Candidate[];
  mapping: IdMapping;
}

export function generateSanitizedId(random: RandomSource = Math.random): string {
  let id = '';
  for (let i = 0; i < SANITIZED_ID_LENGTH; i++) {
    id += SANITIZED_ID_ALPHABET[Math.floor(random() * SANITIZED_ID_ALPHABET.length)];
  }
  return id;
}

/**
 * Fisher–Yates shuffle into a new array
 */
export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

export function sanitizeCandidates(
  records: readonly CandidateInput[],
  random: RandomSource = Math.random
): SanitizedCandidates {
  const candidates: Candidate[] = [];
  const mapping: IdMapping = {};

  for (const record of shuffle(records, random)) {
    let id = generateSanitizedId(random);
    while (id in mapping) {
      id = generateSanitizedId(random);
    }
    mapping[id] = { original_id: record.id, original_name: record.name ?? 'Unknown' };
    candidates.push({ id, content: record.content });
  }

  return { candidates, mapping };
}
