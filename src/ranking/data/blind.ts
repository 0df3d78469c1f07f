/**
 * Blind mode
 */

import { REDACTED_NAME } from '../pipelines/base';
import type { Candidate } from '../types';

/**
 * New candidate whose first line (the name heading) is replaced by the
 * redaction marker. The input is left untouched.
 */
export function blindCandidate(candidate: Candidate): Candidate {
  const newline = candidate.content.indexOf('\n');
  const rest = newline === -1 ? '' : candidate.content.substring(newline);
  return { id: candidate.id, content: `${REDACTED_NAME}${rest}` };
}

export function blindCandidates(candidates: readonly Candidate[]): Candidate[] {
  return candidates.map(blindCandidate);
}
