/**
 * Input loaders
 *
 * Candidate files, job documents and ID mappings are JSON. Missing or
 * malformed files raise ConfigurationError before any ranking work.
 */

import { promises as fs } from 'fs';
import { ConfigurationError } from '../../shared/errors/types';
import {
  CandidateInput,
  CandidateListSchema,
  IdMapping,
  IdMappingSchema,
  JobDocumentsSchema
} from '../../shared/validation/schemas';
import { parseInputFile } from '../../shared/validation/validator';
import type { Candidate, JobDocuments } from '../types';

async function readJson(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch {
    throw new ConfigurationError(`Input file not found: ${filePath}`, { path: filePath });
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(
      `Input file is not valid JSON: ${filePath} (${error instanceof Error ? error.message : String(error)})`,
      { path: filePath }
    );
  }
}

/**
 * Candidate records as stored, including the optional name of
 * unsanitized files
 */
export async function loadCandidateRecords(filePath: string): Promise<CandidateInput[]> {
  return parseInputFile(CandidateListSchema, await readJson(filePath), filePath);
}

export async function loadCandidates(filePath: string): Promise<Candidate[]> {
  const records = await loadCandidateRecords(filePath);
  return records.map(({ id, content }) => ({ id, content }));
}

export async function loadJobDocuments(filePath: string): Promise<JobDocuments> {
  return parseInputFile(JobDocumentsSchema, await readJson(filePath), filePath);
}

export async function loadIdMapping(filePath: string): Promise<IdMapping> {
  return parseInputFile(IdMappingSchema, await readJson(filePath), filePath);
}

/**
 * Keep the candidates whose id is listed, in file order. Unknown ids are a
 * configuration error.
 */
export function selectCandidates(candidates: readonly Candidate[], ids: readonly string[]): Candidate[] {
  const known = new Set(candidates.map(c => c.id));
  const missing = ids.filter(id => !known.has(id));
  if (missing.length > 0) {
    throw new ConfigurationError(`Unknown candidate ids: ${missing.join(', ')}`, { missing });
  }
  const wanted = new Set(ids);
  return candidates.filter(c => wanted.has(c.id));
}
