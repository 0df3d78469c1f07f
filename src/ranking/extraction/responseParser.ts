/**
 * Response Parser
 *
 * Turns free-form model output into structured data. Each rung of the
 * ladder is a pure function:
 *
 *   stripFences → decodeStrict → decodeLenient → scanRanking → sentinel
 *
 * Nothing here throws; a response with no usable structure comes back as
 * `{ kind: 'none' }` so the pipeline can apply its fallback policy.
 */

import { jsonrepair } from 'jsonrepair';
import { coerceRanking } from './coercion';
import type { RankingValue } from '../types';

export type JsonObject = Record<string, unknown>;

export type Extraction =
  | { kind: 'strict'; value: JsonObject }
  | { kind: 'lenient'; value: JsonObject }
  | { kind: 'none'; raw: string };

export type RankingDecode =
  | { source: 'structured'; ranking: RankingValue; value: JsonObject }
  | { source: 'pattern'; ranking: RankingValue; value?: JsonObject }
  | { source: 'none'; ranking: 0; value?: JsonObject };

const JSON_FENCE = /```json([\s\S]*?)(?:```|$)/i;
const ANY_FENCE = /```[\w-]*\n?([\s\S]*?)(?:```|$)/;
const RANKING_PATTERN = /"ranking"\s*:\s*(-?\d+)/;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Take the interior of a ```json block, else of any fenced block, else the
 * trimmed text itself. An unterminated fence runs to the end of the text.
 */
export function stripFences(raw: string): string {
  const text = raw.trim();

  const jsonBlock = JSON_FENCE.exec(text);
  if (jsonBlock) {
    return jsonBlock[1].trim();
  }

  const anyBlock = ANY_FENCE.exec(text);
  if (anyBlock) {
    return anyBlock[1].trim();
  }

  return text;
}

/**
 * Strict JSON parse; only objects count as structure
 */
export function decodeStrict(text: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Lenient decode: the outermost brace span, parsed as-is and then repaired
 */
export function decodeLenient(raw: string): JsonObject | null {
  const firstBrace = raw.indexOf('{');
  const lastBrace = raw.lastIndexOf('}');
  if (firstBrace === -1) {
    return null;
  }

  const span = lastBrace > firstBrace
    ? raw.substring(firstBrace, lastBrace + 1)
    : raw.substring(firstBrace);

  const direct = decodeStrict(span);
  if (direct) {
    return direct;
  }

  try {
    return decodeStrict(jsonrepair(span));
  } catch {
    return null;
  }
}

/**
 * Last line of defense: find `"ranking": <integer>` anywhere in the text
 */
export function scanRanking(raw: string): number | null {
  const match = RANKING_PATTERN.exec(raw);
  return match ? Number.parseInt(match[1], 10) : null;
}

/**
 * Extract a JSON object from model output
 */
export function extractStructured(raw: string): Extraction {
  const strict = decodeStrict(stripFences(raw));
  if (strict) {
    return { kind: 'strict', value: strict };
  }

  const lenient = decodeLenient(raw);
  if (lenient) {
    return { kind: 'lenient', value: lenient };
  }

  return { kind: 'none', raw };
}

/**
 * Decode the `ranking` field of a response through the full ladder
 */
export function decodeRanking(raw: string): RankingDecode {
  const extraction = extractStructured(raw);
  const value = extraction.kind === 'none' ? undefined : extraction.value;

  if (value && 'ranking' in value) {
    return { source: 'structured', ranking: coerceRanking(value.ranking), value };
  }

  const scanned = scanRanking(raw);
  if (scanned !== null) {
    return { source: 'pattern', ranking: coerceRanking(scanned), value };
  }

  return { source: 'none', ranking: 0, value };
}

/**
 * Read a string field from a decoded object
 */
export function readString(value: JsonObject | undefined, key: string): string | undefined {
  const field = value?.[key];
  return typeof field === 'string' ? field : undefined;
}
