/**
 * Difference analysis
 *
 * How differently each CV was ranked across the pipelines and models of a
 * saved run. Reports are sorted by variance, most disagreement first.
 */

import type { IdMapping } from '../../shared/validation/schemas';
import type { PipelineRunResult } from '../types';

export interface RankingGroup {
  rankings: number[];
  /** Pipelines for a model group, models for a pipeline group */
  counterparts: string[];
  average: number;
}

export interface CandidateDifference {
  cvId: string;
  originalId: string;
  name: string;
  totalEvaluations: number;
  uniqueRankings: number[];
  distribution: Record<string, number>;
  min: number;
  max: number;
  range: number;
  average: number;
  /** Sample variance (n − 1); 0 for a single evaluation */
  variance: number;
  std: number;
  byPipeline: Record<string, RankingGroup>;
  byModel: Record<string, RankingGroup>;
}

interface Observation {
  name: string;
  pipeline: string;
  model: string;
  ranking: number;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function sampleVariance(values: readonly number[]): number {
  if (values.length < 2) {
    return 0;
  }
  const avg = mean(values);
  return values.reduce((sum, v) => sum + (v - avg) ** 2, 0) / (values.length - 1);
}

function group(
  observations: readonly Observation[],
  keyOf: (o: Observation) => string,
  counterpartOf: (o: Observation) => string
): Record<string, RankingGroup> {
  const groups: Record<string, RankingGroup> = {};
  for (const o of observations) {
    const entry = groups[keyOf(o)] ?? { rankings: [], counterparts: [], average: 0 };
    entry.rankings.push(o.ranking);
    entry.counterparts.push(counterpartOf(o));
    groups[keyOf(o)] = entry;
  }
  for (const entry of Object.values(groups)) {
    entry.average = round2(mean(entry.rankings));
  }
  return groups;
}

/**
 * Per-CV spread of rankings. With a mapping, sanitized ids are reported
 * next to their original id and name.
 */
export function analyzeDifferences(
  results: readonly PipelineRunResult[],
  mapping: IdMapping = {}
): CandidateDifference[] {
  const byCandidate = new Map<string, Observation[]>();

  for (const result of results) {
    for (const ranking of result.rankings) {
      const list = byCandidate.get(ranking.candidateId) ?? [];
      list.push({
        name: ranking.displayName,
        pipeline: result.pipelineName,
        model: result.modelName,
        ranking: ranking.ranking
      });
      byCandidate.set(ranking.candidateId, list);
    }
  }

  const reports: CandidateDifference[] = [];

  for (const [cvId, observations] of byCandidate) {
    const rankings = observations.map(o => o.ranking);
    const distribution: Record<string, number> = {};
    rankings.forEach(r => {
      distribution[String(r)] = (distribution[String(r)] ?? 0) + 1;
    });

    const min = Math.min(...rankings);
    const max = Math.max(...rankings);
    const variance = sampleVariance(rankings);
    const original = mapping[cvId];

    reports.push({
      cvId,
      originalId: original?.original_id ?? cvId,
      name: original?.original_name ?? observations[0].name,
      totalEvaluations: rankings.length,
      uniqueRankings: [...new Set(rankings)].sort((a, b) => a - b),
      distribution,
      min,
      max,
      range: max - min,
      average: round2(mean(rankings)),
      variance: round2(variance),
      std: round2(Math.sqrt(variance)),
      byPipeline: group(observations, o => o.pipeline, o => o.model),
      byModel: group(observations, o => o.model, o => o.pipeline)
    });
  }

  // Stable sort keeps first-seen order among equal variances
  return reports.sort((a, b) => b.variance - a.variance);
}

/**
 * Plain-text rendering for the CLI
 */
export function formatDifferences(reports: readonly CandidateDifference[]): string {
  const lines: string[] = [];
  for (const r of reports) {
    lines.push(
      `CV: ${r.name} (${r.originalId})`,
      `  Sanitized ID: ${r.cvId}`,
      `  Total Evaluations: ${r.totalEvaluations}`,
      `  Rankings Received: ${r.uniqueRankings.join(', ')}`,
      `  Range: ${r.min} - ${r.max} (span: ${r.range})`,
      `  Average: ${r.average.toFixed(2)}`,
      `  Variance: ${r.variance.toFixed(2)} (Std Dev: ${r.std.toFixed(2)})`,
      '  By Pipeline:',
      ...Object.entries(r.byPipeline).map(
        ([pipeline, g]) => `    ${pipeline}: [${g.rankings.join(', ')}] (avg: ${g.average.toFixed(2)})`
      ),
      '  By Model:',
      ...Object.entries(r.byModel).map(
        ([model, g]) => `    ${model}: [${g.rankings.join(', ')}] (avg: ${g.average.toFixed(2)})`
      ),
      ''
    );
  }
  return lines.join('\n');
}
