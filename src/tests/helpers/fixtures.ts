/**
 * PipelineRunResult builders for collector and analysis tests
 */

import type { PipelineName, PipelineRunResult, RankingResult, RankingValue } from '../../ranking/types';

export function ranking(
  candidateId: string,
  displayName: string,
  value: RankingValue,
  reasoning = ''
): RankingResult {
  return { candidateId, displayName, ranking: value, reasoning };
}

export function runResult(
  pipelineName: PipelineName,
  providerName: string,
  modelName: string,
  rankings: RankingResult[],
  tokens: { prompt: number; completion: number } = { prompt: 0, completion: 0 }
): PipelineRunResult {
  return {
    pipelineName,
    providerName,
    modelName,
    rankings,
    analysis: { note: 'fixture' },
    metadata: {
      usage: {
        promptTokens: tokens.prompt,
        completionTokens: tokens.completion,
        totalTokens: tokens.prompt + tokens.completion,
        calls: rankings.length,
        failedCalls: 0
      },
      startedAt: '2024-03-05T10:00:00.000Z',
      completedAt: '2024-03-05T10:00:05.000Z',
      durationMs: 5000,
      candidateCount: rankings.length,
      failedUnits: rankings.filter(r => r.ranking === 0).length
    }
  };
}
