/**
 * Tests for cross-run difference analysis
 */

import { describe, it, expect } from 'vitest';
import {
  analyzeDifferences,
  formatDifferences,
  sampleVariance
} from '../../ranking/collector/differences';
import { ranking, runResult } from '../helpers/fixtures';

const RESULTS = [
  runResult('one_shot', 'openai', 'gpt-a', [ranking('c1', 'Ada', 4), ranking('c2', 'Bo', 2)]),
  runResult('multi_layer', 'openai', 'gpt-a', [ranking('c1', 'Ada', 2), ranking('c2', 'Bo', 2)]),
  runResult('one_shot', 'anthropic', 'claude-b', [ranking('c1', 'Ada', 3), ranking('c2', 'Bo', 2)])
];

describe('Difference Analysis', () => {
  it('should use the sample variance', () => {
    expect(sampleVariance([4, 2, 3])).toBe(1);
    expect(sampleVariance([1, 4])).toBe(4.5);
    expect(sampleVariance([3])).toBe(0);
    expect(sampleVariance([])).toBe(0);
  });

  it('should report the spread for each CV, most disagreement first', () => {
    const reports = analyzeDifferences(RESULTS, {
      c1: { original_id: 'orig-1', original_name: 'Ada Original' }
    });

    expect(reports.map(r => r.cvId)).toEqual(['c1', 'c2']);

    const [ada, bo] = reports;
    expect(ada).toMatchObject({
      originalId: 'orig-1',
      name: 'Ada Original',
      totalEvaluations: 3,
      uniqueRankings: [2, 3, 4],
      distribution: { '4': 1, '2': 1, '3': 1 },
      min: 2,
      max: 4,
      range: 2,
      average: 3,
      variance: 1,
      std: 1
    });
    expect(ada.byPipeline).toEqual({
      one_shot: { rankings: [4, 3], counterparts: ['gpt-a', 'claude-b'], average: 3.5 },
      multi_layer: { rankings: [2], counterparts: ['gpt-a'], average: 2 }
    });
    expect(ada.byModel).toEqual({
      'gpt-a': { rankings: [4, 2], counterparts: ['one_shot', 'multi_layer'], average: 3 },
      'claude-b': { rankings: [3], counterparts: ['one_shot'], average: 3 }
    });

    expect(bo).toMatchObject({ originalId: 'c2', name: 'Bo', variance: 0, range: 0 });
  });

  it('should round the spread to two decimals', () => {
    const [report] = analyzeDifferences([
      runResult('one_shot', 'openai', 'm1', [ranking('c1', 'Ada', 1)]),
      runResult('one_shot', 'openai', 'm2', [ranking('c1', 'Ada', 4)])
    ]);
    expect(report.variance).toBe(4.5);
    expect(report.std).toBe(2.12);
    expect(report.average).toBe(2.5);
  });

  it('should render a plain-text report', () => {
    const text = formatDifferences(analyzeDifferences(RESULTS));
    const lines = text.split('\n');

    expect(lines[0]).toBe('CV: Ada (c1)');
    expect(lines).toContain('  Range: 2 - 4 (span: 2)');
    expect(lines).toContain('  Variance: 1.00 (Std Dev: 1.00)');
    expect(lines).toContain('    one_shot: [4, 3] (avg: 3.50)');
  });
});
