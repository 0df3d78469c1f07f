/**
 * Tests for the result collector
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs, existsSync } from 'fs';
import os from 'os';
import path from 'path';
import {
  buildSummary,
  defaultRunName,
  formatRankingListing,
  resultFileStem,
  ResultCollector,
  toCsv,
  buildComparisonRows,
  escapeCsvField
} from '../../ranking/collector/resultCollector';
import { StorageError } from '../../shared/errors/types';
import { loggers } from '../../shared/logging/logger';
import { ranking, runResult } from '../helpers/fixtures';

const ONE_SHOT = runResult(
  'one_shot',
  'openai',
  'gpt-test',
  [
    ranking('c1', 'Ada', 3, 'Good, solid'),
    ranking('c2', 'Bo', 4, 'He said "great"'),
    ranking('c3', 'Cy', 0)
  ],
  { prompt: 100, completion: 50 }
);

const DECOMPOSED = runResult(
  'decomposed_algorithmic',
  'anthropic',
  'claude-test',
  [ranking('c1', 'Ada', 2, 'x\ny')],
  { prompt: 20, completion: 10 }
);

describe('Result Collector', () => {
  describe('report builders', () => {
    it('should name runs by local timestamp', () => {
      expect(defaultRunName(new Date(2024, 2, 5, 9, 8, 7))).toBe('experiment_20240305_090807');
    });

    it('should build file stems from pipeline, provider and model', () => {
      expect(resultFileStem(ONE_SHOT)).toBe('one_shot_openai_gpt-test');
      expect(resultFileStem({ ...ONE_SHOT, modelName: 'models/gemini-pro' })).toBe('one_shot_openai_models-gemini-pro');
    });

    it('should list rankings by ranking descending, then by name', () => {
      const tie = runResult('one_shot', 'openai', 'gpt-test', [
        ranking('c9', 'Zed', 3),
        ranking('c1', 'Ada', 3),
        ranking('c5', 'Max', 4)
      ]);
      const names = formatRankingListing(tie)
        .split('\n')
        .filter(line => line.startsWith('Name: '));
      expect(names).toEqual(['Name: Max', 'Name: Ada', 'Name: Zed']);
    });

    it('should format the listing header and entries', () => {
      const lines = formatRankingListing(ONE_SHOT).split('\n');
      expect(lines.slice(0, 10)).toEqual([
        'Pipeline: one_shot',
        'Provider: openai',
        'Model: gpt-test',
        '='.repeat(60),
        '',
        'Ranking: 4 (Excellent Fit)',
        'Name: Bo',
        'CV ID: c2',
        'Reasoning: He said "great"',
        '-'.repeat(60)
      ]);
      expect(lines).toContain('Ranking: 0 (Unknown)');
    });

    it('should summarize runs per pipeline, provider and model', () => {
      const summary = buildSummary([ONE_SHOT, DECOMPOSED], 'run-a', new Date('2024-03-05T10:20:30Z'));

      expect(summary).toEqual({
        runName: 'run-a',
        timestamp: '2024-03-05T10:20:30.000Z',
        totalRuns: 2,
        pipelines: {
          one_shot: { count: 1, models: ['gpt-test'], totalTokens: 150, cvCount: 3 },
          decomposed_algorithmic: { count: 1, models: ['claude-test'], totalTokens: 30, cvCount: 1 }
        },
        providers: { openai: 1, anthropic: 1 },
        models: { 'gpt-test': 1, 'claude-test': 1 },
        cvIds: ['c1', 'c2', 'c3'],
        failedUnits: 1
      });
    });

    it('should quote CSV fields only when needed', () => {
      expect(escapeCsvField('plain')).toBe('plain');
      expect(escapeCsvField(3)).toBe('3');
      expect(escapeCsvField('a,b')).toBe('"a,b"');
      expect(escapeCsvField('say "hi"')).toBe('"say ""hi"""');
      expect(escapeCsvField('line\nbreak')).toBe('"line\nbreak"');
    });

    it('should write one comparison row per candidate and run', () => {
      expect(toCsv(buildComparisonRows([ONE_SHOT, DECOMPOSED]))).toBe(
        'cv_id,name,pipeline,provider,model,ranking,ranking_label,reasoning,total_tokens,prompt_tokens,completion_tokens\n' +
        'c1,Ada,one_shot,openai,gpt-test,3,Good Fit,"Good, solid",150,100,50\n' +
        'c2,Bo,one_shot,openai,gpt-test,4,Excellent Fit,"He said ""great""",150,100,50\n' +
        'c3,Cy,one_shot,openai,gpt-test,0,Unknown,,150,100,50\n' +
        'c1,Ada,decomposed_algorithmic,anthropic,claude-test,2,Borderline,"x\ny",30,20,10\n'
      );
    });
  });

  describe('persistence', () => {
    let tmpDir: string;
    let collector: ResultCollector;

    beforeEach(async () => {
      tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rank-results-'));
      collector = new ResultCollector({
        resultsDir: tmpDir,
        now: () => new Date(2024, 0, 2, 3, 4, 5)
      });
    });

    afterEach(async () => {
      vi.restoreAllMocks();
      await fs.rm(tmpDir, { recursive: true, force: true });
    });

    it('should write every artifact into the run directory', async () => {
      const run = await collector.collect([ONE_SHOT, DECOMPOSED], 'run-a');

      expect(run.directory).toBe(path.join(tmpDir, 'run-a'));
      const files = (await fs.readdir(run.directory)).sort();
      expect(files).toEqual([
        'comparison.csv',
        'decomposed_algorithmic_anthropic_claude-test.json',
        'decomposed_algorithmic_anthropic_claude-test_rankings.txt',
        'one_shot_openai_gpt-test.json',
        'one_shot_openai_gpt-test_rankings.txt',
        'summary.json'
      ]);
      expect(run.files).toHaveLength(6);

      const summary: unknown = JSON.parse(await fs.readFile(path.join(run.directory, 'summary.json'), 'utf-8'));
      expect(summary).toEqual(run.summary);
    });

    it('should name unnamed runs by timestamp', async () => {
      const run = await collector.collect([ONE_SHOT]);
      expect(run.runName).toBe('experiment_20240102_030405');
    });

    it('should refuse an empty result set before touching the disk', async () => {
      const nested = new ResultCollector({ resultsDir: path.join(tmpDir, 'nested') });

      await expect(nested.collect([], 'empty')).rejects.toBeInstanceOf(StorageError);
      await expect(nested.collect([], 'empty')).rejects.toThrow('No results to save');
      expect(existsSync(path.join(tmpDir, 'nested'))).toBe(false);
    });

    it('should warn and replace the earlier run when the name is reused', async () => {
      const warn = vi.spyOn(loggers.collector, 'warn');

      await collector.collect([ONE_SHOT], 'same');
      expect(warn).not.toHaveBeenCalled();

      await collector.collect([DECOMPOSED], 'same');
      expect(warn).toHaveBeenCalledTimes(1);

      const summary: unknown = JSON.parse(
        await fs.readFile(path.join(tmpDir, 'same', 'summary.json'), 'utf-8')
      );
      expect(summary).toMatchObject({ totalRuns: 1, cvIds: ['c1'] });

      expect((await fs.readdir(path.join(tmpDir, 'same'))).sort()).toEqual([
        'comparison.csv',
        'decomposed_algorithmic_anthropic_claude-test.json',
        'decomposed_algorithmic_anthropic_claude-test_rankings.txt',
        'summary.json'
      ]);
      expect(await collector.loadRun('same')).toEqual([DECOMPOSED]);
    });

    it('should reload saved runs', async () => {
      await collector.collect([ONE_SHOT, DECOMPOSED], 'run-a');

      const loaded = await collector.loadRun('run-a');

      expect(loaded).toEqual([DECOMPOSED, ONE_SHOT]);
      expect(await collector.listRuns()).toEqual(['run-a']);
    });

    it('should reject unknown runs', async () => {
      await expect(collector.loadRun('missing')).rejects.toBeInstanceOf(StorageError);
    });

    it('should reject result files that do not match the schema', async () => {
      await collector.collect([ONE_SHOT], 'run-b');
      await fs.writeFile(path.join(tmpDir, 'run-b', 'bogus.json'), '{"pipelineName": "bogus"}', 'utf-8');

      await expect(collector.loadRun('run-b')).rejects.toThrow('Invalid result file bogus.json');
    });
  });
});
