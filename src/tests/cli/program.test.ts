/**
 * Tests for the rank-cvs command line
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { createProgram, CliIO } from '../../cli/program';
import { ResultCollector, SUMMARY_FILE, DIFFERENCES_FILE } from '../../ranking/collector';
import type { ProviderFactory } from '../../ranking/experiment';
import { CandidateListSchema, IdMappingSchema } from '../../shared/validation/schemas';
import { createFakeProvider } from '../helpers/fakeProvider';
import { ranking, runResult } from '../helpers/fixtures';

interface CapturedIO extends CliIO {
  stdout: string[];
  stderr: string[];
}

function captureIO(): CapturedIO {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: line => { stdout.push(line); },
    err: line => { stderr.push(line); }
  };
}

async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(filePath, 'utf-8'));
}

describe('rank-cvs', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rank-cvs-'));
    process.exitCode = undefined;
  });

  afterEach(async () => {
    process.exitCode = undefined;
    await fs.rm(workDir, { recursive: true, force: true });
  });

  describe('sanitize', () => {
    it('should write shuffled candidates and a mapping back to the originals', async () => {
      const input = path.join(workDir, 'original.json');
      const output = path.join(workDir, 'out', 'candidates.json');
      const mappingFile = path.join(workDir, 'out', 'mapping.json');
      await fs.writeFile(input, JSON.stringify([
        { id: 'a', name: 'Ada', content: '# Ada\nCV' },
        { id: 'b', content: '# Bo\nCV' }
      ]));

      const io = captureIO();
      await createProgram({ io }).parseAsync([
        'node', 'rank-cvs', 'sanitize', '--input', input, '--output', output, '--mapping', mappingFile
      ]);

      expect(process.exitCode).toBeUndefined();
      expect(io.stdout[0]).toBe('Sanitized 2 CVs');

      const candidates = CandidateListSchema.parse(await readJson(output));
      const mapping = IdMappingSchema.parse(await readJson(mappingFile));
      expect(candidates.map(c => c.content).sort()).toEqual(['# Ada\nCV', '# Bo\nCV']);
      expect(candidates.every(c => c.name === undefined)).toBe(true);

      const entries = Object.entries(mapping);
      expect(candidates.map(c => c.id).sort()).toEqual(entries.map(([id]) => id).sort());
      expect(entries.map(([, v]) => v.original_id).sort()).toEqual(['a', 'b']);
      expect(entries.find(([, v]) => v.original_id === 'a')?.[1].original_name).toBe('Ada');
      expect(entries.find(([, v]) => v.original_id === 'b')?.[1].original_name).toBe('Unknown');
      expect(entries.every(([id]) => id !== 'a' && id !== 'b')).toBe(true);
    });

    it('should report a missing input file and set the exit code', async () => {
      const io = captureIO();
      await createProgram({ io }).parseAsync([
        'node', 'rank-cvs', 'sanitize', '--input', path.join(workDir, 'missing.json'),
        '--output', path.join(workDir, 'c.json'), '--mapping', path.join(workDir, 'm.json')
      ]);

      expect(process.exitCode).toBe(1);
      expect(io.stderr[0]).toContain('Input file not found');
    });
  });

  describe('analyze', () => {
    it('should print and save the ranking spread of a saved run', async () => {
      const resultsDir = path.join(workDir, 'results');
      const collector = new ResultCollector({ resultsDir });
      await collector.collect([
        runResult('one_shot', 'openai', 'gpt-x', [ranking('s1', 'Ada', 2)]),
        runResult('multi_layer', 'openai', 'gpt-x', [ranking('s1', 'Ada', 4)])
      ], 'run-1');

      const mappingFile = path.join(workDir, 'mapping.json');
      await fs.writeFile(mappingFile, JSON.stringify({ s1: { original_id: 'cv-001', original_name: 'Ada Lovelace' } }));

      const io = captureIO();
      await createProgram({ io }).parseAsync([
        'node', 'rank-cvs', 'analyze', 'run-1', '--results-dir', resultsDir, '--mapping', mappingFile
      ]);

      expect(process.exitCode).toBeUndefined();
      const report = io.stdout[0].split('\n');
      expect(report[0]).toBe('CV: Ada Lovelace (cv-001)');
      expect(report).toContain('  Rankings Received: 2, 4');
      expect(report).toContain('  Variance: 2.00 (Std Dev: 1.41)');

      const saved = await readJson(path.join(resultsDir, 'run-1', DIFFERENCES_FILE));
      expect(saved).toMatchObject([{ cvId: 's1', originalId: 'cv-001', average: 3, range: 2 }]);
    });

    it('should fail on an unknown run', async () => {
      const io = captureIO();
      await createProgram({ io }).parseAsync([
        'node', 'rank-cvs', 'analyze', 'nope', '--results-dir', path.join(workDir, 'results')
      ]);

      expect(process.exitCode).toBe(1);
      expect(io.stderr[0]).toContain('Run nope not found');
    });
  });

  describe('run', () => {
    async function writeInputs(): Promise<{ candidates: string; job: string }> {
      const candidates = path.join(workDir, 'candidates.json');
      const job = path.join(workDir, 'job.json');
      await fs.writeFile(candidates, JSON.stringify([
        { id: 'c1', content: '# Ada\nBuilt a team' },
        { id: 'c2', content: '# Bo\nRan sourcing' }
      ]));
      await fs.writeFile(job, JSON.stringify({
        jobDescription: 'Talent lead',
        criteria: '## Zero-to-One Operator\nBuilt things.'
      }));
      return { candidates, job };
    }

    it('should rank the candidates and save the run', async () => {
      const inputs = await writeInputs();
      const resultsDir = path.join(workDir, 'results');
      const factory = vi.fn<ProviderFactory>((_provider, model) =>
        createFakeProvider(() => '{"ranking": 3, "reasoning": "solid"}', model).provider
      );

      const io = captureIO();
      await createProgram({ io, providerFactory: factory }).parseAsync([
        'node', 'rank-cvs', 'run',
        '--candidates', inputs.candidates,
        '--job', inputs.job,
        '-m', 'gpt-x',
        '--pipeline', 'one_shot',
        '--cv', 'c2',
        '-n', 'cli-run',
        '--results-dir', resultsDir
      ]);

      expect(process.exitCode).toBeUndefined();
      expect(io.stdout[0]).toBe('Ranking 1 candidates');
      expect(io.stdout[1]).toBe(`Results saved to ${path.join(resultsDir, 'cli-run')}`);
      expect(factory).toHaveBeenCalledWith('openai', 'gpt-x', {});

      const summary = await readJson(path.join(resultsDir, 'cli-run', SUMMARY_FILE));
      expect(summary).toMatchObject({ runName: 'cli-run', totalRuns: 1, cvIds: ['c2'], failedUnits: 0 });
    });

    it('should exit non-zero when every combination is skipped', async () => {
      const inputs = await writeInputs();
      const factory = vi.fn<ProviderFactory>(() => {
        throw new Error('no credential');
      });

      const io = captureIO();
      await createProgram({ io, providerFactory: factory }).parseAsync([
        'node', 'rank-cvs', 'run',
        '--candidates', inputs.candidates,
        '--job', inputs.job,
        '-m', 'gpt-x',
        '--pipeline', 'one_shot',
        '--results-dir', path.join(workDir, 'results')
      ]);

      expect(process.exitCode).toBe(1);
      expect(io.stderr).toContain('No results to save');
      expect(io.stderr[0]).toBe('Skipped one_shot on gpt-x: no credential');
    });
  });
});
