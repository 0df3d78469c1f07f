/**
 * Validation Schemas
 *
 * Zod schemas for the files the ranking tools read: candidate lists,
 * ID mappings, job documents, experiment config and persisted runs.
 */

import { z } from 'zod';
import { PIPELINE_NAMES } from '../../ranking/types';

/**
 * A single candidate record
 */
export const CandidateSchema = z.object({
  id: z.string().trim().min(1, 'Candidate id cannot be empty'),
  content: z.string(),
  /** Present on unsanitized files only */
  name: z.string().optional()
});

/**
 * Candidate file: an ordered array of candidates with unique ids.
 */
export const CandidateListSchema = z.array(CandidateSchema).superRefine((candidates, ctx) => {
  const seen = new Set<string>();
  candidates.forEach((candidate, index) => {
    if (seen.has(candidate.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'id'],
        message: `Duplicate candidate id: ${candidate.id}`
      });
    }
    seen.add(candidate.id);
  });
});

/**
 * Sanitized id → original identity, for de-anonymizing reports
 */
export const IdMappingSchema = z.record(
  z.string(),
  z.object({
    original_id: z.string(),
    original_name: z.string().default('Unknown')
  })
);

/**
 * Job description and detailed hiring criteria
 */
export const JobDocumentsSchema = z.object({
  jobDescription: z.string().trim().min(1, 'Job description cannot be empty'),
  criteria: z.string().trim().min(1, 'Criteria cannot be empty')
});

export const ProviderNameSchema = z.enum(['openai', 'anthropic', 'gemini']);

export const PipelineNameSchema = z.enum(PIPELINE_NAMES);

const ProviderSettingsSchema = z.object({
  models: z.array(z.string().min(1)).default([]),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional()
});

/**
 * Experiment config file (all sections optional; defaults fill the rest)
 */
export const ExperimentConfigFileSchema = z.object({
  providers: z.object({
    openai: ProviderSettingsSchema.optional(),
    anthropic: ProviderSettingsSchema.optional(),
    gemini: ProviderSettingsSchema.optional()
  }).partial().optional(),
  modelProviders: z.record(z.string(), ProviderNameSchema).optional(),
  pipelines: z.record(
    PipelineNameSchema,
    z.object({ enabled: z.boolean().default(true) })
  ).optional(),
  criteria: z.array(z.object({ name: z.string().min(1), key: z.string().min(1) })).min(1).optional(),
  retry: z.object({
    maxRetries: z.number().int().min(0).optional(),
    delayMs: z.number().int().min(0).optional()
  }).optional(),
  resultsDir: z.string().min(1).optional(),
  blind: z.boolean().optional()
});

const RankingValueSchema = z.union([
  z.literal(0), z.literal(1), z.literal(2), z.literal(3), z.literal(4)
]);

/**
 * A persisted pipeline run, as written by the result collector
 */
export const PipelineRunResultSchema = z.object({
  pipelineName: PipelineNameSchema,
  providerName: z.string(),
  modelName: z.string(),
  rankings: z.array(z.object({
    candidateId: z.string(),
    displayName: z.string(),
    ranking: RankingValueSchema,
    reasoning: z.string()
  })),
  analysis: z.record(z.string(), z.unknown()),
  metadata: z.object({
    usage: z.object({
      promptTokens: z.number(),
      completionTokens: z.number(),
      totalTokens: z.number(),
      calls: z.number(),
      failedCalls: z.number()
    }),
    startedAt: z.string(),
    completedAt: z.string(),
    durationMs: z.number(),
    candidateCount: z.number(),
    failedUnits: z.number()
  })
});

export type CandidateInput = z.infer<typeof CandidateSchema>;
export type IdMapping = z.infer<typeof IdMappingSchema>;
export type ExperimentConfigFile = z.infer<typeof ExperimentConfigFileSchema>;
