/**
 * Pipeline prompts
 *
 * Every prompt embeds the job description and the criteria (or one
 * criterion's section of them) alongside the candidate text.
 */

import { escapePromptText } from '../../shared/llm/prompts';
import type { Candidate, CriterionDefinition, CriterionEvaluation } from '../types';

const RANKING_SCALE = `Ranking scale:
4 = Excellent fit
3 = Good fit
2 = Borderline
1 = Not a fit`;

function candidateBlock(candidate: Candidate): string {
  return `CV (ID: ${candidate.id}):\n${escapePromptText(candidate.content)}`;
}

export function buildOneShotPrompt(candidate: Candidate, jobDescription: string, criteria: string): string {
  return `Rank the candidate below against the role.

Job Description:
${escapePromptText(jobDescription)}

Evaluation Criteria:
${escapePromptText(criteria)}

Candidate to Evaluate:
${candidateBlock(candidate)}

${RANKING_SCALE}

Respond with a JSON object:
{
  "cv_id": "${candidate.id}",
  "ranking": 1-4,
  "reasoning": "Why this ranking, citing the CV"
}`;
}

export function buildChainOfThoughtPrompt(candidate: Candidate, jobDescription: string, criteria: string): string {
  return `Rank the candidate below against the role, working through each step before deciding.

Job Description:
${escapePromptText(jobDescription)}

Evaluation Criteria:
${escapePromptText(criteria)}

Candidate to Evaluate:
${candidateBlock(candidate)}

Step 1: List the roles and experiences in the CV.
Step 2: Judge the quality and relevance of that experience.
Step 3: Assess the technical and interpersonal skills shown.
Step 4: Note gaps or concerns.
Step 5: Weigh everything against the criteria and decide.

${RANKING_SCALE}

Respond with a JSON object:
{
  "cv_id": "${candidate.id}",
  "step_by_step_reasoning": {
    "step_1_experiences": "...",
    "step_2_quality": "...",
    "step_3_skills": "...",
    "step_4_gaps": "...",
    "step_5_synthesis": "..."
  },
  "ranking": 1-4,
  "final_reasoning": "Why this ranking"
}`;
}

export function buildCriterionPrompt(
  candidate: Candidate,
  jobDescription: string,
  criterion: CriterionDefinition,
  criterionSection: string
): string {
  return `Evaluate this candidate against the "${criterion.name}" criterion only.

Job Description:
${escapePromptText(jobDescription)}

Criterion Details:
${escapePromptText(criterionSection)}

Candidate to Evaluate:
${candidateBlock(candidate)}

Rate the fit for this criterion as one of: Excellent, Good, Weak, Not a Fit.

Respond with a JSON object:
{
  "cv_id": "${candidate.id}",
  "rating": "Excellent/Good/Weak/Not a Fit",
  "evidence": "Specific evidence from the CV for this rating"
}`;
}

export function buildSynthesisPrompt(
  candidate: Candidate,
  jobDescription: string,
  evaluations: Record<string, CriterionEvaluation>
): string {
  return `Three criteria were evaluated separately for candidate ${candidate.id}. Combine them into one final ranking.

Job Description:
${escapePromptText(jobDescription)}

Criterion Evaluations:
${JSON.stringify(evaluations, null, 2)}

${RANKING_SCALE}

Respond with a JSON object:
{
  "cv_id": "${candidate.id}",
  "ranking": 1-4,
  "reasoning": "How the criterion ratings lead to this ranking"
}`;
}
