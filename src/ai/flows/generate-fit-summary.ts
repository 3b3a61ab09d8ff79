/**
 * @fileOverview Short recruiter-facing rationale for why a candidate fits a role,
 * grounded on the résumé sentences most similar to the job description.
 *
 * - createFitSummarizer - Builds the summarizer around an embedder and an optional generator.
 * - createGenkitSummaryGenerator - The Genkit prompt used as generator.
 * - summariesAvailable - Whether a model credential is configured.
 */

import { z, type Genkit } from 'genkit';
import type { AppConfig } from '@/lib/config';
import { errorMessage } from '@/lib/errors';
import { logWarning } from '@/lib/logger';
import { topKSnippets } from '@/lib/snippetizer';
import type { TextEmbedder } from '@/lib/types';

const FitSummaryInputSchema = z.object({
  jobDescription: z.string().describe('The job description, as posted.'),
  evidence: z.string().describe('The most relevant resume sentences, joined by bullets.'),
});
export type FitSummaryInput = z.infer<typeof FitSummaryInputSchema>;

export type SummaryGenerator = (input: FitSummaryInput) => Promise<string>;

export function summariesAvailable(config: Pick<AppConfig, 'apiKey'>): boolean {
  return Boolean(config.apiKey);
}

export function createGenkitSummaryGenerator(ai: Genkit): SummaryGenerator {
  const prompt = ai.definePrompt({
    name: 'fitSummaryPrompt',
    input: { schema: FitSummaryInputSchema },
    config: { temperature: 0.2, maxOutputTokens: 150 },
    prompt: `You are a recruiting assistant. In 2-3 concise sentences, explain why this candidate is a strong match for the role. Specifically mention:
1. Which technical skills/technologies from the job description they possess
2. Relevant experience or achievements that align with the role
Base your answer ONLY on the evidence provided.

JOB DESCRIPTION:
{{{jobDescription}}}

EVIDENCE FROM RESUME (most relevant sections):
{{{evidence}}}

Focus on specific skill matches and experiences. Be concrete, not generic.`,
  });

  return async input => {
    const response = await prompt(input);
    return response.text;
  };
}

export const EVIDENCE_FALLBACK_CHARS = 400;

export function fallbackSummary(snippets: readonly string[]): string {
  const evidence = snippets.slice(0, 2).join(' • ');
  return `Strong candidate based on relevant experience. Key highlights: ${evidence.slice(0, 200)}...`;
}

export interface FitSummarizerDeps {
  embedder: TextEmbedder;
  /** Absent when no model credential is configured. */
  generator?: SummaryGenerator | null;
}

export function createFitSummarizer({ embedder, generator }: FitSummarizerDeps) {
  return async function generateFitSummary(
    jobDescription: string,
    resumeText: string,
    { kSnippets = 5 }: { kSnippets?: number } = {}
  ): Promise<string> {
    let snippets = await topKSnippets(jobDescription, resumeText, kSnippets, embedder);
    if (!snippets.length) snippets = [resumeText.slice(0, EVIDENCE_FALLBACK_CHARS)];

    if (generator) {
      try {
        const text = (await generator({ jobDescription, evidence: snippets.join(' • ') })).trim();
        if (text) return text;
      } catch (e) {
        logWarning(`Error generating summary: ${errorMessage(e)}`);
      }
    }
    return fallbackSummary(snippets);
  };
}

export type FitSummarizer = ReturnType<typeof createFitSummarizer>;
