import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { InputValidationError } from '@/lib/errors';

/* ----------------------------- Ranking tunables ----------------------------- */

export const RankingConfigSchema = z.object({
  fullTextWeight: z.number().min(0).max(1),
  skillsWeight: z.number().min(0).max(1),
  skillBonus: z.number().min(0).max(1),
  jdSkillLimit: z.number().int().min(1),
  partialMatchRatio: z.number().gt(0).max(1),
  partialMatchConfidence: z.number().min(0).max(1),
  matchThreshold: z.number().min(0).max(1),
  chunkSize: z.number().int().min(16),
  minSkillLength: z.number().int().min(1),
  maxSkillLength: z.number().int().min(1),
  sectionCharBudget: z.number().int().min(1),
  fullTextCharBudget: z.number().int().min(1),
  sectionWindow: z.number().int().min(0),
  embeddingBatchSize: z.number().int().min(1),
});
export type RankingConfig = z.infer<typeof RankingConfigSchema>;

export const DEFAULT_RANKING_CONFIG: RankingConfig = {
  fullTextWeight: 0.35,
  skillsWeight: 0.65,
  skillBonus: 0.1,
  jdSkillLimit: 20,
  partialMatchRatio: 0.6,
  partialMatchConfidence: 0.8,
  matchThreshold: 0.5,
  chunkSize: 400,
  minSkillLength: 3,
  maxSkillLength: 50,
  sectionCharBudget: 3000,
  fullTextCharBudget: 2000,
  sectionWindow: 3,
  embeddingBatchSize: 32,
};

/* ------------------------------- Environment -------------------------------- */

const EnvSchema = z.object({
  GEMINI_API_KEY: z.string().trim().optional(),
  GOOGLE_API_KEY: z.string().trim().optional(),
  GENKIT_MODEL: z.string().trim().min(1).default('googleai/gemini-2.0-flash'),
  GENKIT_EMBEDDER: z.string().trim().min(1).default('googleai/text-embedding-004'),
  RANKER_TOP_K: z.coerce.number().int().min(1).max(20).default(10),
  RANKER_K_SNIPPETS: z.coerce.number().int().min(1).max(10).default(5),
  RANKER_MAX_RESUMES: z.coerce.number().int().min(1).default(30),
  RANKER_MAX_FILE_MB: z.coerce.number().positive().default(5),
});

export interface AppConfig {
  apiKey: string | null;
  model: string;
  embedder: string;
  topK: number;
  kSnippets: number;
  maxResumes: number;
  maxFileSizeMb: number;
  ranking: RankingConfig;
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  ranking: Partial<RankingConfig> = {}
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InputValidationError(`Invalid configuration for ${issue.path.join('.')}: ${issue.message}`);
  }
  const e = parsed.data;

  const rankingParsed = RankingConfigSchema.safeParse({ ...DEFAULT_RANKING_CONFIG, ...ranking });
  if (!rankingParsed.success) {
    const issue = rankingParsed.error.issues[0];
    throw new InputValidationError(`Invalid ranking option ${issue.path.join('.')}: ${issue.message}`);
  }

  return {
    apiKey: e.GEMINI_API_KEY || e.GOOGLE_API_KEY || null,
    model: e.GENKIT_MODEL,
    embedder: e.GENKIT_EMBEDDER,
    topK: e.RANKER_TOP_K,
    kSnippets: e.RANKER_K_SNIPPETS,
    maxResumes: e.RANKER_MAX_RESUMES,
    maxFileSizeMb: e.RANKER_MAX_FILE_MB,
    ranking: rankingParsed.data,
  };
}

let envLoaded = false;

/** Reads `.env` once, then parses the process environment. */
export function configFromEnvironment(): AppConfig {
  if (!envLoaded) {
    loadEnv();
    envLoaded = true;
  }
  return loadConfig(process.env);
}
