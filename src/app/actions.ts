import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';

import { createFitSummarizer, summariesAvailable } from '@/ai/flows/generate-fit-summary';
import { createModelRegistry, type RankerRegistry } from '@/ai/registry';
import { configFromEnvironment, type AppConfig } from '@/lib/config';
import { ExtractionFailure, InputValidationError, errorMessage } from '@/lib/errors';
import { cleanJobDescription } from '@/lib/jd-cleaner';
import { logInfo, logWarning } from '@/lib/logger';
import { rankCandidates } from '@/lib/ranker';
import { containmentSkillMatcher } from '@/lib/skill-matcher';
import { SkillExtractor } from '@/lib/skill-extractor';
import { analyzeSkillsCoverage, missingSkillFrequency, skillsGapSummary } from '@/lib/skills-coverage';
import { extractText } from '@/lib/text-extractor';
import type {
  CoverageReport,
  GapSummaryRow,
  MissingSkillCount,
  Resume,
  ResumeFile,
  ScoredCandidate,
} from '@/lib/types';

export interface ActionDeps {
  config: AppConfig;
  registry: RankerRegistry;
  extract?: (file: ResumeFile) => Promise<string>;
}

let shared: ActionDeps | null = null;

/** Environment config plus one process-wide model registry. */
export function defaultDeps(): ActionDeps {
  if (!shared) {
    const config = configFromEnvironment();
    shared = { config, registry: createModelRegistry(config) };
  }
  return shared;
}

/* ---------------------------------- Input ---------------------------------- */

const ResumeFileSchema = z.object({
  filename: z.string().min(1),
  data: z.union([z.instanceof(ArrayBuffer), z.instanceof(Uint8Array)]),
});

const RankCandidatesInputSchema = z.object({
  jobDescription: z.string().trim().min(1, 'Job description cannot be empty.'),
  files: z.array(ResumeFileSchema).min(1, 'Upload at least one résumé.'),
  topK: z.number().int().min(1).max(20).optional(),
});
export type RankCandidatesInput = z.infer<typeof RankCandidatesInputSchema>;

function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new InputValidationError(parsed.error.issues.map(i => i.message).join(' '));
  }
  return parsed.data;
}

/* --------------------------------- Résumés --------------------------------- */

export interface LoadedResumes {
  resumes: Resume[];
  warnings: ExtractionFailure[];
}

/** `resume.txt`, `resume (2).txt`, `resume (3).txt`, ... */
function uniqueId(filename: string, taken: ReadonlySet<string>): string {
  if (!taken.has(filename)) return filename;
  const dot = filename.lastIndexOf('.');
  const stem = dot > 0 ? filename.slice(0, dot) : filename;
  const ext = dot > 0 ? filename.slice(dot) : '';
  let n = 2;
  while (taken.has(`${stem} (${n})${ext}`)) n++;
  return `${stem} (${n})${ext}`;
}

export async function loadResumes(
  files: readonly ResumeFile[],
  limits: Pick<AppConfig, 'maxResumes' | 'maxFileSizeMb'>,
  extract: (file: ResumeFile) => Promise<string> = extractText
): Promise<LoadedResumes> {
  const resumes: Resume[] = [];
  const warnings: ExtractionFailure[] = [];
  const ids = new Set<string>();
  const maxBytes = limits.maxFileSizeMb * 1024 * 1024;

  for (const [i, file] of files.entries()) {
    if (i >= limits.maxResumes) {
      warnings.push(new ExtractionFailure(file.filename, `skipped, only the first ${limits.maxResumes} files are ranked`));
      continue;
    }
    if (file.data.byteLength > maxBytes) {
      warnings.push(new ExtractionFailure(file.filename, `skipped (> ${limits.maxFileSizeMb} MB)`));
      continue;
    }
    const text = await extract(file);
    if (text.trim()) {
      const id = uniqueId(file.filename, ids);
      if (id !== file.filename) logInfo(`Duplicate filename ${file.filename} ranked as ${id}`);
      ids.add(id);
      resumes.push({ id, text });
    } else {
      warnings.push(new ExtractionFailure(file.filename, 'unsupported or empty file'));
    }
  }

  for (const w of warnings) logWarning(`Résumé excluded: ${w.message}`);
  return { resumes, warnings };
}

/* --------------------------------- Ranking --------------------------------- */

export interface RankingRun {
  runId: string;
  jobDescription: string;
  cleanedJobDescription: string;
  candidates: ScoredCandidate[];
  resumes: Resume[];
  jdSkills: string[];
  warnings: ExtractionFailure[];
}

export async function rankCandidatesAction(
  input: RankCandidatesInput,
  deps: ActionDeps = defaultDeps()
): Promise<RankingRun> {
  const parsed = parseInput(RankCandidatesInputSchema, input);
  const { config, registry } = deps;

  const { resumes, warnings } = await loadResumes(parsed.files, config, deps.extract);
  if (!resumes.length) throw new InputValidationError('No valid resumes processed.');

  const runId = uuidv4();
  let cleanedJobDescription = cleanJobDescription(parsed.jobDescription);
  if (!cleanedJobDescription) {
    logWarning(`[run ${runId}] cleaning removed the whole job description; ranking against the original text`);
    cleanedJobDescription = parsed.jobDescription.trim();
  }

  const embedder = await registry.acquire('embedder');
  try {
    const tagger = await registry.acquire('tagger');
    try {
      logInfo(`[run ${runId}] ranking ${resumes.length} résumés`);
      const candidates = await rankCandidates(cleanedJobDescription, resumes, {
        topK: parsed.topK ?? config.topK,
        embedder: embedder.model,
        skills: new SkillExtractor(tagger.model, config.ranking),
        weights: config.ranking,
      });
      return {
        runId,
        jobDescription: parsed.jobDescription,
        cleanedJobDescription,
        candidates,
        resumes,
        jdSkills: [...(candidates[0]?.jdSkills ?? [])],
        warnings,
      };
    } finally {
      tagger.release();
    }
  } finally {
    embedder.release();
  }
}

/* -------------------------------- Summaries -------------------------------- */

/**
 * Attaches a fit summary to every ranked candidate. Uses the raw job
 * description for the rationale. Returns the ranking unchanged when no
 * model credential is configured.
 */
export async function generateSummariesAction(
  run: RankingRun,
  deps: ActionDeps = defaultDeps(),
  { kSnippets }: { kSnippets?: number } = {}
): Promise<ScoredCandidate[]> {
  if (!summariesAvailable(deps.config)) {
    logWarning('Fit summaries are unavailable: no model credential configured.');
    return run.candidates;
  }

  const embedder = await deps.registry.acquire('embedder');
  try {
    const generator = await deps.registry.acquire('summarizer');
    try {
      const generateFitSummary = createFitSummarizer({ embedder: embedder.model, generator: generator.model });
      const byId = new Map(run.resumes.map(r => [r.id, r.text]));

      const out: ScoredCandidate[] = [];
      for (const candidate of run.candidates) {
        let summary = '';
        try {
          summary = await generateFitSummary(run.jobDescription, byId.get(candidate.sourceId) ?? '', {
            kSnippets: kSnippets ?? deps.config.kSnippets,
          });
        } catch (e) {
          logWarning(`Summary failed for ${candidate.sourceId}: ${errorMessage(e)}`);
        }
        out.push({ ...candidate, summary });
      }
      return out;
    } finally {
      generator.release();
    }
  } finally {
    embedder.release();
  }
}

/* --------------------------------- Coverage -------------------------------- */

export interface CoverageAnalysis extends CoverageReport {
  mostMissing: MissingSkillCount[];
  gaps: GapSummaryRow[];
}

export async function analyzeCoverageAction(
  run: RankingRun,
  deps: ActionDeps = defaultDeps(),
  { topN = 10 }: { topN?: number } = {}
): Promise<CoverageAnalysis> {
  const tagger = await deps.registry.acquire('tagger');
  try {
    const report = await analyzeSkillsCoverage(run.cleanedJobDescription, run.candidates, run.resumes, {
      skills: new SkillExtractor(tagger.model, deps.config.ranking),
      topN,
      jdSkills: run.jdSkills.length ? run.jdSkills : undefined,
      matcher: containmentSkillMatcher(deps.config.ranking),
      threshold: deps.config.ranking.matchThreshold,
    });
    return {
      ...report,
      mostMissing: missingSkillFrequency(report.rows),
      gaps: skillsGapSummary(report.rows),
    };
  } finally {
    tagger.release();
  }
}
