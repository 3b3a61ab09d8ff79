import { DEFAULT_RANKING_CONFIG, type RankingConfig } from '@/lib/config';
import { EmbeddingFailure, InputValidationError } from '@/lib/errors';
import { debug } from '@/lib/logger';
import { resolveCandidateName } from '@/lib/name-resolver';
import { exactSkillMatcher, splitSkills, type SkillMatcher } from '@/lib/skill-matcher';
import type { Resume, ScoredCandidate, SkillSource, TextEmbedder } from '@/lib/types';
import { clamp, cosine } from '@/lib/vector';

export type RankingWeights = Pick<
  RankingConfig,
  'fullTextWeight' | 'skillsWeight' | 'skillBonus' | 'jdSkillLimit' | 'matchThreshold'
>;

export interface RankOptions {
  topK?: number;
  embedder: TextEmbedder;
  skills: SkillSource;
  matcher?: SkillMatcher;
  weights?: Partial<RankingWeights>;
}

const SECTION_TRAILING_LINES = 4;
const SECTION_FALLBACK_CHARS = 300;

/**
 * Lines mentioning skills or technical content plus a few lines after each,
 * or the head of the text when there are none.
 */
export function skillsSection(text: string): string {
  const lines = text.split('\n');
  const picked: string[] = [];
  lines.forEach((line, i) => {
    const low = line.toLowerCase();
    if (low.includes('skill') || low.includes('technical')) {
      picked.push(...lines.slice(i, i + 1 + SECTION_TRAILING_LINES));
    }
  });
  return picked.length ? picked.join(' ') : text.slice(0, SECTION_FALLBACK_CHARS);
}

export function jobSkillsExcerpt(jobDescription: string, jdSkills: readonly string[]): string {
  return jdSkills.length ? jdSkills.join(', ') : skillsSection(jobDescription);
}

/** Matched skills count twice, then the résumé's other skills. */
export function resumeSkillsExcerpt(
  resumeText: string,
  resumeSkills: readonly string[],
  matched: readonly string[]
): string {
  const matchedSet = new Set(matched);
  const rest = resumeSkills.filter(s => !matchedSet.has(s));
  const parts = [...matched, ...matched, ...rest];
  return parts.length ? parts.join(', ') : skillsSection(resumeText);
}

type Evaluated = {
  resume: Resume;
  skills: string[];
  matched: string[];
  missing: string[];
  rate: number;
};

/**
 * Scores every résumé against the job description on two cosine channels
 * (full text and skills excerpt), adds a bonus for the share of job skills
 * matched, and returns the best `topK` candidates, highest first.
 */
export async function rankCandidates(
  jobDescription: string,
  resumes: readonly Resume[],
  options: RankOptions
): Promise<ScoredCandidate[]> {
  const w: RankingWeights = { ...DEFAULT_RANKING_CONFIG, ...options.weights };
  const topK = options.topK ?? resumes.length;
  const matcher = options.matcher ?? exactSkillMatcher;

  if (!resumes.length) throw new InputValidationError('At least one résumé is required for ranking.');
  if (!jobDescription.trim()) throw new InputValidationError('Job description cannot be empty.');
  if (!Number.isInteger(topK) || topK < 1) {
    throw new InputValidationError(`topK must be a positive integer, got ${topK}.`);
  }

  // 1) Job skills, most frequent first
  const jdSkills = (await options.skills.extract(jobDescription)).slice(0, w.jdSkillLimit);

  // 2) Per-résumé skills and coverage
  const evaluated: Evaluated[] = [];
  for (const resume of resumes) {
    const skills = await options.skills.extract(resume.text);
    const { matched, missing } = splitSkills(
      jdSkills,
      { text: resume.text, skills: new Set(skills) },
      matcher,
      w.matchThreshold
    );
    const rate = jdSkills.length ? matched.length / jdSkills.length : 0;
    evaluated.push({ resume, skills, matched, missing, rate });
  }

  // 3) Full-text channel
  const fullEmbs = await options.embedder.encode([jobDescription, ...resumes.map(r => r.text)]);
  // 4) Skills channel
  const skillEmbs = await options.embedder.encode([
    jobSkillsExcerpt(jobDescription, jdSkills),
    ...evaluated.map(e => resumeSkillsExcerpt(e.resume.text, e.skills, e.matched)),
  ]);

  if (fullEmbs.length !== resumes.length + 1 || skillEmbs.length !== resumes.length + 1) {
    throw new EmbeddingFailure(`Embedder returned ${fullEmbs.length}/${skillEmbs.length} vectors for ${resumes.length + 1} texts.`);
  }

  const [jdFull, ...resFull] = fullEmbs;
  const [jdSkillVec, ...resSkills] = skillEmbs;

  // 5) Weighted combination plus bounded bonus
  const scored = evaluated.map((e, i): ScoredCandidate => {
    const fullSim = cosine(jdFull, resFull[i]);
    const skillsSim = cosine(jdSkillVec, resSkills[i]);
    const combined = w.fullTextWeight * fullSim + w.skillsWeight * skillsSim;
    const similarity = clamp(Math.min(combined + w.skillBonus * e.rate, 1));

    debug(`[rank] ${e.resume.id}: full=${fullSim.toFixed(3)} skills=${skillsSim.toFixed(3)} final=${similarity.toFixed(3)}`);

    return {
      candidateName: resolveCandidateName(e.resume.text, e.resume.id),
      sourceId: e.resume.id,
      similarity,
      fullTextSimilarity: fullSim,
      skillsSimilarity: skillsSim,
      matchedSkills: e.matched,
      missingSkills: e.missing,
      skillCount: e.matched.length,
      totalSkills: jdSkills.length,
      skillMatchRate: e.rate,
      jdSkills,
      summary: null,
    };
  });

  // 6) Stable sort, ties keep input order
  return scored.sort((a, b) => b.similarity - a.similarity).slice(0, topK);
}
