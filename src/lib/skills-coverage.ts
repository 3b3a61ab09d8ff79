import { DEFAULT_RANKING_CONFIG } from '@/lib/config';
import { InputValidationError } from '@/lib/errors';
import { logWarning } from '@/lib/logger';
import { containmentSkillMatcher, splitSkills, type SkillMatcher } from '@/lib/skill-matcher';
import type {
  CoverageMatrix,
  CoverageReport,
  CoverageRow,
  GapSummaryRow,
  MissingSkillCount,
  Resume,
  ScoredCandidate,
  SkillSource,
} from '@/lib/types';

export interface CoverageOptions {
  skills: SkillSource;
  topN?: number;
  /** Reuse a job skill list (e.g. the one the ranking produced) instead of re-extracting. */
  jdSkills?: readonly string[];
  matcher?: SkillMatcher;
  threshold?: number;
}

/**
 * Which job skills each of the top `topN` candidates has and lacks.
 */
export async function analyzeSkillsCoverage(
  jobDescription: string,
  ranked: readonly ScoredCandidate[],
  resumes: readonly Resume[],
  options: CoverageOptions
): Promise<CoverageReport> {
  const topN = options.topN ?? 10;
  const matcher = options.matcher ?? containmentSkillMatcher();
  const threshold = options.threshold ?? DEFAULT_RANKING_CONFIG.matchThreshold;

  const jdSkills = options.jdSkills
    ? [...options.jdSkills]
    : (await options.skills.extract(jobDescription)).slice(0, DEFAULT_RANKING_CONFIG.jdSkillLimit);

  if (!jdSkills.length) {
    logWarning('Could not extract skills from job description');
    return { rows: [], jdSkills: [] };
  }

  const byId = new Map(resumes.map(r => [r.id, r]));
  const rows: CoverageRow[] = [];

  for (const candidate of ranked.slice(0, topN)) {
    const resume = byId.get(candidate.sourceId);
    if (!resume) {
      throw new InputValidationError(`No résumé text for ranked candidate ${candidate.sourceId}.`);
    }

    const context = {
      text: resume.text,
      skills: new Set(matcher.usesExtractedSkills ? await options.skills.extract(resume.text) : []),
    };
    const { matched, missing } = splitSkills(jdSkills, context, matcher, threshold);

    rows.push({
      candidate: candidate.candidateName,
      sourceId: candidate.sourceId,
      matchedSkills: matched,
      missingSkills: missing,
      coveragePercentage: (matched.length / jdSkills.length) * 100,
      matchCount: matched.length,
      missingCount: missing.length,
    });
  }

  return { rows, jdSkills };
}

/** How many of the first `topN` rows miss each skill, most missed first. */
export function missingSkillFrequency(
  rows: readonly CoverageRow[],
  { topN = 5, limit = 10 }: { topN?: number; limit?: number } = {}
): MissingSkillCount[] {
  const counts = new Map<string, number>();
  for (const row of rows.slice(0, topN)) {
    for (const skill of row.missingSkills) counts.set(skill, (counts.get(skill) ?? 0) + 1);
  }
  return [...counts]
    .map(([skill, candidatesMissing]) => ({ skill, candidatesMissing }))
    .sort((a, b) => b.candidatesMissing - a.candidatesMissing)
    .slice(0, limit);
}

export function skillsCoverageMatrix(
  rows: readonly CoverageRow[],
  jdSkills: readonly string[],
  { topN = 5, skillLimit = 10 }: { topN?: number; skillLimit?: number } = {}
): CoverageMatrix {
  const picked = rows.slice(0, topN);
  const skills = jdSkills.slice(0, skillLimit);
  return {
    candidates: picked.map(r => r.candidate),
    skills,
    cells: picked.map(r => {
      const has = new Set(r.matchedSkills);
      return skills.map(s => (has.has(s) ? 1 : 0));
    }),
  };
}

export function skillsGapSummary(
  rows: readonly CoverageRow[],
  { topN = 5 }: { topN?: number } = {}
): GapSummaryRow[] {
  return rows.slice(0, topN).map(r => ({
    candidate: r.candidate,
    coverage: `${Math.round(r.coveragePercentage)}%`,
    has: r.matchCount,
    missing: r.missingCount,
    keyGaps: r.missingSkills.length ? r.missingSkills.slice(0, 3).join(', ') : 'None',
  }));
}
