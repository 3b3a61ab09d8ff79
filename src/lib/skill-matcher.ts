import { DEFAULT_RANKING_CONFIG } from '@/lib/config';

/** What a job skill is matched against: the résumé text and its extracted skills. */
export interface MatchContext {
  text: string;
  skills: ReadonlySet<string>;
}

export interface SkillMatcher {
  readonly name: string;
  /** Whether `score` reads `context.skills`; if not, callers may skip extraction. */
  readonly usesExtractedSkills: boolean;
  /** Confidence in [0, 1] that the résumé shows `skill`. */
  score(skill: string, context: MatchContext): number;
}

/**
 * Set membership against the résumé's extracted skill phrases. Used by the
 * ranker, where both sides come out of the same extractor.
 */
export const exactSkillMatcher: SkillMatcher = {
  name: 'exact',
  usesExtractedSkills: true,
  score: (skill, { skills }) => (skills.has(skill.toLowerCase()) ? 1 : 0),
};

export interface ContainmentOptions {
  partialMatchRatio?: number;
  partialMatchConfidence?: number;
}

/**
 * Substring containment in the résumé text. A multi-word skill that is not
 * found verbatim still scores `partialMatchConfidence` when enough of its
 * words (only those longer than 3 characters count as hits) show up:
 * hits >= words * partialMatchRatio.
 */
export function containmentSkillMatcher(opts: ContainmentOptions = {}): SkillMatcher {
  const ratio = opts.partialMatchRatio ?? DEFAULT_RANKING_CONFIG.partialMatchRatio;
  const partial = opts.partialMatchConfidence ?? DEFAULT_RANKING_CONFIG.partialMatchConfidence;

  return {
    name: 'containment',
    usesExtractedSkills: false,
    score(skill, { text }) {
      const s = skill.toLowerCase();
      const haystack = text.toLowerCase();
      if (haystack.includes(s)) return 1;

      const parts = s.split(/\s+/).filter(Boolean);
      if (parts.length > 1) {
        const hits = parts.filter(p => p.length > 3 && haystack.includes(p)).length;
        if (hits >= parts.length * ratio) return partial;
      }
      return 0;
    },
  };
}

export interface SkillSplit {
  matched: string[];
  missing: string[];
}

/** Partitions `jdSkills` by `matcher`, keeping their order. */
export function splitSkills(
  jdSkills: readonly string[],
  context: MatchContext,
  matcher: SkillMatcher,
  threshold = DEFAULT_RANKING_CONFIG.matchThreshold
): SkillSplit {
  const matched: string[] = [];
  const missing: string[] = [];
  for (const skill of jdSkills) {
    if (matcher.score(skill, context) > threshold) matched.push(skill);
    else missing.push(skill);
  }
  return { matched, missing };
}
