export {
  analyzeCoverageAction,
  defaultDeps,
  generateSummariesAction,
  loadResumes,
  rankCandidatesAction,
  type ActionDeps,
  type CoverageAnalysis,
  type RankCandidatesInput,
  type RankingRun,
} from '@/app/actions';
export { Embedder, GenkitEmbeddingBackend, type EmbeddingBackend } from '@/ai/embedder';
export { createFitSummarizer, summariesAvailable, type SummaryGenerator } from '@/ai/flows/generate-fit-summary';
export { createGenkitEntityTagger } from '@/ai/flows/tag-skill-entities';
export { ModelRegistry, SerializedTagger, createModelRegistry, type ModelHandle } from '@/ai/registry';
export { DEFAULT_RANKING_CONFIG, loadConfig, type AppConfig, type RankingConfig } from '@/lib/config';
export * from '@/lib/errors';
export { exportRankingCsv } from '@/lib/export';
export { cleanJobDescription } from '@/lib/jd-cleaner';
export { resolveCandidateName } from '@/lib/name-resolver';
export { rankCandidates, type RankOptions } from '@/lib/ranker';
export { SkillExtractor } from '@/lib/skill-extractor';
export { containmentSkillMatcher, exactSkillMatcher, splitSkills, type SkillMatcher } from '@/lib/skill-matcher';
export {
  analyzeSkillsCoverage,
  missingSkillFrequency,
  skillsCoverageMatrix,
  skillsGapSummary,
} from '@/lib/skills-coverage';
export { topKSnippets } from '@/lib/snippetizer';
export { extractText } from '@/lib/text-extractor';
export type * from '@/lib/types';
