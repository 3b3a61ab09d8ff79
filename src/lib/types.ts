export type Vector = readonly number[];

export type Resume = {
  /** Stable identifier, the original filename. */
  id: string;
  text: string;
};

export type ResumeFile = {
  filename: string;
  data: ArrayBuffer | Uint8Array;
};

export interface TaggedEntity {
  label: string;
  surfaceForm: string;
}

export interface TextEmbedder {
  encode(texts: readonly string[]): Promise<Vector[]>;
}

export interface EntityTagger {
  tagEntities(chunk: string): Promise<TaggedEntity[]>;
}

export interface SkillSource {
  extract(text: string): Promise<string[]>;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type ScoredCandidate = Readonly<{
  candidateName: string;
  sourceId: string;
  similarity: number;
  fullTextSimilarity: number;
  skillsSimilarity: number;
  matchedSkills: readonly string[];
  missingSkills: readonly string[];
  skillCount: number;
  totalSkills: number;
  skillMatchRate: number;
  jdSkills: readonly string[];
  // Filled in later when a fit summary is requested.
  summary: string | null;
}>;

export interface CoverageRow {
  candidate: string;
  sourceId: string;
  matchedSkills: string[];
  missingSkills: string[];
  coveragePercentage: number;
  matchCount: number;
  missingCount: number;
}

export interface CoverageReport {
  rows: CoverageRow[];
  jdSkills: string[];
}

export interface MissingSkillCount {
  skill: string;
  candidatesMissing: number;
}

export interface CoverageMatrix {
  candidates: string[];
  skills: string[];
  /** cells[candidate][skill], 1 when matched. */
  cells: number[][];
}

export interface GapSummaryRow {
  candidate: string;
  coverage: string;
  has: number;
  missing: number;
  keyGaps: string;
}
