import { DEFAULT_RANKING_CONFIG, type RankingConfig } from '@/lib/config';
import { TaggingFailure, type TaggingPass } from '@/lib/errors';
import { logWarning } from '@/lib/logger';
import type { EntityTagger, Result, SkillSource, TaggedEntity } from '@/lib/types';

export const SKILL_LABELS: readonly string[] = [
  'SKILL',
  'HARD_SKILL',
  'SOFT_SKILL',
  'KNOWLEDGE',
  'TECHNOLOGY',
  'TOOL',
  'FRAMEWORK',
  'PROGRAMMING_LANGUAGE',
  'CERTIFICATION',
];

const SECTION_KEYWORDS = [
  'skill',
  'technical',
  'expertise',
  'qualification',
  'experience',
  'proficien',
  'requirement',
];

const BULLET = /^\s*(?:[-*•▪●◦‣]|\d+[.)])\s+/;

export type SkillExtractorOptions = Pick<
  RankingConfig,
  'chunkSize' | 'minSkillLength' | 'maxSkillLength' | 'sectionCharBudget' | 'fullTextCharBudget' | 'sectionWindow'
> & { skillLabels: readonly string[] };

/* --------------------------------- Helpers --------------------------------- */

/**
 * Lines that look like skills content (keyword or bullet) plus the
 * `window` lines after each, capped at `budget` characters.
 */
export function focusedExcerpt(text: string, window: number, budget: number): string {
  const lines = text.split('\n');
  const picked = new Set<number>();
  lines.forEach((line, i) => {
    const low = line.toLowerCase();
    if (SECTION_KEYWORDS.some(k => low.includes(k)) || BULLET.test(line)) {
      for (let j = i; j <= Math.min(i + window, lines.length - 1); j++) picked.add(j);
    }
  });
  const excerpt = [...picked]
    .sort((a, b) => a - b)
    .map(i => lines[i])
    .join('\n');
  return excerpt.slice(0, budget);
}

/** Splits on word boundaries into chunks of at most `size` characters. */
export function chunkText(text: string, size: number): string[] {
  const chunks: string[] = [];
  let current = '';
  for (const word of text.split(/\s+/).filter(Boolean)) {
    if (word.length > size) {
      if (current) chunks.push(current);
      current = '';
      for (let i = 0; i < word.length; i += size) chunks.push(word.slice(i, i + size));
      continue;
    }
    const next = current ? `${current} ${word}` : word;
    if (next.length > size) {
      chunks.push(current);
      current = word;
    } else {
      current = next;
    }
  }
  if (current) chunks.push(current);
  return chunks;
}

export function normalizeLabel(label: string): string {
  return label
    .trim()
    .toUpperCase()
    .replace(/^[BIES]-/, '')
    .replace(/[\s-]+/g, '_');
}

/** Drops word-piece markers, collapses whitespace, trims edge punctuation, lower-cases. */
export function cleanSurfaceForm(surface: string): string {
  return surface
    .replace(/\s*##/g, '')
    .replace(/[▁Ġ]/g, ' ')
    .replace(/\s+/g, ' ')
    .replace(/^[\s,;:!?()[\]{}"'`•*–—-]+/, '')
    .replace(/[\s,;:!?()[\]{}"'`•*–—.-]+$/, '')
    .toLowerCase();
}

export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count++;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

/* -------------------------------- Extractor -------------------------------- */

/**
 * Pulls skill phrases out of free text with an entity tagger. Two passes are
 * tagged and merged: a skills-focused excerpt and the head of the full text.
 * Results are ordered by how often each phrase occurs in the text.
 */
export class SkillExtractor implements SkillSource {
  private readonly opts: SkillExtractorOptions;
  private readonly labels: ReadonlySet<string>;

  constructor(
    private readonly tagger: EntityTagger,
    options: Partial<SkillExtractorOptions> = {}
  ) {
    this.opts = {
      chunkSize: options.chunkSize ?? DEFAULT_RANKING_CONFIG.chunkSize,
      minSkillLength: options.minSkillLength ?? DEFAULT_RANKING_CONFIG.minSkillLength,
      maxSkillLength: options.maxSkillLength ?? DEFAULT_RANKING_CONFIG.maxSkillLength,
      sectionCharBudget: options.sectionCharBudget ?? DEFAULT_RANKING_CONFIG.sectionCharBudget,
      fullTextCharBudget: options.fullTextCharBudget ?? DEFAULT_RANKING_CONFIG.fullTextCharBudget,
      sectionWindow: options.sectionWindow ?? DEFAULT_RANKING_CONFIG.sectionWindow,
      skillLabels: options.skillLabels ?? SKILL_LABELS,
    };
    this.labels = new Set(this.opts.skillLabels.map(normalizeLabel));
  }

  async extract(text: string): Promise<string[]> {
    const found = new Set<string>();

    const section = focusedExcerpt(text, this.opts.sectionWindow, this.opts.sectionCharBudget);
    if (section.trim()) await this.collect('section', section, found);
    await this.collect('full-text', text.slice(0, this.opts.fullTextCharBudget), found);

    const low = text.toLowerCase();
    const counts = new Map([...found].map((s): [string, number] => [s, countOccurrences(low, s)]));
    // Array#sort is stable, so equal counts keep first-seen order.
    return [...found].sort((a, b) => (counts.get(b) ?? 0) - (counts.get(a) ?? 0));
  }

  async tagChunk(chunk: string, pass: TaggingPass, index: number): Promise<Result<TaggedEntity[], TaggingFailure>> {
    try {
      return { ok: true, value: await this.tagger.tagEntities(chunk) };
    } catch (e) {
      return { ok: false, error: new TaggingFailure(pass, index, { cause: e }) };
    }
  }

  private async collect(pass: TaggingPass, excerpt: string, into: Set<string>): Promise<void> {
    const chunks = chunkText(excerpt, this.opts.chunkSize);
    for (const [i, chunk] of chunks.entries()) {
      const result = await this.tagChunk(chunk, pass, i);
      if (!result.ok) {
        logWarning(result.error.message, result.error.cause);
        continue;
      }
      for (const entity of result.value) {
        if (!this.labels.has(normalizeLabel(entity.label))) continue;
        const phrase = cleanSurfaceForm(entity.surfaceForm);
        if (phrase.length < this.opts.minSkillLength || phrase.length > this.opts.maxSkillLength) continue;
        into.add(phrase);
      }
    }
  }
}
