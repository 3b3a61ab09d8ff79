import phrases from '@/lib/data/jd-phrases.json';

/** Phrases marking requirement-bearing paragraphs. Any match keeps the paragraph. */
export const KEEP_ANCHORS: readonly string[] = phrases.keepAnchors;

/** Phrases marking boilerplate: company blurb, benefits, legal/EEO text. */
export const DROP_HEADERS: readonly string[] = phrases.dropHeaders;

const MIN_FALLBACK_WORDS = 10;
const MAX_FALLBACK_WORDS = 120;

/**
 * Removes paragraphs that carry no requirements (benefits, company blurb,
 * EEO statements) from a job description.
 *
 * KEEP anchors take precedence over DROP headers. Paragraphs matching neither
 * list survive only when they are between 10 and 120 words long.
 */
export function cleanJobDescription(text: string): string {
  const paragraphs = text.normalize('NFC').split(/\n\s*\n/);

  const kept: string[] = [];
  for (const para of paragraphs) {
    const p = para.trim();
    if (!p) continue;
    const low = p.toLowerCase();

    if (KEEP_ANCHORS.some(k => low.includes(k))) {
      kept.push(p);
      continue;
    }

    if (DROP_HEADERS.some(h => low.includes(h))) continue;

    const words = p.split(/\s+/).length;
    if (words > MIN_FALLBACK_WORDS && words < MAX_FALLBACK_WORDS) {
      kept.push(p);
    }
  }

  return kept.join('\n\n');
}
