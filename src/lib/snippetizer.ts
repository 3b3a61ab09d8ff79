import type { TextEmbedder } from '@/lib/types';
import { cosine } from '@/lib/vector';

const SENTENCE_SPLIT = /(?<=[.!?])\s+/;

export function splitSentences(text: string): string[] {
  return text
    .split(SENTENCE_SPLIT)
    .map(s => s.trim())
    .filter(Boolean);
}

/**
 * The `k` résumé sentences closest to the job description, best first.
 */
export async function topKSnippets(
  jobDescription: string,
  resumeText: string,
  k: number,
  embedder: TextEmbedder
): Promise<string[]> {
  const sentences = splitSentences(resumeText);
  if (!sentences.length) return [];

  const [jdVec, ...sentVecs] = await embedder.encode([jobDescription, ...sentences]);
  return sentVecs
    .map((v, i) => ({ i, sim: cosine(jdVec, v) }))
    .sort((a, b) => b.sim - a.sim)
    .slice(0, k)
    .map(({ i }) => sentences[i]);
}
