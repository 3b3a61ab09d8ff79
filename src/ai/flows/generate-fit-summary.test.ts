import { afterEach, describe, expect, it, vi } from 'vitest';
import { createFitSummarizer, fallbackSummary, summariesAvailable } from '@/ai/flows/generate-fit-summary';
import { vocabEmbedder } from '@/test/fakes';

const JD = 'Python and Django developer wanted.';
const RESUME = 'I write Python daily. I enjoy hiking! Django powers my side projects.';
const FALLBACK =
  'Strong candidate based on relevant experience. Key highlights: I write Python daily. • Django powers my side projects....';

const embedder = () => vocabEmbedder(['python', 'django', 'hiking']);

afterEach(() => {
  vi.restoreAllMocks();
});

describe('fallbackSummary', () => {
  it('quotes the first two snippets', () => {
    expect(fallbackSummary(['I write Python daily.', 'Django powers my side projects.', 'I enjoy hiking!'])).toBe(
      FALLBACK
    );
  });

  it('caps the quoted evidence at 200 characters', () => {
    const long = 'x'.repeat(300);
    expect(fallbackSummary([long])).toBe(`Strong candidate based on relevant experience. Key highlights: ${'x'.repeat(200)}...`);
  });
});

describe('generateFitSummary', () => {
  it('uses the generated rationale, trimmed', async () => {
    const generator = vi.fn(async () => '  Strong Python and Django match.  ');
    const generateFitSummary = createFitSummarizer({ embedder: embedder(), generator });

    expect(await generateFitSummary(JD, RESUME, { kSnippets: 2 })).toBe('Strong Python and Django match.');
    expect(generator).toHaveBeenCalledWith({
      jobDescription: JD,
      evidence: 'I write Python daily. • Django powers my side projects.',
    });
  });

  it('falls back without a generator', async () => {
    const generateFitSummary = createFitSummarizer({ embedder: embedder() });
    expect(await generateFitSummary(JD, RESUME, { kSnippets: 2 })).toBe(FALLBACK);
  });

  it('falls back when the generator returns nothing', async () => {
    const generateFitSummary = createFitSummarizer({ embedder: embedder(), generator: async () => '   ' });
    expect(await generateFitSummary(JD, RESUME, { kSnippets: 2 })).toBe(FALLBACK);
  });

  it('falls back and warns when the generator fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const generateFitSummary = createFitSummarizer({
      embedder: embedder(),
      generator: async () => {
        throw new Error('model offline');
      },
    });

    expect(await generateFitSummary(JD, RESUME, { kSnippets: 2 })).toBe(FALLBACK);
    expect(warn).toHaveBeenCalledWith('Error generating summary: model offline');
  });
});

describe('summariesAvailable', () => {
  it('depends on a configured credential', () => {
    expect(summariesAvailable({ apiKey: null })).toBe(false);
    expect(summariesAvailable({ apiKey: '' })).toBe(false);
    expect(summariesAvailable({ apiKey: 'test-key' })).toBe(true);
  });
});
