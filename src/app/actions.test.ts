import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ModelRegistry, type RankerModels } from '@/ai/registry';
import {
  analyzeCoverageAction,
  generateSummariesAction,
  loadResumes,
  rankCandidatesAction,
  type ActionDeps,
} from '@/app/actions';
import { loadConfig } from '@/lib/config';
import { InputValidationError } from '@/lib/errors';
import { vocabEmbedder, vocabTagger } from '@/test/fakes';

const JD = 'Required Skills: Python, Django, REST APIs. 3+ years experience.';
const JD_WITH_BENEFITS = `${JD}\n\nWe offer medical insurance and a 401(k).`;

const ALICE = '5 years of Python and Django development, built REST APIs';
const BOB = 'Marketing specialist, Excel and PowerPoint';

const encode = (s: string) => new TextEncoder().encode(s);
const files = [
  { filename: 'bob_jones.txt', data: encode(BOB) },
  { filename: 'alice_smith.txt', data: encode(ALICE) },
];

function makeDeps(env: Record<string, string> = {}): ActionDeps {
  return {
    config: loadConfig(env),
    registry: new ModelRegistry<RankerModels>({
      embedder: () => vocabEmbedder(['python', 'django', 'rest', 'apis', 'excel', 'powerpoint', 'marketing']),
      tagger: () => vocabTagger(['python', 'django', 'rest apis', 'excel', 'powerpoint']),
      summarizer: () => async ({ evidence }) => `Fit: ${evidence}`,
    }),
  };
}

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('loadResumes', () => {
  const decode = async ({ data }: { data: ArrayBuffer | Uint8Array }) => new TextDecoder().decode(data);

  it('skips oversized files and files past the limit', async () => {
    const { resumes, warnings } = await loadResumes(
      [
        { filename: 'a.txt', data: encode('short') },
        { filename: 'b.txt', data: encode('this one is longer than ten bytes') },
        { filename: 'c.txt', data: encode('x') },
      ],
      { maxResumes: 2, maxFileSizeMb: 0.00001 },
      decode
    );

    expect(resumes).toEqual([{ id: 'a.txt', text: 'short' }]);
    expect(warnings.map(w => w.message)).toEqual([
      'b.txt: skipped (> 0.00001 MB)',
      'c.txt: skipped, only the first 2 files are ranked',
    ]);
    expect(console.warn).toHaveBeenCalledWith('Résumé excluded: b.txt: skipped (> 0.00001 MB)');
  });

  it('gives uploads with the same filename distinct ids', async () => {
    const { resumes } = await loadResumes(
      [
        { filename: 'resume.txt', data: encode('first') },
        { filename: 'resume.txt', data: encode('second') },
        { filename: 'resume.txt', data: encode('third') },
      ],
      { maxResumes: 30, maxFileSizeMb: 5 }
    );
    expect(resumes).toEqual([
      { id: 'resume.txt', text: 'first' },
      { id: 'resume (2).txt', text: 'second' },
      { id: 'resume (3).txt', text: 'third' },
    ]);
  });

  it('reports files that yield no text', async () => {
    const { resumes, warnings } = await loadResumes(
      [{ filename: 'photo.png', data: encode('png') }],
      { maxResumes: 30, maxFileSizeMb: 5 }
    );
    expect(resumes).toEqual([]);
    expect(warnings.map(w => [w.filename, w.reason])).toEqual([['photo.png', 'unsupported or empty file']]);
  });
});

describe('rankCandidatesAction', () => {
  it('cleans the job description, ranks and releases the models', async () => {
    const deps = makeDeps();
    const run = await rankCandidatesAction({ jobDescription: JD_WITH_BENEFITS, files, topK: 5 }, deps);

    expect(run.runId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(run.jobDescription).toBe(JD_WITH_BENEFITS);
    expect(run.cleanedJobDescription).toBe(JD);
    expect(run.jdSkills).toEqual(['python', 'django', 'rest apis']);
    expect(run.candidates.map(c => c.candidateName)).toEqual(['Alice Smith', 'Bob Jones']);
    expect(run.resumes.map(r => r.id)).toEqual(['bob_jones.txt', 'alice_smith.txt']);
    expect(run.warnings).toEqual([]);

    expect(deps.registry.refCount('embedder')).toBe(0);
    expect(deps.registry.refCount('tagger')).toBe(0);
  });

  it('keeps going when some files are unusable', async () => {
    const run = await rankCandidatesAction(
      { jobDescription: JD, files: [...files, { filename: 'photo.png', data: encode('png') }] },
      makeDeps()
    );
    expect(run.candidates).toHaveLength(2);
    expect(run.warnings.map(w => w.message)).toEqual(['photo.png: unsupported or empty file']);
  });

  it('releases the embedder when the tagger cannot be built', async () => {
    const deps = makeDeps();
    const registry = new ModelRegistry<RankerModels>({
      embedder: () => vocabEmbedder(['python']),
      tagger: () => {
        throw new Error('tagger unavailable');
      },
      summarizer: () => null,
    });

    await expect(rankCandidatesAction({ jobDescription: JD, files }, { ...deps, registry })).rejects.toThrow(
      'tagger unavailable'
    );
    expect(registry.refCount('embedder')).toBe(0);
    expect(registry.refCount('tagger')).toBe(0);
  });

  it('validates its input', async () => {
    const deps = makeDeps();
    await expect(rankCandidatesAction({ jobDescription: '   ', files }, deps)).rejects.toThrow(
      new InputValidationError('Job description cannot be empty.')
    );
    await expect(rankCandidatesAction({ jobDescription: JD, files: [] }, deps)).rejects.toThrow(
      'Upload at least one résumé.'
    );
    await expect(rankCandidatesAction({ jobDescription: JD, files, topK: 21 }, deps)).rejects.toBeInstanceOf(
      InputValidationError
    );
  });

  it('fails when no résumé has text', async () => {
    await expect(
      rankCandidatesAction({ jobDescription: JD, files: [{ filename: 'photo.png', data: encode('png') }] }, makeDeps())
    ).rejects.toThrow('No valid resumes processed.');
  });
});

describe('generateSummariesAction', () => {
  it('leaves the ranking untouched without a credential', async () => {
    const deps = makeDeps();
    const run = await rankCandidatesAction({ jobDescription: JD, files }, deps);

    expect(await generateSummariesAction(run, deps)).toBe(run.candidates);
    expect(console.warn).toHaveBeenCalledWith('Fit summaries are unavailable: no model credential configured.');
    expect(deps.registry.isLoaded('summarizer')).toBe(false);
  });

  it('summarises every candidate from its closest sentences', async () => {
    const deps = makeDeps({ GEMINI_API_KEY: 'test-key' });
    const run = await rankCandidatesAction({ jobDescription: JD, files }, deps);

    const summarised = await generateSummariesAction(run, deps);

    expect(summarised.map(c => [c.sourceId, c.summary])).toEqual([
      ['alice_smith.txt', `Fit: ${ALICE}`],
      ['bob_jones.txt', `Fit: ${BOB}`],
    ]);
    expect(run.candidates.every(c => c.summary === null)).toBe(true);
    expect(deps.registry.refCount('summarizer')).toBe(0);
    expect(deps.registry.refCount('embedder')).toBe(0);
  });

  it('releases the embedder when the summarizer cannot be built', async () => {
    const deps = makeDeps({ GEMINI_API_KEY: 'test-key' });
    const run = await rankCandidatesAction({ jobDescription: JD, files }, deps);
    const registry = new ModelRegistry<RankerModels>({
      embedder: () => vocabEmbedder(['python']),
      tagger: () => vocabTagger(['python']),
      summarizer: () => {
        throw new Error('summarizer unavailable');
      },
    });

    await expect(generateSummariesAction(run, { ...deps, registry })).rejects.toThrow('summarizer unavailable');
    expect(registry.refCount('embedder')).toBe(0);
  });
});

describe('analyzeCoverageAction', () => {
  it('analyses each upload against its own text when filenames repeat', async () => {
    const deps = makeDeps();
    const run = await rankCandidatesAction(
      {
        jobDescription: JD,
        files: [
          { filename: 'resume.txt', data: encode('Python and Django developer') },
          { filename: 'resume.txt', data: encode('Excel only') },
        ],
      },
      deps
    );

    const analysis = await analyzeCoverageAction(run, deps);

    expect(run.candidates.map(c => [c.sourceId, c.matchedSkills])).toEqual([
      ['resume.txt', ['python', 'django']],
      ['resume (2).txt', []],
    ]);
    expect(analysis.rows.map(r => [r.sourceId, r.matchedSkills])).toEqual([
      ['resume.txt', ['python', 'django']],
      ['resume (2).txt', []],
    ]);
  });

  it('reports coverage against the ranking’s job skills', async () => {
    const deps = makeDeps();
    const run = await rankCandidatesAction({ jobDescription: JD, files }, deps);

    const analysis = await analyzeCoverageAction(run, deps);

    expect(analysis.jdSkills).toEqual(['python', 'django', 'rest apis']);
    expect(analysis.rows.map(r => [r.candidate, r.coveragePercentage])).toEqual([
      ['Alice Smith', 100],
      ['Bob Jones', 0],
    ]);
    expect(analysis.mostMissing).toEqual([
      { skill: 'python', candidatesMissing: 1 },
      { skill: 'django', candidatesMissing: 1 },
      { skill: 'rest apis', candidatesMissing: 1 },
    ]);
    expect(analysis.gaps.map(g => g.keyGaps)).toEqual(['None', 'python, django, rest apis']);
    expect(deps.registry.refCount('tagger')).toBe(0);
  });
});
