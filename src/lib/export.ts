import type { ScoredCandidate } from '@/lib/types';

function csvField(value: string | number): string {
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

/**
 * Flat CSV of a ranking. The summary column appears only when at least one
 * candidate has a summary.
 */
export function exportRankingCsv(candidates: readonly ScoredCandidate[]): string {
  const withSummary = candidates.some(c => c.summary !== null);
  const header = ['id', 'filename', 'similarity', 'matched_skills', 'missing_skills', 'skill_match_rate'];
  if (withSummary) header.push('summary');

  const lines = candidates.map(c => {
    const fields: (string | number)[] = [
      c.candidateName,
      c.sourceId,
      c.similarity.toFixed(4),
      c.matchedSkills.join('; '),
      c.missingSkills.join('; '),
      c.skillMatchRate.toFixed(4),
    ];
    if (withSummary) fields.push(c.summary ?? '');
    return fields.map(csvField).join(',');
  });

  return [header.join(','), ...lines].join('\n') + '\n';
}
