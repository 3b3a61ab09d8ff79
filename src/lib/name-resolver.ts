const HEADER_LINES = 10;

const NAME_LABEL = /^name\s*[:\-]\s*(.+)$/i;
const WITH_INITIAL = /^[A-Z][a-z]+\s+[A-Z]\.\s+[A-Z][a-z]+$/;
const TITLE_CASE = /^[A-Z][a-z'’-]+(?:\s+[A-Z][a-z'’-]+){1,2}$/;
const ALL_CAPS = /^[A-Z'’-]+(?:\s+[A-Z'’-]+){1,3}$/;

// Section headings and job-title words that Title-Case and ALL-CAPS header lines often carry
const NOT_NAME_WORDS = new Set([
  'curriculum', 'vitae', 'resume', 'résumé', 'cv', 'profile', 'summary', 'objective',
  'experience', 'work', 'employment', 'education', 'skills', 'projects', 'contact',
  'references', 'certifications', 'professional', 'senior', 'junior', 'lead',
  'principal', 'staff', 'software', 'engineer', 'developer', 'manager', 'analyst',
  'designer', 'consultant', 'specialist', 'director', 'scientist', 'architect', 'intern',
]);

const looksLikeHeading = (line: string) =>
  line
    .toLowerCase()
    .split(/\s+/)
    .some(w => NOT_NAME_WORDS.has(w));

export const titleCase = (s: string) =>
  s
    .toLowerCase()
    .split(/\s+/)
    .filter(Boolean)
    .map(w => w.charAt(0).toUpperCase() + w.slice(1))
    .join(' ');

function plausible(name: string): boolean {
  const words = name.split(/\s+/).filter(Boolean).length;
  return words >= 2 && words <= 4 && name.length >= 5 && name.length <= 50;
}

function nameFromLine(line: string): string | null {
  const labelled = NAME_LABEL.exec(line);
  if (labelled) return labelled[1].trim();
  if (looksLikeHeading(line)) return null;
  if (WITH_INITIAL.test(line) || TITLE_CASE.test(line)) return line;
  if (ALL_CAPS.test(line)) return titleCase(line);
  return null;
}

export function nameFromFilename(filename: string): string {
  const base = filename.replace(/\.[^./\\]+$/, '');
  return titleCase(base.replace(/[_\-.]+/g, ' ')) || filename;
}

/**
 * Best-effort candidate name from the résumé header, falling back to the
 * filename. Always returns a non-empty string when the filename is non-empty.
 */
export function resolveCandidateName(resumeText: string, filename: string): string {
  const lines = resumeText
    .split('\n')
    .map(l => l.trim().replace(/\s+/g, ' '))
    .filter(Boolean)
    .slice(0, HEADER_LINES);

  for (const line of lines) {
    const name = nameFromLine(line);
    if (name && plausible(name)) return name;
  }
  return nameFromFilename(filename);
}
