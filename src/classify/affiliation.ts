import type { Author } from '../ingest/pubmed/schemas';

export const ACADEMIC_KEYWORDS = ['university', 'college', 'institute', 'hospital', 'school'] as const;

export const UNKNOWN = 'Unknown';

// Substring match, not word-boundary: "Universitypark Labs" counts as academic.
export function isAcademicAffiliation(affiliation: string): boolean {
  const lower = affiliation.toLowerCase();
  return ACADEMIC_KEYWORDS.some((keyword) => lower.includes(keyword));
}

/**
 * Names of authors whose affiliation is present and matches no academic keyword.
 * Authors with an empty or missing affiliation are never flagged.
 */
export function extractNonAcademicAuthors(authors: Author[]): string[] {
  const nonAcademic: string[] = [];
  for (const author of authors) {
    const affiliation = author.affiliation ?? '';
    if (affiliation && !isAcademicAffiliation(affiliation)) {
      nonAcademic.push(author.name ?? UNKNOWN);
    }
  }
  return nonAcademic;
}
