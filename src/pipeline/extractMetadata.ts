import { extractNonAcademicAuthors, UNKNOWN } from '../classify/affiliation';
import { PaperSummarySchema, SummaryResponseSchema, type PaperSummary } from '../ingest/pubmed/schemas';
import type { PaperRecord } from './types';

function summaryFor(response: unknown, paperId: string): PaperSummary {
  const envelope = SummaryResponseSchema.safeParse(response);
  if (!envelope.success) return {};
  const entry = PaperSummarySchema.safeParse(envelope.data.result?.[paperId]);
  return entry.success ? entry.data : {};
}

export function extractPaperRecord(response: unknown, paperId: string): PaperRecord {
  const summary = summaryFor(response, paperId);
  const nonAcademic = extractNonAcademicAuthors(summary.authors ?? []);

  return {
    PubmedID: paperId,
    Title: summary.title ?? UNKNOWN,
    PublicationDate: summary.pubdate ?? UNKNOWN,
    NonAcademicAuthors: nonAcademic.join(', '),
    CompanyAffiliations: '',
    CorrespondingAuthorEmail: '',
  };
}
