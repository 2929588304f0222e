import { z } from 'zod';

// E-utilities responses are read leniently: a missing or mistyped field falls back
// to undefined instead of failing the whole parse.

export const SearchResponseSchema = z.object({
  esearchresult: z
    .object({
      idlist: z.array(z.coerce.string()).optional().catch(undefined),
    })
    .optional()
    .catch(undefined),
});

export const AuthorSchema = z
  .object({
    name: z.string().optional().catch(undefined),
    affiliation: z.string().optional().catch(undefined),
  })
  .catch({});

export type Author = z.infer<typeof AuthorSchema>;

export const PaperSummarySchema = z.object({
  title: z.string().optional().catch(undefined),
  pubdate: z.string().optional().catch(undefined),
  authors: z.array(AuthorSchema).optional().catch(undefined),
});

export type PaperSummary = z.infer<typeof PaperSummarySchema>;

export const SummaryResponseSchema = z.object({
  result: z.record(z.string(), z.unknown()).optional().catch(undefined),
});
