import { z } from 'zod';

export const DEFAULT_EUTILS_BASE_URL = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';

export const PUBMED_DEFAULTS = {
  database: 'pubmed',
  retmode: 'json',
  maxResults: 10,
} as const;

export type PubmedConfig = Readonly<{
  searchUrl: string;
  detailsUrl: string;
  database: string;
  maxResults: number;
  apiKey?: string;
}>;

export class ConfigError extends Error {
  constructor(public readonly issues: z.ZodError) {
    super(`Invalid PubMed configuration: ${issues.message}`);
    this.name = 'ConfigError';
  }
}

const EnvSchema = z.object({
  PUBMED_EUTILS_BASE_URL: z.string().url().optional(),
  NCBI_API_KEY: z.string().min(1).optional(),
});

export function loadPubmedConfig(env: NodeJS.ProcessEnv = process.env): PubmedConfig {
  const parsed = EnvSchema.safeParse({
    PUBMED_EUTILS_BASE_URL: env.PUBMED_EUTILS_BASE_URL || undefined,
    NCBI_API_KEY: env.NCBI_API_KEY || undefined,
  });
  if (!parsed.success) throw new ConfigError(parsed.error);

  const baseUrl = (parsed.data.PUBMED_EUTILS_BASE_URL ?? DEFAULT_EUTILS_BASE_URL).replace(/\/+$/, '');

  return Object.freeze({
    searchUrl: `${baseUrl}/esearch.fcgi`,
    detailsUrl: `${baseUrl}/esummary.fcgi`,
    database: PUBMED_DEFAULTS.database,
    maxResults: PUBMED_DEFAULTS.maxResults,
    apiKey: parsed.data.NCBI_API_KEY,
  });
}
