import fetch, { Response } from 'node-fetch';
import { loadPubmedConfig, PUBMED_DEFAULTS, type PubmedConfig } from '../../config/pubmed';
import { defaultLogger, type Logger } from '../../utils/logger';
import { PubmedRequestError, type PubmedEndpoint } from './errors';
import { SearchResponseSchema } from './schemas';

export type FetchFn = (url: string) => Promise<Response>;

export type PubmedClientOptions = {
  config?: PubmedConfig;
  logger?: Logger;
  fetchImpl?: FetchFn;
};

export class PubmedClient {
  private config: PubmedConfig;
  private logger: Logger;
  private fetchImpl: FetchFn;

  constructor(opts: PubmedClientOptions = {}) {
    this.config = opts.config ?? loadPubmedConfig();
    this.logger = opts.logger ?? defaultLogger;
    this.fetchImpl = opts.fetchImpl ?? ((url) => fetch(url));
  }

  private buildUrl(base: string, params: Record<string, string>): string {
    const query = new URLSearchParams(params);
    if (this.config.apiKey) query.set('api_key', this.config.apiKey);
    return `${base}?${query.toString()}`;
  }

  private async getJson(endpoint: PubmedEndpoint, url: string): Promise<unknown> {
    let res: Response;
    try {
      res = await this.fetchImpl(url);
    } catch (e) {
      throw new PubmedRequestError(endpoint, url, e instanceof Error ? e.message : String(e), undefined, e);
    }
    if (!res.ok) {
      throw new PubmedRequestError(endpoint, url, `${res.status} ${await res.text()}`, res.status);
    }
    try {
      return await res.json();
    } catch (e) {
      throw new PubmedRequestError(endpoint, url, 'response is not valid JSON', res.status, e);
    }
  }

  /** Returns up to `maxResults` PubMed IDs in the order esearch ranks them. */
  async searchPaperIds(query: string): Promise<string[]> {
    const url = this.buildUrl(this.config.searchUrl, {
      db: this.config.database,
      term: query,
      retmode: PUBMED_DEFAULTS.retmode,
      retmax: String(this.config.maxResults),
    });
    const json = await this.getJson('esearch', url);
    const parsed = SearchResponseSchema.safeParse(json);
    if (!parsed.success) return [];
    return parsed.data.esearchresult?.idlist ?? [];
  }

  async getPaperSummary(paperId: string): Promise<unknown> {
    const url = this.buildUrl(this.config.detailsUrl, {
      db: this.config.database,
      id: paperId,
      retmode: PUBMED_DEFAULTS.retmode,
    });
    const json = await this.getJson('esummary', url);
    this.logger.debug(`Full API response for ${paperId}: ${JSON.stringify(json)}`);
    return json;
  }
}
