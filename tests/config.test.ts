import { describe, it, expect } from '@jest/globals';
import { ConfigError, loadPubmedConfig } from '../src/config/pubmed';

describe('loadPubmedConfig', () => {
  it('uses the NCBI E-utilities endpoints by default', () => {
    const config = loadPubmedConfig({});
    expect(config).toEqual({
      searchUrl: 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esearch.fcgi',
      detailsUrl: 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esummary.fcgi',
      database: 'pubmed',
      maxResults: 10,
      apiKey: undefined,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('accepts a base url override', () => {
    const config = loadPubmedConfig({ PUBMED_EUTILS_BASE_URL: 'http://localhost:8080/eutils/' });
    expect(config.searchUrl).toBe('http://localhost:8080/eutils/esearch.fcgi');
    expect(config.detailsUrl).toBe('http://localhost:8080/eutils/esummary.fcgi');
  });

  it('treats empty variables as unset', () => {
    expect(loadPubmedConfig({ PUBMED_EUTILS_BASE_URL: '', NCBI_API_KEY: '' }).apiKey).toBeUndefined();
  });

  it('rejects an invalid base url', () => {
    expect(() => loadPubmedConfig({ PUBMED_EUTILS_BASE_URL: 'not a url' })).toThrow(ConfigError);
  });
});
