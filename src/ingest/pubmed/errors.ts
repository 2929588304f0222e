export type PubmedEndpoint = 'esearch' | 'esummary';

export class PubmedRequestError extends Error {
  constructor(
    public readonly endpoint: PubmedEndpoint,
    public readonly url: string,
    message: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(`PubMed ${endpoint} failed: ${message}`);
    this.name = 'PubmedRequestError';
    if (cause !== undefined) this.cause = cause;
  }
}
