export class CsvWriteError extends Error {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super(`Failed to write CSV to ${path}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = 'CsvWriteError';
    this.cause = cause;
  }
}
