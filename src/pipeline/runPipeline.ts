import { displayCsv, writeResultsCsv } from '../export/csv';
import { PubmedClient } from '../ingest/pubmed/client';
import { defaultLogger, type Logger } from '../utils/logger';
import { extractPaperRecord } from './extractMetadata';
import type { PaperRecord, PipelineResult } from './types';

export const DEFAULT_OUTPUT_PATH = 'output.csv';

export type PipelineOptions = {
  outputPath?: string;
  client?: PubmedClient;
  logger?: Logger;
  /** Re-read the written file and log each row. */
  display?: boolean;
};

/**
 * Search PubMed, fetch each summary in ranking order, and write the rows as CSV.
 * Nothing is written unless every summary request succeeds.
 */
export async function runPipeline(query: string, options: PipelineOptions = {}): Promise<PipelineResult> {
  const logger = options.logger ?? defaultLogger;
  const client = options.client ?? new PubmedClient({ logger });
  const outputPath = options.outputPath ?? DEFAULT_OUTPUT_PATH;

  logger.debug(`Fetching papers for query: ${query}`);
  const paperIds = await client.searchPaperIds(query);
  logger.debug(`Search returned ${paperIds.length} ids`, { paperIds });

  const records: PaperRecord[] = [];
  for (const paperId of paperIds) {
    const summary = await client.getPaperSummary(paperId);
    records.push(extractPaperRecord(summary, paperId));
  }

  await writeResultsCsv(records, outputPath);
  logger.debug(`Results saved to ${outputPath}`, { rows: records.length });

  if (options.display) {
    await displayCsv(outputPath, logger);
  }

  return { query, outputPath, records };
}
