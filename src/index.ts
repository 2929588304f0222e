#!/usr/bin/env node
import 'dotenv/config';
import { parseCliArgs, USAGE } from './cli/args';
import { loadPubmedConfig } from './config/pubmed';
import { PubmedClient } from './ingest/pubmed/client';
import { runPipeline } from './pipeline/runPipeline';
import { createLogger } from './utils/logger';

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  if (args.kind === 'help') {
    console.log(USAGE);
    return;
  }
  if (args.kind === 'usage_error') {
    console.error(args.message);
    console.error(USAGE);
    process.exit(1);
  }

  const logger = createLogger('Pubmed', { debug: args.debug });

  try {
    const config = loadPubmedConfig();
    const client = new PubmedClient({ config, logger });
    const result = await runPipeline(args.query, {
      outputPath: args.file,
      client,
      logger,
      display: args.debug,
    });
    logger.info(`Wrote ${result.records.length} papers to ${result.outputPath}`);
  } catch (error) {
    logger.error('Fatal error', { error: error instanceof Error ? error.message : String(error) });
    process.exit(1);
  }
}

if (require.main === module) {
  void main();
}

export { runPipeline } from './pipeline/runPipeline';
export { PubmedClient } from './ingest/pubmed/client';
export { extractNonAcademicAuthors, isAcademicAffiliation } from './classify/affiliation';
export { extractPaperRecord } from './pipeline/extractMetadata';
export { writeResultsCsv, readCsvRows } from './export/csv';
export * from './pipeline/types';
