import { open, readFile, type FileHandle } from 'fs/promises';
import type { PaperRecord } from '../pipeline/types';
import { defaultLogger, type Logger } from '../utils/logger';
import { CsvWriteError } from './errors';

export const CSV_COLUMNS: ReadonlyArray<{ key: keyof PaperRecord; header: string }> = [
  { key: 'PubmedID', header: 'PubmedID' },
  { key: 'Title', header: 'Title' },
  { key: 'PublicationDate', header: 'Publication Date' },
  { key: 'NonAcademicAuthors', header: 'Non-academic Author(s)' },
  { key: 'CompanyAffiliations', header: 'Company Affiliation(s)' },
  { key: 'CorrespondingAuthorEmail', header: 'Corresponding Author Email' },
];

export function escapeCsv(val: unknown): string {
  if (val == null) return '';
  const s = String(val);
  if (s.includes(',') || s.includes('"') || s.includes('\n') || s.includes('\r')) {
    return '"' + s.replace(/"/g, '""') + '"';
  }
  return s;
}

export function toCsv(records: PaperRecord[]): string {
  const lines: string[] = [CSV_COLUMNS.map((c) => escapeCsv(c.header)).join(',')];
  for (const record of records) {
    lines.push(CSV_COLUMNS.map((c) => escapeCsv(record[c.key])).join(','));
  }
  return lines.join('\n') + '\n';
}

/** Splits CSV text into rows, honouring quoted fields with embedded commas, quotes and newlines. */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (inQuotes) {
      if (ch === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      row.push(field);
      field = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && text[i + 1] === '\n') i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += ch;
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

/**
 * Writes the header and one row per record, replacing any existing file.
 * The handle is closed whether or not the write succeeds.
 */
export async function writeResultsCsv(records: PaperRecord[], filePath: string): Promise<void> {
  const content = toCsv(records);
  let handle: FileHandle | undefined;
  let failure: unknown;
  try {
    handle = await open(filePath, 'w');
    await handle.writeFile(content, 'utf8');
  } catch (e) {
    failure = e;
  }
  try {
    await handle?.close();
  } catch (e) {
    failure ??= e;
  }
  if (failure !== undefined) throw new CsvWriteError(filePath, failure);
}

export async function readCsvRows(filePath: string): Promise<string[][]> {
  const text = await readFile(filePath, 'utf8');
  return parseCsv(text);
}

export async function displayCsv(filePath: string, logger: Logger = defaultLogger): Promise<void> {
  const rows = await readCsvRows(filePath);
  for (const row of rows) {
    logger.info(JSON.stringify(row));
  }
}
