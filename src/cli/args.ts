import { parseArgs } from 'util';
import { DEFAULT_OUTPUT_PATH } from '../pipeline/runPipeline';

export const USAGE = [
  'Usage: pubmed-affiliations "<query>" [-f|--file <path>] [-d|--debug]',
  '',
  'Fetch research papers from PubMed and list authors with non-academic affiliations.',
  '',
  'Options:',
  `  -f, --file <path>  CSV file to write (default: ${DEFAULT_OUTPUT_PATH})`,
  '  -d, --debug        Print diagnostics, including raw API responses',
  '  -h, --help         Show this message',
].join('\n');

export type CliArgs =
  | { kind: 'run'; query: string; file: string; debug: boolean }
  | { kind: 'help' }
  | { kind: 'usage_error'; message: string };

const OPTIONS = {
  file: { type: 'string', short: 'f', default: DEFAULT_OUTPUT_PATH },
  debug: { type: 'boolean', short: 'd', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

function parse(argv: string[]) {
  return parseArgs({ args: argv, allowPositionals: true, options: OPTIONS });
}

export function parseCliArgs(argv: string[]): CliArgs {
  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse(argv);
  } catch (error) {
    return { kind: 'usage_error', message: error instanceof Error ? error.message : String(error) };
  }

  if (parsed.values.help) return { kind: 'help' };

  if (parsed.positionals.length > 1) {
    return { kind: 'usage_error', message: `Unexpected arguments: ${parsed.positionals.slice(1).join(' ')}` };
  }
  const query = (parsed.positionals[0] ?? '').trim();
  if (!query) return { kind: 'usage_error', message: 'A search query is required' };

  return {
    kind: 'run',
    query,
    file: parsed.values.file || DEFAULT_OUTPUT_PATH,
    debug: parsed.values.debug ?? false,
  };
}
