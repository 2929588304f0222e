import { describe, it, expect } from '@jest/globals';
import { parseCliArgs } from '../src/cli/args';

describe('parseCliArgs', () => {
  it('defaults the output file and debug flag', () => {
    expect(parseCliArgs(['cancer'])).toEqual({ kind: 'run', query: 'cancer', file: 'output.csv', debug: false });
  });

  it('reads short and long flags', () => {
    expect(parseCliArgs(['heart failure', '-f', 'hf.csv', '-d'])).toEqual({
      kind: 'run',
      query: 'heart failure',
      file: 'hf.csv',
      debug: true,
    });
    expect(parseCliArgs(['--file=x.csv', '--debug', 'asthma'])).toEqual({
      kind: 'run',
      query: 'asthma',
      file: 'x.csv',
      debug: true,
    });
  });

  it('requires a non-empty query', () => {
    expect(parseCliArgs([])).toEqual({ kind: 'usage_error', message: 'A search query is required' });
    expect(parseCliArgs(['   '])).toEqual({ kind: 'usage_error', message: 'A search query is required' });
  });

  it('rejects extra positionals and unknown flags', () => {
    expect(parseCliArgs(['a', 'b'])).toEqual({ kind: 'usage_error', message: 'Unexpected arguments: b' });
    expect(parseCliArgs(['a', '--verbose']).kind).toBe('usage_error');
  });

  it('recognises help', () => {
    expect(parseCliArgs(['--help'])).toEqual({ kind: 'help' });
  });
});
