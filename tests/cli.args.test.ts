import { parseCliArgs } from '../src/cli/args.js';
import { ConfigError } from '../src/config/index.js';

describe('cli arguments', () => {
  test('file and flags', () => {
    expect(parseCliArgs(['hands.txt', '--json', '--atomic', '--cards=long', '--log-level=debug', '--quiet'])).toEqual({
      file: 'hands.txt',
      overrides: { json: true, atomicParse: true, cardStyle: 'long', logLevel: 'debug' },
      quiet: true,
      noColor: false,
      help: false,
    });
  });

  test('no arguments reads stdin with defaults', () => {
    expect(parseCliArgs([])).toEqual({ overrides: {}, quiet: false, noColor: false, help: false });
  });

  test('a lone dash is a file argument', () => {
    expect(parseCliArgs(['-']).file).toBe('-');
  });

  test('help', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
    expect(parseCliArgs(['--help']).help).toBe(true);
  });

  test('unknown options and extra files are rejected together', () => {
    try {
      parseCliArgs(['a.txt', 'b.txt', '--colour', '--cards']);
      throw new Error('expected a failure');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect((err as ConfigError).issues).toEqual([
        'unexpected argument b.txt',
        'unknown option --colour',
        '--cards needs a value, e.g. --cards=long',
      ]);
    }
  });
});
