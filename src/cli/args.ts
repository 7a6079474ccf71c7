import { ConfigError, type ConfigOverrides } from '../config/index.js';

export type CliArgs = {
  file?: string;
  overrides: ConfigOverrides;
  quiet: boolean;
  noColor: boolean;
  help: boolean;
};

export const USAGE = `Usage: poker-standings [file] [options]

Reads one hand per line ("<player id> <card> x5"), rounds separated by a blank
line or "---". Reads stdin when no file is given.

Options:
  --json               print standings as JSON
  --atomic             a rejected line claims none of its cards
  --cards=<style>      short | long | unicode
  --log-level=<level>  fatal | error | warn | info | debug | trace | silent
  --quiet              only print standings
  --no-color           disable colors
  -h, --help           show this help`;

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const out: CliArgs = { overrides: {}, quiet: false, noColor: false, help: false };
  const unknown: string[] = [];

  for (const arg of argv) {
    const [flag, value]: [string, string | undefined] = arg.startsWith('--') && arg.includes('=')
      ? [arg.slice(0, arg.indexOf('=')), arg.slice(arg.indexOf('=') + 1)]
      : [arg, undefined];

    switch (flag) {
      case '--json': out.overrides.json = true; break;
      case '--atomic': out.overrides.atomicParse = true; break;
      case '--cards':
      case '--log-level':
        if (value === undefined || value === '') unknown.push(`${flag} needs a value, e.g. ${flag}=${flag === '--cards' ? 'long' : 'debug'}`);
        else if (flag === '--cards') out.overrides.cardStyle = value;
        else out.overrides.logLevel = value;
        break;
      case '--quiet': out.quiet = true; break;
      case '--no-color': out.noColor = true; break;
      case '-h':
      case '--help': out.help = true; break;
      default:
        if (flag.startsWith('-') && flag !== '-') unknown.push(`unknown option ${flag}`);
        else if (out.file === undefined) out.file = flag;
        else unknown.push(`unexpected argument ${flag}`);
    }
  }

  if (unknown.length) throw new ConfigError(unknown);
  return out;
}
