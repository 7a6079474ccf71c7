import fs from 'node:fs/promises';
import { configFromEnv, resolveConfig, type AppConfig } from '../config/index.js';
import { StandingsService } from '../games/poker/service.js';
import { playAll, type RoundResult } from '../games/poker/runner.js';
import { formatUserError } from '../utils/errors.js';
import { parseCliArgs, USAGE } from './args.js';
import { log, setLogLevel } from './logger.js';
import { rejectedLines, standingRows, toJson } from './render.js';
import { ui } from './ui.js';

export type CliIo = {
  read: (file?: string) => Promise<string>;
  out: (line: string) => void;
};

export const EXIT_OK = 0;
export const EXIT_REJECTED = 1;
export const EXIT_FAILURE = 2;

async function readInput(file?: string): Promise<string> {
  if (file && file !== '-') return fs.readFile(file, 'utf8');
  process.stdin.setEncoding('utf8');
  let text = '';
  for await (const chunk of process.stdin) text += String(chunk);
  return text;
}

const defaultIo: CliIo = { read: readInput, out: (line) => console.log(line) };

function printTables(results: readonly RoundResult[], cfg: AppConfig, io: CliIo) {
  results.forEach((result, i) => {
    if (i > 0) io.out('');
    io.out(`Round ${result.round}`);
    for (const line of ui.formatTable(standingRows(result, cfg.cardStyle), (s) => s)) io.out(line);
    for (const line of rejectedLines(result)) ui.say(line, 'warn');
  });
}

/** Resolves to the process exit code. */
export async function run(argv: readonly string[], env: NodeJS.ProcessEnv = process.env, io: CliIo = defaultIo): Promise<number> {
  const clog = log.withScope('cli');
  let cfg: AppConfig;
  let text: string;
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      io.out(USAGE);
      return EXIT_OK;
    }
    cfg = resolveConfig(configFromEnv(env), args.overrides);
    ui.configure({ quiet: args.quiet || cfg.json, noColor: args.noColor });
    setLogLevel(cfg.logLevel);
    text = await io.read(args.file);
  } catch (err) {
    clog.error('startup failed', { error: err instanceof Error ? err.message : String(err) });
    ui.say(formatUserError('poker-standings', err), 'error');
    return EXIT_FAILURE;
  }

  const service = new StandingsService({ atomic: cfg.atomicParse });
  const results = playAll(service, text);
  clog.info('rounds played', { rounds: results.length, atomic: cfg.atomicParse });

  if (cfg.json) io.out(JSON.stringify(toJson(results, cfg.cardStyle), null, 2));
  else printTables(results, cfg, io);

  return results.some((r) => r.rejected.length > 0) ? EXIT_REJECTED : EXIT_OK;
}
