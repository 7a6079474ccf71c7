import chalk from 'chalk';

export type Palette = {
  warn: (s: string) => string;
  error: (s: string) => string;
};

export function getPalette(noColor: boolean, theme = process.env.CLI_THEME || 'felt'): Palette {
  const c = new chalk.Instance({ level: noColor ? 0 : 3 });
  if (theme.toLowerCase() === 'mono') return { warn: c.white, error: c.white };
  // felt (default)
  return { warn: c.yellow, error: c.red };
}
