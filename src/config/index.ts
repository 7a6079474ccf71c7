import { z } from 'zod';
import { envFlag, envString } from '../util/env.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export const CARD_STYLES = ['short', 'long', 'unicode'] as const;

const configSchema = z.object({
  logLevel: z.enum(LOG_LEVELS),
  /** Roll back a rejected line instead of keeping the tokens validated before the failure. */
  atomicParse: z.boolean(),
  cardStyle: z.enum(CARD_STYLES),
  json: z.boolean(),
}).strict();

export type AppConfig = z.infer<typeof configSchema>;
export type CardStyle = AppConfig['cardStyle'];

export const DEFAULT_CONFIG: AppConfig = {
  logLevel: 'info',
  atomicParse: false,
  cardStyle: 'short',
  json: false,
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export type ConfigOverrides = { [K in keyof AppConfig]?: unknown };

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const out: ConfigOverrides = {};
  const level = envString('POKER_LOG_LEVEL', env);
  if (level !== undefined) out.logLevel = level.toLowerCase();
  const atomic = envFlag('POKER_ATOMIC_PARSE', env);
  if (atomic !== undefined) out.atomicParse = atomic;
  const style = envString('POKER_CARD_STYLE', env);
  if (style !== undefined) out.cardStyle = style.toLowerCase();
  return out;
}

/** Later sources win: defaults, then each override in order. */
export function resolveConfig(...overrides: ConfigOverrides[]): AppConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
  for (const o of overrides) {
    for (const [k, v] of Object.entries(o)) {
      if (v !== undefined) merged[k] = v;
    }
  }
  const result = configSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`));
  }
  return result.data;
}
