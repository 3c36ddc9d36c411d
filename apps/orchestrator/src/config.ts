import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { AgentConfig } from '@league/schemas';
import { ConfigurationError, errorMessage } from '@league/core';

export type Env = Record<string, string | undefined>;

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

export function truthy(v: string | undefined): boolean {
  return v !== undefined && TRUTHY.has(v.trim().toLowerCase());
}

/** The real-money arming flag. Only the environment can set it. */
export function isArmed(env: Env = process.env): boolean {
  return truthy(env.REAL_TRADING_ENABLED);
}

/** Agent ids listed in FROZEN_AGENTS (comma or whitespace separated). */
export function frozenAgents(env: Env = process.env): string[] {
  return (env.FROZEN_AGENTS ?? '').split(/[\s,]+/).filter((id) => id !== '');
}

const VENUE_ALIASES: Record<string, string> = {
  sim: 'sim',
  paper: 'paper',
  real: 'real',
  alpaca_paper: 'paper',
  alpaca_real: 'real',
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const current = root[key];
  const copy = isRecord(current) ? { ...current } : {};
  root[key] = copy;
  return copy;
}

/** Returns a copy of the raw file contents with environment overrides applied. */
export function applyEnvOverrides(raw: unknown, env: Env): Record<string, unknown> {
  if (!isRecord(raw)) throw new ConfigurationError('agent config must be a JSON object');
  const out: Record<string, unknown> = { ...raw };

  if (env.ALLOW_AFTER_HOURS !== undefined) section(out, 'guardrails').allowAfterHours = truthy(env.ALLOW_AFTER_HOURS);
  if (env.LIVE_MAX_ORDER_USD) section(out, 'guardrails').maxOrderNotional = Number(env.LIVE_MAX_ORDER_USD);
  if (env.LIVE_MAX_DAILY_LOSS) section(out, 'guardrails').maxDailyLoss = Number(env.LIVE_MAX_DAILY_LOSS);

  if (env.LIVE_BROKER) {
    const venue = VENUE_ALIASES[env.LIVE_BROKER.trim().toLowerCase()];
    if (!venue) throw new ConfigurationError(`unknown LIVE_BROKER "${env.LIVE_BROKER}"`, ['env.LIVE_BROKER: expected sim, paper or real']);
    section(out, 'broker').venue = venue;
  }

  if (env.STORAGE_BACKEND) section(out, 'storage').backend = env.STORAGE_BACKEND;
  const dbUrl = env.DATABASE_URL || env.POSTGRES_URL;
  if (dbUrl) section(out, 'storage').url = dbUrl;

  return out;
}

export function parseAgentConfig(raw: unknown, env: Env = process.env): AgentConfig {
  const parsed = AgentConfig.safeParse(applyEnvOverrides(raw, env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ConfigurationError(`invalid agent config: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export async function loadAgentConfig(file: string, env: Env = process.env): Promise<AgentConfig> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (err) {
    throw new ConfigurationError(`cannot read agent config ${file}: ${errorMessage(err)}`, [], { cause: err });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`agent config ${file} is not valid JSON: ${errorMessage(err)}`, [], { cause: err });
  }
  return parseAgentConfig(raw, env);
}

function canonical(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(canonical);
  if (isRecord(v)) {
    return Object.fromEntries(Object.keys(v).sort().map((k) => [k, canonical(v[k])]));
  }
  return v;
}

/** sha256 over key-sorted JSON, so field order in the file does not matter. */
export function configHash(config: AgentConfig): string {
  return createHash('sha256').update(JSON.stringify(canonical(config))).digest('hex');
}
