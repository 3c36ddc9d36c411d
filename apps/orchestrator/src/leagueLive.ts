import { mkdir, readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { SafetySwitch, errorMessage, sessionAt, silentLogger, systemClock, type Clock, type LeagueMetrics, type Logger } from '@league/core';
import type { ILedger } from '@league/interfaces';
import { loadAgentConfig, type Env } from './config';
import { bootstrapAgent } from './bootstrap';

export const LAST_LIVE_FILE = 'last_live.json';

export type LiveOnceStatus = 'ok' | 'failed' | 'error' | 'frozen' | 'stopped';

export interface LiveOnceRow {
  file: string;
  agentId: string | null;
  status: LiveOnceStatus;
  fills: number;
  rejections: number;
  unresolved: boolean;
  equity: number | null;
  error?: string;
}

export interface LeagueLiveOptions {
  dir: string;
  /** Where last_live.json is written; skipped when unset. */
  artifactsDir?: string;
  env?: Env;
  fetch?: typeof fetch;
  /** Shared by every agent; each agent's own storage config is used when omitted. */
  ledger?: ILedger;
  safety?: SafetySwitch;
  clock?: Clock;
  log?: Logger;
  metrics?: LeagueMetrics;
}

/** Agent config files of a directory, in name order. */
export async function listAgentFiles(dir: string): Promise<string[]> {
  const names = await readdir(dir);
  return names.filter((n) => n.endsWith('.json')).sort().map((n) => path.join(dir, n));
}

/**
 * One live cycle for every agent config in `dir`, one agent after the other.
 * A bad agent marks its own row and the rest still run; frozen agents are
 * skipped, and a stop request skips every agent not yet started.
 */
export async function runLeagueLiveOnce(opts: LeagueLiveOptions): Promise<LiveOnceRow[]> {
  const env = opts.env ?? process.env;
  const clock = opts.clock ?? systemClock;
  const log = opts.log ?? silentLogger();
  const safety = opts.safety ?? new SafetySwitch(log);
  const rows: LiveOnceRow[] = [];
  const empty = { fills: 0, rejections: 0, unresolved: false, equity: null };

  for (const file of await listAgentFiles(opts.dir)) {
    if (safety.isKilled()) {
      rows.push({ file, agentId: null, status: 'stopped', ...empty, error: safety.reason ?? 'stop requested' });
      continue;
    }
    let agentId: string | null = null;
    try {
      const config = await loadAgentConfig(file, env);
      agentId = config.agent.id;
      if (safety.isFrozen(agentId)) {
        log.warn({ agentId }, 'agent frozen; skipping');
        rows.push({ file, agentId, status: 'frozen', ...empty });
        continue;
      }
      const rt = await bootstrapAgent(config, { env, fetch: opts.fetch, clock, log, metrics: opts.metrics, ledger: opts.ledger, safety });
      try {
        const step = await rt.executor.runOnce({ marketOpen: sessionAt(clock.now(), rt.hours).isOpen });
        rows.push({
          file,
          agentId,
          status: step.status,
          fills: step.fills.length,
          rejections: step.rejections.length,
          unresolved: step.unresolved,
          equity: step.equityAfter?.equity ?? null,
          ...(step.error !== undefined ? { error: step.error } : {}),
        });
      } finally {
        if (!opts.ledger) await rt.ledger.close();
      }
    } catch (err) {
      log.error({ file, agentId, err }, 'live step failed for agent');
      rows.push({ file, agentId, status: 'error', ...empty, error: errorMessage(err) });
    }
  }

  if (opts.artifactsDir) {
    await mkdir(opts.artifactsDir, { recursive: true });
    const out = path.join(opts.artifactsDir, LAST_LIVE_FILE);
    await writeFile(out, JSON.stringify(rows, null, 2));
    log.info({ file: out, agents: rows.length }, 'wrote live summary');
  }
  return rows;
}
