import { AgentRecord, CycleBatch, EquitySnapshot, Fill, LeagueReport, Lineage, Rejection } from '@league/schemas';
import type { ILedger } from '@league/interfaces';

export interface SqlResult {
  rows: Array<Record<string, unknown>>;
}

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
  release(): void;
}

/** The subset of pg.Pool the ledger uses. */
export interface SqlPool {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
  connect(): Promise<SqlClient>;
  end(): Promise<void>;
}

const SCHEMA = [
  `CREATE TABLE IF NOT EXISTS fills (
    order_id text NOT NULL,
    intent_id text NOT NULL,
    agent_id text NOT NULL,
    symbol text NOT NULL,
    side text NOT NULL,
    qty double precision NOT NULL,
    price double precision NOT NULL,
    ts timestamptz NOT NULL,
    realized_pnl double precision NOT NULL,
    broker text NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_fills_agent_ts ON fills (agent_id, ts)`,
  `CREATE TABLE IF NOT EXISTS rejections (
    intent_id text NOT NULL,
    agent_id text NOT NULL,
    symbol text NOT NULL,
    kind text NOT NULL,
    reason text NOT NULL,
    message text NOT NULL,
    ts timestamptz NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS equity_snapshots (
    agent_id text NOT NULL,
    ts timestamptz NOT NULL,
    cash double precision NOT NULL,
    positions_value double precision NOT NULL,
    equity double precision NOT NULL,
    last_equity double precision NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_equity_agent_ts ON equity_snapshots (agent_id, ts)`,
  `CREATE TABLE IF NOT EXISTS agents (
    agent_id text PRIMARY KEY,
    builder_name text,
    builder_model text,
    lineage jsonb,
    config_hash text NOT NULL,
    created_at timestamptz NOT NULL,
    updated_at timestamptz NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS league_runs (
    run_id text PRIMARY KEY,
    generated_at timestamptz NOT NULL,
    trading_day text NOT NULL,
    payload jsonb NOT NULL
  )`,
];

const INSERT_FILL = `INSERT INTO fills (order_id, intent_id, agent_id, symbol, side, qty, price, ts, realized_pnl, broker)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`;
const INSERT_REJECTION = `INSERT INTO rejections (intent_id, agent_id, symbol, kind, reason, message, ts)
  VALUES ($1, $2, $3, $4, $5, $6, $7)`;
const INSERT_EQUITY = `INSERT INTO equity_snapshots (agent_id, ts, cash, positions_value, equity, last_equity)
  VALUES ($1, $2, $3, $4, $5, $6)`;

const iso = (v: unknown) => (v instanceof Date ? v.toISOString() : String(v));

function fillParams(f: Fill): unknown[] {
  return [f.orderId, f.intentId, f.agentId, f.symbol, f.side, f.qty, f.price, f.ts, f.realizedPnl, f.broker];
}

function rejectionParams(r: Rejection): unknown[] {
  return [r.intentId, r.agentId, r.symbol, r.kind, r.reason, r.message, r.ts];
}

function equityParams(agentId: string, e: EquitySnapshot): unknown[] {
  return [agentId, e.ts, e.cash, e.positionsValue, e.equity, e.lastEquity];
}

function toAgent(r: Record<string, unknown>): AgentRecord {
  return AgentRecord.parse({
    agentId: r.agent_id,
    builderName: r.builder_name ?? null,
    builderModel: r.builder_model ?? null,
    lineage: r.lineage == null ? null : Lineage.parse(r.lineage),
    configHash: r.config_hash,
    createdAt: iso(r.created_at),
    updatedAt: iso(r.updated_at),
  });
}

export class PgLedger implements ILedger {
  private ready: Promise<void> | null = null;

  constructor(private readonly pool: SqlPool) {}

  private ensureTables(): Promise<void> {
    this.ready ??= (async () => {
      for (const ddl of SCHEMA) await this.pool.query(ddl);
    })().catch((err: unknown) => {
      // a failed bootstrap is retried by the next call
      this.ready = null;
      throw err;
    });
    return this.ready;
  }

  async recordFill(fill: Fill): Promise<void> {
    await this.ensureTables();
    await this.pool.query(INSERT_FILL, fillParams(Fill.parse(fill)));
  }

  async recordRejection(rejection: Rejection): Promise<void> {
    await this.ensureTables();
    await this.pool.query(INSERT_REJECTION, rejectionParams(Rejection.parse(rejection)));
  }

  async recordEquity(agentId: string, snapshot: EquitySnapshot): Promise<void> {
    await this.ensureTables();
    await this.pool.query(INSERT_EQUITY, equityParams(agentId, EquitySnapshot.parse(snapshot)));
  }

  async appendCycle(batch: CycleBatch): Promise<void> {
    const parsed = CycleBatch.parse(batch);
    await this.ensureTables();
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      for (const f of parsed.fills) await client.query(INSERT_FILL, fillParams(f));
      for (const r of parsed.rejections) await client.query(INSERT_REJECTION, rejectionParams(r));
      await client.query(INSERT_EQUITY, equityParams(parsed.agentId, parsed.equity));
      await client.query('COMMIT');
    } catch (e) {
      await client.query('ROLLBACK');
      throw e;
    } finally {
      client.release();
    }
  }

  async recordAgent(record: AgentRecord): Promise<AgentRecord> {
    const a = AgentRecord.parse(record);
    await this.ensureTables();
    const res = await this.pool.query(
      `INSERT INTO agents (agent_id, builder_name, builder_model, lineage, config_hash, created_at, updated_at)
       VALUES ($1, $2, $3, $4::jsonb, $5, $6, $7)
       ON CONFLICT (agent_id) DO UPDATE SET
         builder_name = EXCLUDED.builder_name,
         builder_model = EXCLUDED.builder_model,
         lineage = EXCLUDED.lineage,
         config_hash = EXCLUDED.config_hash,
         updated_at = EXCLUDED.updated_at
       RETURNING *`,
      [a.agentId, a.builderName, a.builderModel, a.lineage ? JSON.stringify(a.lineage) : null, a.configHash, a.createdAt, a.updatedAt]
    );
    return res.rows[0] ? toAgent(res.rows[0]) : a;
  }

  async listAgents(): Promise<AgentRecord[]> {
    await this.ensureTables();
    const res = await this.pool.query('SELECT * FROM agents ORDER BY agent_id');
    return res.rows.map(toAgent);
  }

  async fillsSince(agentId: string, since: Date): Promise<Fill[]> {
    await this.ensureTables();
    const res = await this.pool.query(
      'SELECT * FROM fills WHERE agent_id = $1 AND ts >= $2 ORDER BY ts',
      [agentId, since.toISOString()]
    );
    return res.rows.map((r) => Fill.parse({
      orderId: r.order_id,
      intentId: r.intent_id,
      agentId: r.agent_id,
      symbol: r.symbol,
      side: r.side,
      qty: Number(r.qty),
      price: Number(r.price),
      ts: iso(r.ts),
      realizedPnl: Number(r.realized_pnl),
      broker: r.broker,
    }));
  }

  async rejectionsSince(agentId: string, since: Date): Promise<Rejection[]> {
    await this.ensureTables();
    const res = await this.pool.query(
      'SELECT * FROM rejections WHERE agent_id = $1 AND ts >= $2 ORDER BY ts',
      [agentId, since.toISOString()]
    );
    return res.rows.map((r) => Rejection.parse({
      intentId: r.intent_id,
      agentId: r.agent_id,
      symbol: r.symbol,
      kind: r.kind,
      reason: r.reason,
      message: r.message,
      ts: iso(r.ts),
    }));
  }

  async equityHistory(agentId: string, since: Date): Promise<EquitySnapshot[]> {
    await this.ensureTables();
    const res = await this.pool.query(
      'SELECT * FROM equity_snapshots WHERE agent_id = $1 AND ts >= $2 ORDER BY ts',
      [agentId, since.toISOString()]
    );
    return res.rows.map((r) => EquitySnapshot.parse({
      cash: Number(r.cash),
      positionsValue: Number(r.positions_value),
      equity: Number(r.equity),
      lastEquity: Number(r.last_equity),
      ts: iso(r.ts),
    }));
  }

  async recordRecommendations(report: LeagueReport): Promise<void> {
    const r = LeagueReport.parse(report);
    await this.ensureTables();
    await this.pool.query(
      'INSERT INTO league_runs (run_id, generated_at, trading_day, payload) VALUES ($1, $2, $3, $4::jsonb)',
      [r.runId, r.generatedAt, r.tradingDay, JSON.stringify(r)]
    );
  }

  async latestRecommendations(): Promise<LeagueReport | null> {
    await this.ensureTables();
    const res = await this.pool.query('SELECT payload FROM league_runs ORDER BY generated_at DESC LIMIT 1');
    const row = res.rows[0];
    return row ? LeagueReport.parse(row.payload) : null;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
