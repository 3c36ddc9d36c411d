import { describe, it, expect } from 'vitest';
import type { CycleBatch } from '@league/schemas';
import { PgLedger, type SqlClient, type SqlPool, type SqlResult } from './PgLedger';

class FakePool implements SqlPool {
  readonly statements: string[] = [];
  released = 0;
  ended = false;

  constructor(private readonly failOn?: RegExp, private readonly rows: Array<Record<string, unknown>> = []) {}

  async query(text: string): Promise<SqlResult> {
    this.statements.push(text);
    if (this.failOn?.test(text)) throw new Error('insert failed');
    return { rows: text.startsWith('SELECT') ? this.rows : [] };
  }

  async connect(): Promise<SqlClient> {
    return {
      query: (text: string) => this.query(text),
      release: () => { this.released += 1; },
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

const batch: CycleBatch = {
  agentId: 'agent-a',
  fills: [{ orderId: 'o-1', intentId: 'i-1', agentId: 'agent-a', symbol: 'AAPL', side: 'buy', qty: 10, price: 100, ts: '2026-02-18T15:00:00.000Z', realizedPnl: 0, broker: 'sim' }],
  rejections: [],
  equity: { cash: 9000, positionsValue: 1000, equity: 10000, lastEquity: 10000, ts: '2026-02-18T15:00:00.000Z' },
};

const dml = (pool: FakePool) => pool.statements.filter((s) => !s.startsWith('CREATE'));

describe('PgLedger', () => {
  it('commits a cycle inside one transaction', async () => {
    const pool = new FakePool();
    await new PgLedger(pool).appendCycle(batch);
    const ops = dml(pool).map((s) => s.split(' ').slice(0, 3).join(' '));
    expect(ops).toEqual(['BEGIN', 'INSERT INTO fills', 'INSERT INTO equity_snapshots', 'COMMIT']);
    expect(pool.released).toBe(1);
  });

  it('rolls back when any insert fails', async () => {
    const pool = new FakePool(/^INSERT INTO equity_snapshots/);
    await expect(new PgLedger(pool).appendCycle(batch)).rejects.toThrow('insert failed');
    expect(dml(pool).at(-1)).toBe('ROLLBACK');
    expect(pool.released).toBe(1);
  });

  it('creates tables once', async () => {
    const pool = new FakePool();
    const ledger = new PgLedger(pool);
    await ledger.appendCycle(batch);
    await ledger.appendCycle(batch);
    expect(pool.statements.filter((s) => s.startsWith('CREATE TABLE IF NOT EXISTS fills'))).toHaveLength(1);
  });

  it('retries table creation after a failed first attempt', async () => {
    const pool = new FakePool();
    let refused = false;
    const query = pool.query.bind(pool);
    pool.query = async (text: string) => {
      if (!refused) {
        refused = true;
        throw new Error('connection refused');
      }
      return query(text);
    };
    const ledger = new PgLedger(pool);

    await expect(ledger.listAgents()).rejects.toThrow('connection refused');
    await expect(ledger.listAgents()).resolves.toEqual([]);
    expect(pool.statements.filter((s) => s.startsWith('CREATE TABLE IF NOT EXISTS fills'))).toHaveLength(1);
    expect(pool.statements.at(-1)).toBe('SELECT * FROM agents ORDER BY agent_id');
  });

  it('maps rows back to fills', async () => {
    const pool = new FakePool(undefined, [{
      order_id: 'o-1', intent_id: 'i-1', agent_id: 'agent-a', symbol: 'AAPL', side: 'sell',
      qty: '10', price: '103.5', ts: new Date('2026-02-18T15:00:00.000Z'), realized_pnl: '35', broker: 'paper',
    }]);
    const fills = await new PgLedger(pool).fillsSince('agent-a', new Date('2026-02-01T00:00:00.000Z'));
    expect(fills).toEqual([{
      orderId: 'o-1', intentId: 'i-1', agentId: 'agent-a', symbol: 'AAPL', side: 'sell',
      qty: 10, price: 103.5, ts: '2026-02-18T15:00:00.000Z', realizedPnl: 35, broker: 'paper',
    }]);
  });

  it('ends the pool on close', async () => {
    const pool = new FakePool();
    await new PgLedger(pool).close();
    expect(pool.ended).toBe(true);
  });
});
