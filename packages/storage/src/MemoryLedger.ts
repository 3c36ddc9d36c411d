import { AgentRecord, CycleBatch, EquitySnapshot, Fill, LeagueReport, Rejection } from '@league/schemas';
import type { ILedger } from '@league/interfaces';

const since = (ts: string, from: Date) => Date.parse(ts) >= from.getTime();

export class MemoryLedger implements ILedger {
  private fills: Fill[] = [];
  private rejections: Rejection[] = [];
  private equity: Array<{ agentId: string; snapshot: EquitySnapshot }> = [];
  private agents = new Map<string, AgentRecord>();
  private reports: LeagueReport[] = [];

  async recordFill(fill: Fill): Promise<void> {
    this.fills.push(Fill.parse(fill));
  }

  async recordRejection(rejection: Rejection): Promise<void> {
    this.rejections.push(Rejection.parse(rejection));
  }

  async recordEquity(agentId: string, snapshot: EquitySnapshot): Promise<void> {
    this.equity.push({ agentId, snapshot: EquitySnapshot.parse(snapshot) });
  }

  async appendCycle(batch: CycleBatch): Promise<void> {
    // validate the whole batch before touching any collection
    const parsed = CycleBatch.parse(batch);
    this.fills.push(...parsed.fills);
    this.rejections.push(...parsed.rejections);
    this.equity.push({ agentId: parsed.agentId, snapshot: parsed.equity });
  }

  async recordAgent(record: AgentRecord): Promise<AgentRecord> {
    const incoming = AgentRecord.parse(record);
    const existing = this.agents.get(incoming.agentId);
    const stored = existing ? { ...incoming, createdAt: existing.createdAt } : incoming;
    this.agents.set(stored.agentId, stored);
    return { ...stored };
  }

  async listAgents(): Promise<AgentRecord[]> {
    return [...this.agents.values()].sort((a, b) => a.agentId.localeCompare(b.agentId)).map((a) => ({ ...a }));
  }

  async fillsSince(agentId: string, from: Date): Promise<Fill[]> {
    return this.fills.filter((f) => f.agentId === agentId && since(f.ts, from));
  }

  async rejectionsSince(agentId: string, from: Date): Promise<Rejection[]> {
    return this.rejections.filter((r) => r.agentId === agentId && since(r.ts, from));
  }

  async equityHistory(agentId: string, from: Date): Promise<EquitySnapshot[]> {
    return this.equity.filter((e) => e.agentId === agentId && since(e.snapshot.ts, from)).map((e) => ({ ...e.snapshot }));
  }

  async recordRecommendations(report: LeagueReport): Promise<void> {
    this.reports.push(LeagueReport.parse(report));
  }

  async latestRecommendations(): Promise<LeagueReport | null> {
    return this.reports[this.reports.length - 1] ?? null;
  }

  async close(): Promise<void> {}
}
