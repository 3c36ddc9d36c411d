import type { AgentRecord, CycleBatch, EquitySnapshot, Fill, LeagueReport, Rejection } from '@league/schemas';

/**
 * Append-only persistence keyed by agent id. Concurrent agents never write the
 * same logical row, so no cross-agent locking is needed.
 */
export interface ILedger {
  recordFill(fill: Fill): Promise<void>;
  recordRejection(rejection: Rejection): Promise<void>;
  recordEquity(agentId: string, snapshot: EquitySnapshot): Promise<void>;
  /** All-or-nothing write of one live cycle. */
  appendCycle(batch: CycleBatch): Promise<void>;
  /** Upsert: keeps the original createdAt, updates provenance. */
  recordAgent(record: AgentRecord): Promise<AgentRecord>;
  listAgents(): Promise<AgentRecord[]>;
  fillsSince(agentId: string, since: Date): Promise<Fill[]>;
  rejectionsSince(agentId: string, since: Date): Promise<Rejection[]>;
  equityHistory(agentId: string, since: Date): Promise<EquitySnapshot[]>;
  recordRecommendations(report: LeagueReport): Promise<void>;
  latestRecommendations(): Promise<LeagueReport | null>;
  close(): Promise<void>;
}
