import type { Logger } from '../log';

/**
 * Stop requests for the live loop. Checked between cycles only, never mid-cycle.
 * One instance per process; tests build their own.
 */
export class SafetySwitch {
  private killed = false;
  private killReason: string | null = null;
  private readonly frozenAgents = new Set<string>();

  constructor(private readonly log?: Logger) {}

  isKilled(): boolean {
    return this.killed;
  }

  get reason(): string | null {
    return this.killReason;
  }

  killAll(reason = 'stop requested'): void {
    if (!this.killed) this.log?.warn({ reason }, 'kill switch activated');
    this.killed = true;
    this.killReason = reason;
  }

  freezeAgent(id: string): void {
    this.frozenAgents.add(id);
    this.log?.warn({ agentId: id }, 'agent frozen');
  }

  isFrozen(id: string): boolean {
    return this.frozenAgents.has(id);
  }

  shouldStop(agentId: string): boolean {
    return this.killed || this.frozenAgents.has(agentId);
  }
}
