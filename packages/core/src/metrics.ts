import client from 'prom-client';

export interface LeagueMetrics {
  registry: client.Registry;
  cycles: client.Counter<'status'>;
  fills: client.Counter<'symbol'>;
  rejections: client.Counter<'kind' | 'reason'>;
  equity: client.Gauge<'agent'>;
  transitions: client.Counter<'from' | 'to'>;
}

export function createMetrics(registry: client.Registry = new client.Registry()): LeagueMetrics {
  const cycles = new client.Counter({ name: 'league_cycles_total', help: 'Live cycles by outcome', labelNames: ['status'] as const, registers: [registry] });
  const fills = new client.Counter({ name: 'league_fills_total', help: 'Confirmed fills', labelNames: ['symbol'] as const, registers: [registry] });
  const rejections = new client.Counter({ name: 'league_rejections_total', help: 'Intents that did not fill', labelNames: ['kind', 'reason'] as const, registers: [registry] });
  const equity = new client.Gauge({ name: 'league_equity', help: 'Equity after the last cycle', labelNames: ['agent'] as const, registers: [registry] });
  const transitions = new client.Counter({ name: 'league_scheduler_transitions_total', help: 'Day/night state changes', labelNames: ['from', 'to'] as const, registers: [registry] });
  return { registry, cycles, fills, rejections, equity, transitions };
}
