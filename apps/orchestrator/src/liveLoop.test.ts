import { describe, it, expect, vi } from 'vitest';
import { ManualClock, SafetySwitch } from '@league/core';
import type { RunContext, StepResult } from '@league/execution';
import { runLiveLoop } from './liveLoop';

const HOURS = { timezone: 'America/New_York', open: '09:30', close: '16:00' };

const ok: StepResult = { status: 'ok', signals: {}, intents: [], fills: [], rejections: [], equityAfter: null, unresolved: false };

function setup(start: string) {
  const clock = new ManualClock(start);
  const safety = new SafetySwitch();
  const calls: RunContext[] = [];
  const runOnce = vi.fn(async (ctx: RunContext) => {
    calls.push(ctx);
    return ok;
  });
  return { clock, safety, calls, runOnce };
}

describe('runLiveLoop', () => {
  it('runs maxSteps cycles, sleeping between them, then flattens', async () => {
    // 15:50 New York: the third cycle lands after the close
    const h = setup('2026-02-18T20:50:00.000Z');
    const result = await runLiveLoop({
      agentId: 'agent-a',
      executor: { runOnce: h.runOnce },
      hours: HOURS,
      maxSteps: 3,
      intervalMs: 5 * 60_000,
      flattenAtEnd: true,
      safety: h.safety,
      clock: h.clock,
    });

    expect(h.calls).toEqual([{ marketOpen: true }, { marketOpen: true }, { marketOpen: false }, { marketOpen: false, flatten: true }]);
    expect(h.clock.sleeps).toEqual([300_000, 300_000]);
    expect(result.steps).toBe(3);
    expect(result.stopReason).toBe('max_steps');
    expect(result.flattened).toBe(ok);
  });

  it('runs no cycle for a frozen agent', async () => {
    const h = setup('2026-02-18T15:00:00.000Z');
    h.safety.freezeAgent('agent-a');
    const result = await runLiveLoop({
      agentId: 'agent-a',
      executor: { runOnce: h.runOnce },
      hours: HOURS,
      maxSteps: 3,
      intervalMs: 60_000,
      flattenAtEnd: false,
      safety: h.safety,
      clock: h.clock,
    });

    expect(h.runOnce).not.toHaveBeenCalled();
    expect(result).toMatchObject({ steps: 0, stopReason: 'agent frozen' });
  });

  it('stops early on a stop request', async () => {
    const h = setup('2026-02-18T15:00:00.000Z');
    h.runOnce.mockImplementation(async (ctx: RunContext) => {
      h.calls.push(ctx);
      h.safety.killAll('SIGINT');
      return ok;
    });
    const result = await runLiveLoop({
      agentId: 'agent-a',
      executor: { runOnce: h.runOnce },
      hours: HOURS,
      maxSteps: 10,
      intervalMs: 60_000,
      flattenAtEnd: false,
      safety: h.safety,
      clock: h.clock,
    });

    expect(result.steps).toBe(1);
    expect(result.stopReason).toBe('SIGINT');
    expect(result.flattened).toBeNull();
  });
});
