import { describe, it, expect } from 'vitest';
import { AuditEventChannel } from './event-channel.js';
import type { AuditEvent, AuditReport } from './types.js';

function started(iteration: number): AuditEvent {
  return { type: 'stage_started', auditId: 'audit-1', timestamp: iteration, stage: 'scout', iteration, estimatedRemainingMs: 0 };
}

const report: AuditReport = {
  auditId: 'audit-1',
  url: 'https://example.test/',
  tier: 'quick_scan',
  verdictMode: 'expert',
  status: 'DONE',
  siteType: 'general',
  iterations: 1,
  trustScore: null,
  narrative: '',
  degradation: [],
  totalPenalty: 0,
  externalCalls: 0,
  elapsedMs: 0,
  investigatedUrls: [],
  complexityHistory: [],
  predictions: [],
  budgetExhausted: false,
  forcedVerdict: false,
};

async function collect(channel: AuditEventChannel): Promise<AuditEvent[]> {
  const events: AuditEvent[] = [];
  for await (const event of channel.subscribe()) events.push(event);
  return events;
}

describe('AuditEventChannel', () => {
  it('replays buffered events to late subscribers', async () => {
    const channel = new AuditEventChannel();
    channel.push(started(1));
    channel.push({ type: 'audit_complete', auditId: 'audit-1', timestamp: 2, report });
    const events = await collect(channel);
    expect(events.map((event) => event.type)).toEqual(['stage_started', 'audit_complete']);
  });

  it('delivers events pushed while a subscriber waits', async () => {
    const channel = new AuditEventChannel();
    const pending = collect(channel);
    channel.push(started(1));
    await Promise.resolve();
    channel.push(started(2));
    channel.push({ type: 'audit_error', auditId: 'audit-1', timestamp: 3, message: 'boom', report });
    const events = await pending;
    expect(events).toHaveLength(3);
    expect(events[2].type).toBe('audit_error');
  });

  it('drops events after the terminal one', () => {
    const channel = new AuditEventChannel();
    expect(channel.push({ type: 'audit_complete', auditId: 'audit-1', timestamp: 1, report })).toBe(true);
    expect(channel.isClosed).toBe(true);
    expect(channel.push(started(2))).toBe(false);
    expect(channel.size).toBe(1);
  });

  it('serves several subscribers independently', async () => {
    const channel = new AuditEventChannel();
    const first = collect(channel);
    const second = collect(channel);
    channel.push(started(1));
    channel.push({ type: 'audit_complete', auditId: 'audit-1', timestamp: 2, report });
    expect(await first).toHaveLength(2);
    expect(await second).toHaveLength(2);
  });
});
