import { describe, it, expect, beforeEach } from 'vitest';
import { collectEvidence, correlateEvents } from '../../src/analysis/evidenceCollector';
import { CollectorError } from '../../src/errors';
import type { Incident } from '../../src/types';
import { FakeProvider, makeEvent } from '../helpers/fakes';

const incident: Incident = { namespace: 'ns', name: 'app-1', startTime: new Date('2024-05-01T10:00:00Z') };

describe('correlateEvents', () => {
  it('should keep events about the pod observed after startTime minus one minute', () => {
    const events = [
      makeEvent({ reason: 'Started', lastObserved: new Date('2024-05-01T09:59:30Z') }),
      makeEvent({ reason: 'OldNews', lastObserved: new Date('2024-05-01T09:58:00Z') }),
      makeEvent({ reason: 'Edge', lastObserved: new Date('2024-05-01T09:59:00Z') }),
      makeEvent({ reason: 'MuchLater', lastObserved: new Date('2024-05-03T00:00:00Z') })
    ];

    const correlated = correlateEvents(events, incident);

    // Exactly one minute before is not after the window start
    expect(correlated.map(e => e.reason)).toEqual(['Started', 'MuchLater']);
  });

  it('should drop events about other objects', () => {
    const events = [makeEvent({ involvedObjectName: 'app-2' }), makeEvent({ involvedObjectName: 'app-1' })];

    expect(correlateEvents(events, incident)).toHaveLength(1);
  });

  it('should drop events without an observation time', () => {
    expect(correlateEvents([makeEvent({ lastObserved: null })], incident)).toEqual([]);
  });
});

describe('collectEvidence', () => {
  let provider: FakeProvider;

  beforeEach(() => {
    provider = new FakeProvider();
  });

  it('should return the log tail and correlated events', async () => {
    provider.logs = 'panic: nil pointer dereference\n';
    provider.events = [makeEvent({ reason: 'BackOff' }), makeEvent({ reason: 'Pulled', involvedObjectName: 'db-0' })];

    const bundle = await collectEvidence(provider, incident, 25);

    expect(provider.logRequests).toEqual([{ namespace: 'ns', name: 'app-1', tailLines: 25 }]);
    expect(bundle.rawLogs).toBe('panic: nil pointer dereference\n');
    expect(bundle.events.map(e => e.reason)).toEqual(['BackOff']);
  });

  it('should request 50 lines by default', async () => {
    await collectEvidence(provider, incident);

    expect(provider.logRequests[0]?.tailLines).toBe(50);
  });

  it('should fail without partial evidence when logs cannot be read', async () => {
    provider.logsError = new CollectorError('logs', 'Failed to get logs for ns/app-1: container not found');

    await expect(collectEvidence(provider, incident)).rejects.toThrow('container not found');
  });

  it('should fail when events cannot be listed', async () => {
    provider.eventsError = new CollectorError('events', 'Failed to get events in ns: forbidden');

    await expect(collectEvidence(provider, incident)).rejects.toBeInstanceOf(CollectorError);
  });

  it('should not start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(collectEvidence(provider, incident, 50, controller.signal)).rejects.toThrow();
    expect(provider.logRequests).toHaveLength(0);
  });
});
