import { getLogger } from '@fluidware-it/saddlebag';
import type { ResourceProvider } from '../cluster/resourceProvider';
import type { ClusterEvent, EvidenceBundle, Incident } from '../types';

const logger = getLogger();

export const DEFAULT_LOG_TAIL_LINES = 50;

// Events observed up to this long before the restart still count as related
export const EVENT_LOOKBACK_MS = 60_000;

// Events about the incident's pod last observed after startTime - 1 minute.
// The window has no upper bound: late events are kept rather than missed.
export function correlateEvents(events: ClusterEvent[], incident: Incident): ClusterEvent[] {
  const windowStart = incident.startTime.getTime() - EVENT_LOOKBACK_MS;
  return events.filter(
    e => e.involvedObjectName === incident.name && e.lastObserved !== null && e.lastObserved.getTime() > windowStart
  );
}

export async function collectEvidence(
  provider: ResourceProvider,
  incident: Incident,
  tailLines: number = DEFAULT_LOG_TAIL_LINES,
  signal?: AbortSignal
): Promise<EvidenceBundle> {
  // Both calls throw CollectorError; partial evidence is never returned
  signal?.throwIfAborted();
  const rawLogs = await provider.getLogs(incident.namespace, incident.name, tailLines);

  signal?.throwIfAborted();
  const allEvents = await provider.listEvents(incident.namespace);
  const events = correlateEvents(allEvents, incident);

  logger.debug(
    `Collected ${rawLogs.length} bytes of logs and ${events.length}/${allEvents.length} events for ${incident.namespace}/${incident.name}`
  );
  return { rawLogs, events };
}
