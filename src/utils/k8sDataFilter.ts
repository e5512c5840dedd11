import type { CoreV1Event, V1ContainerStatus, V1Pod } from '@kubernetes/client-node';
import type { ClusterEvent, ContainerRestartObservation, ContainerRestartStatus, WorkloadInstance } from '../types';

// The client deserializes timestamps into Date objects, but fakes and
// older API servers may still hand over RFC 3339 strings.
export function toDate(value: Date | string | undefined | null): Date | null {
  if (value === undefined || value === null) return null;
  const date = value instanceof Date ? value : new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function mapContainerStatus(status: V1ContainerStatus): ContainerRestartStatus {
  return {
    name: status.name,
    restartCount: status.restartCount ?? 0
  };
}

export function filterPodData(pod: V1Pod): WorkloadInstance {
  return {
    namespace: pod.metadata?.namespace || 'default',
    name: pod.metadata?.name || '',
    startTime: toDate(pod.status?.startTime),
    containers: (pod.status?.containerStatuses || []).map(mapContainerStatus)
  };
}

export function filterEventData(event: CoreV1Event): ClusterEvent {
  return {
    reason: event.reason || '',
    message: event.message || '',
    type: event.type || 'Normal',
    involvedObjectName: event.involvedObject?.name || '',
    // events.k8s.io/v1 writers leave lastTimestamp empty and set eventTime
    lastObserved: toDate(event.lastTimestamp) ?? toDate(event.eventTime)
  };
}

export function observeRestarts(workload: WorkloadInstance): ContainerRestartObservation[] {
  return workload.containers.map(c => ({
    containerName: c.name,
    restartCount: c.restartCount,
    startTime: workload.startTime
  }));
}
