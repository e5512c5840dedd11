// Domain shapes reduced from the raw Kubernetes objects. Nothing here
// outlives a single poll cycle except the Incident handed to a task.

export interface WorkloadScope {
  // Undefined means every namespace the credentials can list
  namespace?: string | undefined;
}

export interface ContainerRestartStatus {
  name: string;
  restartCount: number;
}

export interface WorkloadInstance {
  namespace: string;
  name: string;
  // Pod-level start time; null while the pod has not been scheduled yet
  startTime: Date | null;
  containers: ContainerRestartStatus[];
}

export interface ContainerRestartObservation {
  containerName: string;
  restartCount: number;
  startTime: Date | null;
}

export interface ClusterEvent {
  reason: string;
  message: string;
  type: string;
  involvedObjectName: string;
  lastObserved: Date | null;
}

export interface Incident {
  readonly namespace: string;
  readonly name: string;
  readonly startTime: Date;
}

export interface EvidenceBundle {
  rawLogs: string;
  events: ClusterEvent[];
}

export function incidentKey(workload: { namespace: string; name: string }): string {
  return `${workload.namespace}/${workload.name}`;
}
