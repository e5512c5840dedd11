import type { ResourceProvider } from '../../src/cluster/resourceProvider';
import type { NotificationPublisher } from '../../src/notify/slackPublisher';
import type { ClusterEvent, WorkloadInstance, WorkloadScope } from '../../src/types';

export function makeWorkload(overrides: Partial<WorkloadInstance> = {}): WorkloadInstance {
  return {
    namespace: 'ns',
    name: 'app-1',
    startTime: new Date('2024-05-01T10:00:00Z'),
    containers: [{ name: 'main', restartCount: 0 }],
    ...overrides
  };
}

export function makeEvent(overrides: Partial<ClusterEvent> = {}): ClusterEvent {
  return {
    reason: 'BackOff',
    message: 'Back-off restarting failed container',
    type: 'Warning',
    involvedObjectName: 'app-1',
    lastObserved: new Date('2024-05-01T10:00:30Z'),
    ...overrides
  };
}

// In-memory cluster: tests swap the fields between polls
export class FakeProvider implements ResourceProvider {
  workloads: WorkloadInstance[] = [];
  events: ClusterEvent[] = [];
  logs = '';
  listError: Error | null = null;
  logsError: Error | null = null;
  eventsError: Error | null = null;
  readonly scopes: WorkloadScope[] = [];
  readonly logRequests: { namespace: string; name: string; tailLines: number }[] = [];

  async listWorkloads(scope: WorkloadScope): Promise<WorkloadInstance[]> {
    this.scopes.push(scope);
    if (this.listError) throw this.listError;
    return this.workloads;
  }

  async getLogs(namespace: string, name: string, tailLines: number): Promise<string> {
    this.logRequests.push({ namespace, name, tailLines });
    if (this.logsError) throw this.logsError;
    return this.logs;
  }

  async listEvents(): Promise<ClusterEvent[]> {
    if (this.eventsError) throw this.eventsError;
    return this.events;
  }

  async ping(): Promise<string> {
    return 'v1.30.0';
  }
}

export interface PostedMessage {
  threadRef: string | undefined;
  text: string;
}

export class RecordingPublisher implements NotificationPublisher {
  readonly posted: PostedMessage[] = [];
  parentRef: string | undefined = '1700000000.000100';
  replyRef: string | undefined = '1700000000.000200';

  async postMessage(text: string): Promise<string | undefined> {
    this.posted.push({ threadRef: undefined, text });
    return this.parentRef;
  }

  async postThreadReply(messageRef: string, text: string): Promise<string | undefined> {
    this.posted.push({ threadRef: messageRef, text });
    return this.replyRef;
  }
}
