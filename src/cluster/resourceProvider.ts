import type * as k8s from '@kubernetes/client-node';
import { getLogger } from '@fluidware-it/saddlebag';
import { CollectorError, extractK8sErrorMessage } from '../errors';
import type { ClusterEvent, WorkloadInstance, WorkloadScope } from '../types';
import { filterEventData, filterPodData } from '../utils/k8sDataFilter';

const logger = getLogger();

// The orchestration platform as the restart pipeline sees it
export interface ResourceProvider {
  listWorkloads(scope: WorkloadScope): Promise<WorkloadInstance[]>;
  getLogs(namespace: string, name: string, tailLines: number): Promise<string>;
  listEvents(namespace: string): Promise<ClusterEvent[]>;
  ping(): Promise<string>;
}

export type CoreApi = Pick<
  k8s.CoreV1Api,
  'listPodForAllNamespaces' | 'listNamespacedPod' | 'readNamespacedPodLog' | 'listNamespacedEvent'
>;

export type VersionApi = Pick<k8s.VersionApi, 'getCode'>;

export class KubernetesResourceProvider implements ResourceProvider {
  constructor(
    private readonly coreApi: CoreApi,
    private readonly versionApi: VersionApi
  ) {}

  async listWorkloads(scope: WorkloadScope): Promise<WorkloadInstance[]> {
    try {
      const res = scope.namespace
        ? await this.coreApi.listNamespacedPod({ namespace: scope.namespace })
        : await this.coreApi.listPodForAllNamespaces();
      return res.items.map(filterPodData);
    } catch (e: unknown) {
      const msg = extractK8sErrorMessage(e, scope.namespace ? `namespace ${scope.namespace}` : 'all namespaces');
      throw new CollectorError('list-workloads', `Error fetching pods: ${msg}`, e);
    }
  }

  async getLogs(namespace: string, name: string, tailLines: number): Promise<string> {
    try {
      logger.debug(`Reading pod ${namespace}/${name} logs (tailLines: ${tailLines})`);
      return await this.coreApi.readNamespacedPodLog({ name, namespace, tailLines });
    } catch (e: unknown) {
      const msg = extractK8sErrorMessage(e, name);
      throw new CollectorError('logs', `Failed to get logs for ${namespace}/${name}: ${msg}`, e);
    }
  }

  async listEvents(namespace: string): Promise<ClusterEvent[]> {
    try {
      const res = await this.coreApi.listNamespacedEvent({ namespace });
      return res.items.map(filterEventData);
    } catch (e: unknown) {
      const msg = extractK8sErrorMessage(e, `namespace ${namespace}`);
      throw new CollectorError('events', `Failed to get events in ${namespace}: ${msg}`, e);
    }
  }

  // Startup reachability probe; resolves to the API server version
  async ping(): Promise<string> {
    const info = await this.versionApi.getCode();
    return info.gitVersion;
  }
}
