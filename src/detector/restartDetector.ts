import { setTimeout as sleep } from 'timers/promises';
import { getLogger } from '@fluidware-it/saddlebag';
import type { ResourceProvider } from '../cluster/resourceProvider';
import { errorMessage } from '../errors';
import { incidentKey, type Incident, type WorkloadInstance, type WorkloadScope } from '../types';
import { observeRestarts } from '../utils/k8sDataFilter';
import { DedupState } from './dedupState';

const logger = getLogger();

export type IncidentDispatcher = (incident: Incident) => void;

export interface RestartDetectorOptions {
  scope: WorkloadScope;
  pollIntervalMs: number;
}

// Returns the incident a workload represents in this poll, if any.
// Records the observation in `state` before returning, so a dispatched
// incident is already deduplicated when the next poll runs.
export function detectIncident(workload: WorkloadInstance, state: DedupState): Incident | null {
  for (const observation of observeRestarts(workload)) {
    if (observation.restartCount > 0 && observation.startTime) {
      const key = incidentKey(workload);
      if (!state.observe(key, observation.startTime)) return null;
      return { namespace: workload.namespace, name: workload.name, startTime: observation.startTime };
    }
  }
  return null;
}

export class RestartDetector {
  private readonly stopController = new AbortController();

  constructor(
    private readonly provider: ResourceProvider,
    private readonly dispatch: IncidentDispatcher,
    private readonly options: RestartDetectorOptions,
    readonly state: DedupState = new DedupState()
  ) {}

  get stopped(): boolean {
    return this.stopController.signal.aborted;
  }

  // One poll cycle. Never throws: a failed listing is logged and the
  // cycle skipped. Returns the incidents dispatched during this cycle.
  async pollOnce(): Promise<Incident[]> {
    let workloads: WorkloadInstance[];
    try {
      workloads = await this.provider.listWorkloads(this.options.scope);
    } catch (error: unknown) {
      logger.error(`Error fetching pods: ${errorMessage(error)}`);
      return [];
    }

    this.state.beginCycle();
    const dispatched: Incident[] = [];
    for (const workload of workloads) {
      const incident = detectIncident(workload, this.state);
      if (!incident) continue;

      logger.info(`Detected restart: ${incidentKey(incident)} started at ${incident.startTime.toISOString()}`);
      dispatched.push(incident);
      this.dispatch(incident);
    }

    const evicted = this.state.evictIdle();
    if (evicted > 0) {
      logger.debug(`Evicted ${evicted} idle dedup entr${evicted === 1 ? 'y' : 'ies'}`);
    }
    return dispatched;
  }

  // Polls until stop() is called
  async run(): Promise<void> {
    const scope = this.options.scope.namespace ? `namespace ${this.options.scope.namespace}` : 'all namespaces';
    logger.info(`Pod restart monitor started (${scope}, every ${this.options.pollIntervalMs}ms)`);

    while (!this.stopped) {
      await this.pollOnce();
      try {
        await sleep(this.options.pollIntervalMs, undefined, { signal: this.stopController.signal });
      } catch (error: unknown) {
        if (!this.stopped) throw error;
      }
    }
    logger.info('Pod restart monitor stopped');
  }

  stop(): void {
    this.stopController.abort();
  }
}
