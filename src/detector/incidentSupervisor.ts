import { getLogger } from '@fluidware-it/saddlebag';
import { TaskCancelledError, TimeoutStrategy, timeout, type TimeoutPolicy } from 'cockatiel';
import { errorMessage } from '../errors';
import { incidentKey, type Incident } from '../types';

const logger = getLogger();

export type IncidentTask = (incident: Incident, signal: AbortSignal) => Promise<void>;

interface InFlightTask {
  incident: Incident;
  controller: AbortController;
  done: Promise<void>;
}

function taskId(incident: Incident): string {
  return `${incidentKey(incident)}@${incident.startTime.toISOString()}`;
}

// Runs one analysis task per incident without ever blocking the caller.
// Every task gets a deadline and an abort signal; the in-flight set lets
// shutdown wait for them or cancel them instead of leaking them.
export class IncidentSupervisor {
  private readonly inFlight = new Map<string, InFlightTask>();
  private readonly policy: TimeoutPolicy;

  constructor(
    private readonly task: IncidentTask,
    taskTimeoutMs: number
  ) {
    this.policy = timeout(taskTimeoutMs, TimeoutStrategy.Aggressive);
  }

  get size(): number {
    return this.inFlight.size;
  }

  pending(): Incident[] {
    return [...this.inFlight.values()].map(t => t.incident);
  }

  spawn(incident: Incident): void {
    const id = taskId(incident);
    if (this.inFlight.has(id)) {
      logger.warn(`Analysis for ${id} is already running, not starting another`);
      return;
    }

    const controller = new AbortController();
    const done = this.policy
      .execute(({ signal }) => this.task(incident, signal), controller.signal)
      .catch((error: unknown) => {
        if (error instanceof TaskCancelledError) {
          const why = controller.signal.aborted ? 'cancelled on shutdown' : 'timed out';
          logger.warn(`Analysis for ${incidentKey(incident)} ${why}`);
          return;
        }
        logger.error(`Analysis for ${incidentKey(incident)} failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.inFlight.delete(id);
      });

    this.inFlight.set(id, { incident, controller, done });
  }

  // Resolves once every in-flight task has settled
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight.values()].map(t => t.done));
    }
  }

  // Waits up to `gracePeriodMs` for in-flight tasks, then aborts the rest
  async shutdown(gracePeriodMs: number): Promise<void> {
    if (this.inFlight.size === 0) return;
    logger.info(`Waiting up to ${gracePeriodMs}ms for ${this.inFlight.size} in-flight analysis task(s)`);

    let timer: NodeJS.Timeout | undefined;
    const graceElapsed = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), gracePeriodMs);
    });
    const outcome = await Promise.race([this.drain().then(() => 'drained' as const), graceElapsed]);
    clearTimeout(timer);

    if (outcome === 'timeout') {
      logger.warn(`Cancelling ${this.inFlight.size} analysis task(s) still running`);
      for (const t of this.inFlight.values()) {
        t.controller.abort();
      }
      await this.drain();
    }
  }
}
