import { getLogger } from '@fluidware-it/saddlebag';
import type { AnalysisRequester } from '../analysis/analysisRequester';
import { collectEvidence } from '../analysis/evidenceCollector';
import type { ResourceProvider } from '../cluster/resourceProvider';
import { errorMessage } from '../errors';
import { formatSummary, formatThreadReplies } from '../notify/formatter';
import type { NotificationPublisher } from '../notify/slackPublisher';
import { incidentKey, type EvidenceBundle, type Incident } from '../types';

const logger = getLogger();

export interface IncidentPipelineDeps {
  provider: ResourceProvider;
  requester: AnalysisRequester;
  publisher: NotificationPublisher;
  logTailLines: number;
}

export type IncidentOutcome = 'published' | 'abandoned' | 'publish-failed';

// Evidence, analysis, then the summary message and its three thread
// replies, strictly in that order. Runs inside an analysis task and never
// touches the detector's dedup state.
export class IncidentPipeline {
  constructor(private readonly deps: IncidentPipelineDeps) {}

  async run(incident: Incident, signal?: AbortSignal): Promise<IncidentOutcome> {
    const key = incidentKey(incident);

    let evidence: EvidenceBundle;
    let analysis: string;
    try {
      evidence = await collectEvidence(this.deps.provider, incident, this.deps.logTailLines, signal);
      signal?.throwIfAborted();
      analysis = await this.deps.requester.analyze(evidence, signal);
    } catch (error: unknown) {
      if (signal?.aborted) throw error;
      logger.error(`Failed to analyze pod ${key}: ${errorMessage(error)}`);
      return 'abandoned';
    }

    signal?.throwIfAborted();
    return this.publish(incident, evidence, analysis, signal);
  }

  private async publish(
    incident: Incident,
    evidence: EvidenceBundle,
    analysis: string,
    signal?: AbortSignal
  ): Promise<IncidentOutcome> {
    const key = incidentKey(incident);
    const messageRef = await this.deps.publisher.postMessage(formatSummary(incident));
    if (!messageRef) {
      logger.error(`Could not post restart summary for ${key}, skipping thread replies`);
      return 'publish-failed';
    }

    for (const reply of formatThreadReplies(evidence.events, evidence.rawLogs, analysis)) {
      signal?.throwIfAborted();
      const replyRef = await this.deps.publisher.postThreadReply(messageRef, reply);
      if (!replyRef) {
        logger.warn(`Thread reply for ${key} was not posted`);
      }
    }

    logger.info(`Posted restart analysis for ${key}`);
    return 'published';
  }
}
