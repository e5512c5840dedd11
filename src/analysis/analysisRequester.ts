import { getLogger } from '@fluidware-it/saddlebag';
import { InferenceError, errorMessage } from '../errors';
import { getRestartAnalysisPrompt } from '../prompts/restartPrompt';
import type { ClusterEvent, EvidenceBundle } from '../types';
import type { TextGenerator } from './textGenerator';

const logger = getLogger();

export function formatEventLines(events: ClusterEvent[]): string {
  return events.map(e => `- ${e.reason}: ${e.message}`).join('\n');
}

export function buildAnalysisPrompt(evidence: EvidenceBundle): string {
  return getRestartAnalysisPrompt(formatEventLines(evidence.events), evidence.rawLogs);
}

export class AnalysisRequester {
  constructor(private readonly generator: TextGenerator) {}

  // Transport and decoding failures surface as InferenceError; a reply
  // without text has already been degraded to the fallback by the generator.
  async analyze(evidence: EvidenceBundle, signal?: AbortSignal): Promise<string> {
    const prompt = buildAnalysisPrompt(evidence);
    logger.debug(`Requesting analysis (${prompt.length} chars of prompt)`);
    try {
      return await this.generator.generate(prompt, signal);
    } catch (error: unknown) {
      if (error instanceof InferenceError) throw error;
      throw new InferenceError(`Inference request failed: ${errorMessage(error)}`, error);
    }
  }
}
