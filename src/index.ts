#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { getLogger } from '@fluidware-it/saddlebag';
import { AnalysisRequester } from './analysis/analysisRequester';
import type { TextGenerator } from './analysis/textGenerator';
import { parseArgs } from './cli/parser';
import { createKubeClients } from './cluster/k8sClient';
import { KubernetesResourceProvider } from './cluster/resourceProvider';
import { getConfig } from './config/config';
import { DedupState } from './detector/dedupState';
import { IncidentSupervisor } from './detector/incidentSupervisor';
import { RestartDetector } from './detector/restartDetector';
import { errorMessage } from './errors';
import { createTextGenerator, getModelDescription, parseModelSpec } from './models/modelFactory';
import { SlackPublisher } from './notify/slackPublisher';
import { IncidentPipeline } from './pipeline/incidentPipeline';

dotenv.config();

const logger = getLogger();

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const config = getConfig();
  const pollIntervalMs = args.intervalSeconds ? Math.round(args.intervalSeconds * 1000) : config.pollIntervalMs;
  const modelSpec = args.model || config.inferenceModel;

  logger.info('Starting pod-restart-notifier');

  // Without the cluster there is nothing to watch: bootstrap failures are fatal
  let provider: KubernetesResourceProvider;
  let generator: TextGenerator;
  try {
    const clients = createKubeClients(args.context);
    provider = new KubernetesResourceProvider(clients.coreApi, clients.versionApi);
    const version = await provider.ping();
    logger.info(`Connected to context ${clients.contextName} (Kubernetes ${version})`);
    const spec = parseModelSpec(modelSpec);
    generator = createTextGenerator(spec, config.inferenceEndpoint);
    logger.info(`Using model ${getModelDescription(spec)}`);
  } catch (error: unknown) {
    logger.error(`Startup failed: ${errorMessage(error)}`);
    process.exit(1);
  }

  if (!config.slackToken) {
    logger.warn('SLACK_BOT_TOKEN is not set, notifications will be rejected by Slack');
  }

  const pipeline = new IncidentPipeline({
    provider,
    requester: new AnalysisRequester(generator),
    publisher: new SlackPublisher({ channel: config.slackChannel, token: config.slackToken, url: config.slackApiUrl }),
    logTailLines: config.logTailLines
  });

  const supervisor = new IncidentSupervisor(async (incident, signal) => {
    await pipeline.run(incident, signal);
  }, config.taskTimeoutMs);

  const detector = new RestartDetector(
    provider,
    incident => supervisor.spawn(incident),
    { scope: { namespace: args.namespace }, pollIntervalMs },
    new DedupState({ maxEntries: config.dedupMaxEntries, idleCycles: config.dedupIdleCycles })
  );

  if (args.once) {
    const incidents = await detector.pollOnce();
    logger.info(`Single poll dispatched ${incidents.length} incident(s)`);
    await supervisor.drain();
    return;
  }

  const stop = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, shutting down`);
    detector.stop();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  await detector.run();
  await supervisor.shutdown(config.shutdownGraceMs);
}

main().catch((e: unknown) => {
  logger.error(`Fatal error: ${errorMessage(e)}`);
  process.exit(1);
});
