import { getLogger } from '@fluidware-it/saddlebag';
import { SLACK_POST_MESSAGE_URL } from '../notify/slackPublisher';

export interface AppConfig {
  slackToken: string | undefined;
  slackChannel: string;
  slackApiUrl: string;
  inferenceEndpoint: string;
  inferenceModel: string;
  pollIntervalMs: number;
  logTailLines: number;
  taskTimeoutMs: number;
  shutdownGraceMs: number;
  dedupMaxEntries: number;
  dedupIdleCycles: number;
}

export const DEFAULTS = {
  slackChannel: '#pod-restarts',
  inferenceEndpoint: 'http://localhost:11434/api/generate',
  inferenceModel: 'generate/llama3',
  pollIntervalMs: 30_000,
  logTailLines: 50,
  taskTimeoutMs: 300_000,
  shutdownGraceMs: 10_000,
  dedupMaxEntries: 10_000,
  dedupIdleCycles: 120
} as const;

export function getConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    slackToken: env.SLACK_BOT_TOKEN || undefined,
    slackChannel: env.SLACK_CHANNEL || DEFAULTS.slackChannel,
    slackApiUrl: env.SLACK_API_URL || SLACK_POST_MESSAGE_URL,
    inferenceEndpoint: env.INFERENCE_ENDPOINT || DEFAULTS.inferenceEndpoint,
    inferenceModel: env.INFERENCE_MODEL || DEFAULTS.inferenceModel,
    pollIntervalMs: getPositiveInt(env, 'POLL_INTERVAL_MS', DEFAULTS.pollIntervalMs),
    logTailLines: getPositiveInt(env, 'LOG_TAIL_LINES', DEFAULTS.logTailLines),
    taskTimeoutMs: getPositiveInt(env, 'TASK_TIMEOUT_MS', DEFAULTS.taskTimeoutMs),
    shutdownGraceMs: getPositiveInt(env, 'SHUTDOWN_GRACE_MS', DEFAULTS.shutdownGraceMs),
    dedupMaxEntries: getPositiveInt(env, 'DEDUP_MAX_ENTRIES', DEFAULTS.dedupMaxEntries),
    dedupIdleCycles: getPositiveInt(env, 'DEDUP_IDLE_CYCLES', DEFAULTS.dedupIdleCycles)
  };
}

export function getPositiveInt(env: NodeJS.ProcessEnv, name: string, defaultValue: number): number {
  const raw = env[name];
  if (!raw) return defaultValue;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    getLogger().warn(`Ignoring ${name}=${raw}: expected a positive integer, using ${defaultValue}`);
    return defaultValue;
  }
  return value;
}
