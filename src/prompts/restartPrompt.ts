export const RESTART_ANALYSIS_PREAMBLE =
  'Here are the logs and events from a Kubernetes pod. Help me identify the issue and suggest a fix.';

export function getRestartAnalysisPrompt(eventLines: string, logs: string): string {
  return `${RESTART_ANALYSIS_PREAMBLE}

Events:
${eventLines}

Logs:
${logs}`;
}
