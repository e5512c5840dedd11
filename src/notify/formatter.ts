import type { ClusterEvent, Incident } from '../types';

export const LOG_BLOCK_LIMIT = 1000;
export const ANALYSIS_BLOCK_LIMIT = 3000;
export const TRUNCATION_SUFFIX = '... (truncated)';

// Lines whose trimmed text starts with one of these are shell commands
export const COMMAND_PREFIXES = ['kubectl ', 'bash '];

const pad = (n: number): string => String(n).padStart(2, '0');

// YYYY-MM-DD HH:MM:SS, in UTC
export function formatRestartTime(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}

export function formatSummary(incident: Incident): string {
  const lines: string[] = [];
  lines.push('*🚨 Pod Restart Detected!*');
  lines.push(`> *Pod:* \`${incident.name}\``);
  lines.push(`> *Namespace:* \`${incident.namespace}\``);
  lines.push(`> *Restart Time:* \`${formatRestartTime(incident.startTime)}\``);
  return lines.join('\n');
}

export function formatEvents(events: ClusterEvent[]): string {
  return events.map(e => `${e.reason}: ${e.message}`).join('\n');
}

// Cuts on raw length, possibly mid-line, but never inside a surrogate pair
export function truncate(text: string, limit: number): string {
  if (text.length <= limit) return text;
  let end = limit;
  const last = text.charCodeAt(end - 1);
  if (end > 0 && last >= 0xd800 && last <= 0xdbff) end--;
  return text.slice(0, end) + TRUNCATION_SUFFIX;
}

function isCommandLine(trimmed: string): boolean {
  return COMMAND_PREFIXES.some(prefix => trimmed.startsWith(prefix));
}

// Wraps each run of command lines in one ```bash fence. Not a markdown
// parser: only the start of each line is looked at. Lines come out trimmed.
export function formatCodeBlockLines(lines: string[]): string[] {
  const formatted: string[] = [];
  let inCodeBlock = false;

  for (const line of lines) {
    const trimmed = line.trim();
    if (isCommandLine(trimmed)) {
      if (!inCodeBlock) {
        formatted.push('```bash');
        inCodeBlock = true;
      }
      formatted.push(trimmed);
      continue;
    }
    if (inCodeBlock) {
      formatted.push('```');
      inCodeBlock = false;
    }
    formatted.push(trimmed);
  }

  if (inCodeBlock) {
    formatted.push('```');
  }
  return formatted;
}

export function formatCodeBlocks(text: string): string {
  return formatCodeBlockLines(text.split('\n')).join('\n');
}

// Thread replies in posting order: events, logs, analysis
export function formatThreadReplies(events: ClusterEvent[], rawLogs: string, analysis: string): string[] {
  return [
    `📋 *Events:*\n\`\`\`${formatEvents(events)}\`\`\``,
    `📦 *Logs:*\n\`\`\`${truncate(rawLogs, LOG_BLOCK_LIMIT)}\`\`\``,
    `🤖 *Analysis:*\n${formatCodeBlocks(truncate(analysis, ANALYSIS_BLOCK_LIMIT))}`
  ];
}
