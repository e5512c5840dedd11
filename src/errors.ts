export type PipelineStage = 'list-workloads' | 'logs' | 'events' | 'inference' | 'publish';

export class PipelineError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, cause?: unknown) {
    super(message, { cause });
    this.stage = stage;
    this.name = 'PipelineError';
  }
}

// Raised when the resource provider cannot list workloads, logs or events
export class CollectorError extends PipelineError {
  constructor(stage: 'list-workloads' | 'logs' | 'events', message: string, cause?: unknown) {
    super(stage, message, cause);
    this.name = 'CollectorError';
  }
}

// Transport or decoding failure of the inference collaborator.
// A well-formed reply without text is not an error.
export class InferenceError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('inference', message, cause);
    this.name = 'InferenceError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

// Extract a human-readable message from a K8s API error.
// Tries multiple paths where the K8s client may place the error message.
export function extractK8sErrorMessage(e: unknown, fallbackContext: string): string {
  if (!isRecord(e)) {
    return e === undefined || e === null ? `Unknown error for ${fallbackContext}` : String(e);
  }

  // Try e.body (string containing JSON with a "message" field)
  const body = e.body;
  if (typeof body === 'string') {
    try {
      const parsed: unknown = JSON.parse(body);
      if (isRecord(parsed) && typeof parsed.message === 'string') return parsed.message;
      // JSON parsed but no message field, fall through to other strategies
    } catch {
      // Not valid JSON, return the raw string body
      return body;
    }
  }

  // Try e.response.body.message
  const responseMessage = isRecord(e.response) && isRecord(e.response.body) ? e.response.body.message : undefined;
  if (typeof responseMessage === 'string') return responseMessage;

  if (typeof e.message === 'string' && e.message) return e.message;

  return `Unknown error for ${fallbackContext}`;
}
