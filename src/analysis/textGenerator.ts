import type { AxiosInstance } from 'axios';
import { HumanMessage } from '@langchain/core/messages';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { getLogger } from '@fluidware-it/saddlebag';
import { z } from 'zod';
import { InferenceError } from '../errors';

const logger = getLogger();

export const NO_RESPONSE_FALLBACK = 'No response from model';

export interface TextGenerator {
  generate(prompt: string, signal?: AbortSignal): Promise<string>;
}

export type HttpClient = Pick<AxiosInstance, 'post'>;

const GenerateResponseSchema = z.object({
  response: z.string()
});

// Single non-streaming call to an Ollama-style /api/generate endpoint
export class OllamaGenerateClient implements TextGenerator {
  constructor(
    private readonly http: HttpClient,
    private readonly endpoint: string,
    private readonly model: string
  ) {}

  async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    const res = await this.http.post<string>(
      this.endpoint,
      { model: this.model, prompt, stream: false },
      {
        headers: { 'Content-Type': 'application/json' },
        // Decoded below so that a non-JSON body is reported, not swallowed
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
        ...(signal && { signal })
      }
    );

    if (res.status >= 400) {
      logger.warn(`Inference endpoint answered HTTP ${res.status}`);
    }

    let body: unknown;
    try {
      body = JSON.parse(String(res.data));
    } catch (error: unknown) {
      throw new InferenceError(`Could not decode inference response (HTTP ${res.status})`, error);
    }

    const parsed = GenerateResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.warn('Inference response carries no text, using fallback');
      return NO_RESPONSE_FALLBACK;
    }
    return parsed.data.response;
  }
}

// Same contract on top of a LangChain chat model
export class ChatModelGenerator implements TextGenerator {
  constructor(private readonly model: Pick<BaseChatModel, 'invoke'>) {}

  async generate(prompt: string, signal?: AbortSignal): Promise<string> {
    const response = await this.model.invoke([new HumanMessage(prompt)], signal ? { signal } : undefined);
    if (typeof response.content !== 'string') {
      logger.warn('Chat model returned structured content, using fallback');
      return NO_RESPONSE_FALLBACK;
    }
    return response.content;
  }
}
