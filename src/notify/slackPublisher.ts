import axios, { type AxiosInstance } from 'axios';
import { getLogger } from '@fluidware-it/saddlebag';
import { z } from 'zod';
import { errorMessage } from '../errors';

const logger = getLogger();

export const SLACK_POST_MESSAGE_URL = 'https://slack.com/api/chat.postMessage';

// A message reference is the channel-generated id used to thread replies.
// Publishers never throw: a failed post is logged and yields undefined.
export interface NotificationPublisher {
  postMessage(text: string): Promise<string | undefined>;
  postThreadReply(messageRef: string, text: string): Promise<string | undefined>;
}

export interface SlackPayload {
  channel: string;
  text: string;
  thread_ts?: string;
}

export interface SlackPublisherOptions {
  channel: string;
  token: string | undefined;
  url?: string | undefined;
}

const PostMessageResponseSchema = z.object({
  ok: z.boolean(),
  ts: z.string().optional(),
  error: z.string().optional()
});

export class SlackPublisher implements NotificationPublisher {
  private readonly url: string;

  constructor(
    private readonly options: SlackPublisherOptions,
    private readonly http: Pick<AxiosInstance, 'post'> = axios.create()
  ) {
    this.url = options.url || SLACK_POST_MESSAGE_URL;
  }

  postMessage(text: string): Promise<string | undefined> {
    return this.post({ channel: this.options.channel, text });
  }

  postThreadReply(messageRef: string, text: string): Promise<string | undefined> {
    return this.post({ channel: this.options.channel, text, thread_ts: messageRef });
  }

  private async post(payload: SlackPayload): Promise<string | undefined> {
    let data: unknown;
    try {
      const res = await this.http.post<unknown>(this.url, payload, {
        headers: {
          'Content-Type': 'application/json; charset=utf-8',
          Authorization: `Bearer ${this.options.token ?? ''}`
        },
        timeout: 10_000
      });
      data = res.data;
    } catch (error: unknown) {
      logger.error(`Slack API error: ${errorMessage(error)}`);
      return undefined;
    }

    const parsed = PostMessageResponseSchema.safeParse(data);
    if (!parsed.success || !parsed.data.ok) {
      logger.error(`Slack API response: ${JSON.stringify(data)}`);
      return undefined;
    }
    if (!parsed.data.ts) {
      logger.error('Slack API response carries no message ts');
      return undefined;
    }
    return parsed.data.ts;
  }
}
