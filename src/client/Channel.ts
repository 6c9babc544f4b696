/**
 * Channel handle
 *
 * Bound to one channel id on a MirthApi session. Holds whatever metadata
 * was known when it was created (name, description, revision) and exposes
 * the per-channel endpoints: info, statistics, messages and deploy/start
 * controls.
 */

import { z } from 'zod';
import { ChannelModel, ChannelStatistics } from '../models/channels.js';
import {
  ChannelMessageList,
  ChannelMessageModel,
  ChannelMessageResponse,
  LongResponse,
  MirthErrorMessage,
  buildChannelMessage,
} from '../models/messages.js';
import { MirthPostError, MirthValidationError } from './errors.js';
import type { MirthApi, QueryParams } from './MirthApi.js';
import { supportsMessagesWithObj } from './version.js';

export interface ChannelMetadata {
  name?: string;
  description?: string;
  revision?: string;
}

export interface MessageQuery {
  limit?: number;
  offset?: number;
  includeContent?: boolean;
  /** Message statuses, e.g. ['error', 'SENT']; sent upper-cased */
  status?: string[];
  /** Extra query parameters; the explicit options above take precedence */
  params?: QueryParams;
}

export interface PostMessageOptions {
  /** Throw MirthPostError when a connector reports ERROR (default true) */
  raiseErrors?: boolean;
  /** Mark the raw data as base64-encoded binary */
  binary?: boolean;
}

export type ChannelCommand = 'start' | 'stop' | 'pause' | 'resume' | 'deploy' | 'undeploy';

const channelIdSchema = z.string().uuid();

function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

/**
 * Throw if any connector of a posted message ended in ERROR.
 *
 * The reason is read from the connector's response content when Mirth
 * captured one, else the connector's error code is reported.
 */
export function raisePostErrors(received: ChannelMessageModel): void {
  for (const connectorMessage of Object.values(received.connectorMessages)) {
    if (connectorMessage.status !== 'ERROR') continue;

    const content = connectorMessage.response?.content;
    let errorMessage = `Error Code ${connectorMessage.errorCode}`;
    if (content) {
      const response = MirthErrorMessage.parse(content);
      errorMessage = response.message ?? response.statusMessage ?? response.error ?? errorMessage;
    }
    throw new MirthPostError(`Error posting to Mirth: ${errorMessage}`);
  }
}

export class Channel {
  readonly id: string;
  readonly name: string | undefined;
  readonly description: string | undefined;
  readonly revision: string | undefined;

  constructor(
    readonly mirth: MirthApi,
    id: string,
    metadata: ChannelMetadata = {}
  ) {
    const parsed = channelIdSchema.safeParse(id);
    if (!parsed.success) {
      throw new MirthValidationError(`Invalid channel id: ${id}`);
    }
    this.id = parsed.data;
    this.name = metadata.name;
    this.description = metadata.description;
    this.revision = metadata.revision;
  }

  /**
   * Mirth 3.9+ answers /messagesWithObj with the new message id
   */
  get postMessagePath(): string {
    return supportsMessagesWithObj(this.mirth.version)
      ? `/channels/${this.id}/messagesWithObj`
      : `/channels/${this.id}/messages`;
  }

  async getInfo(): Promise<ChannelModel> {
    const response = await this.mirth.get(`/channels/${this.id}`);
    return ChannelModel.parse(response.text);
  }

  /**
   * Received/sent/error/filtered/queued counters
   */
  async getStatistics(): Promise<ChannelStatistics> {
    const response = await this.mirth.get(`/channels/${this.id}/statistics`);
    return ChannelStatistics.parse(response.text);
  }

  // ===========================================================================
  // Messages
  // ===========================================================================

  async getMessages(query: MessageQuery = {}): Promise<ChannelMessageModel[]> {
    const params: QueryParams = {
      ...query.params,
      limit: query.limit ?? 20,
      offset: query.offset ?? 0,
      includeContent: query.includeContent ?? false,
    };
    if (query.status && query.status.length > 0) {
      params['status'] = query.status.map((s) => s.toUpperCase());
    }

    const response = await this.mirth.get(`/channels/${this.id}/messages`, { params });
    if (isBlank(response.text)) return [];
    return ChannelMessageList.parse(response.text).message;
  }

  /**
   * Minimal representation (no content) of a single message, looked up via
   * the message search endpoint
   */
  async previewMessage(messageId: number | string, params: QueryParams = {}): Promise<ChannelMessageModel | null> {
    const response = await this.mirth.get(`/channels/${this.id}/messages`, {
      params: {
        ...params,
        minMessageId: messageId,
        maxMessageId: messageId,
        includeContent: false,
        offset: 0,
        limit: 1,
      },
    });
    if (isBlank(response.text)) return null;
    return ChannelMessageList.parse(response.text).message[0] ?? null;
  }

  async getMessage(messageId: number | string, includeContent = true): Promise<ChannelMessageModel | null> {
    const response = await this.mirth.get(`/channels/${this.id}/messages/${messageId}`, {
      params: { includeContent },
    });
    if (isBlank(response.text)) return null;
    return ChannelMessageModel.parse(response.text);
  }

  async getMessageCount(status?: string[]): Promise<number> {
    const params: QueryParams = {};
    if (status && status.length > 0) {
      params['status'] = status.map((s) => s.toUpperCase());
    }
    const response = await this.mirth.get(`/channels/${this.id}/messages/count`, { params });
    return LongResponse.parse(response.text);
  }

  /**
   * Send raw data into the channel.
   *
   * Returns the processed message (without content) on servers that report
   * the new message id, or null on older servers that answer with an
   * empty body.
   */
  async postMessage(data?: string, options: PostMessageOptions = {}): Promise<ChannelMessageModel | null> {
    const { raiseErrors = true, binary = false } = options;

    const response = await this.mirth.post(this.postMessagePath, {
      body: buildChannelMessage(data, binary),
      contentType: 'application/xml',
    });
    if (isBlank(response.text)) return null;

    const messageId = ChannelMessageResponse.parse(response.text);
    const received = await this.getMessage(messageId, false);
    if (!received) {
      throw new MirthPostError('Error posting to Mirth: Sent message is missing from Mirth');
    }

    if (raiseErrors) {
      raisePostErrors(received);
    }
    return received;
  }

  // ===========================================================================
  // Control
  // ===========================================================================

  private async command(command: ChannelCommand): Promise<void> {
    // returnErrors=true makes Mirth answer failures with a non-2xx status
    await this.mirth.post(`/channels/${this.id}/_${command}`, { params: { returnErrors: true } });
  }

  async start(): Promise<void> {
    await this.command('start');
  }

  async stop(): Promise<void> {
    await this.command('stop');
  }

  async pause(): Promise<void> {
    await this.command('pause');
  }

  async resume(): Promise<void> {
    await this.command('resume');
  }

  async deploy(): Promise<void> {
    await this.command('deploy');
  }

  async undeploy(): Promise<void> {
    await this.command('undeploy');
  }
}
