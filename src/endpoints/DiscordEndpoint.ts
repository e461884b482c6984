/**
 * Discord webhook.
 *
 *   discord://webhook_id/webhook_token
 *   discord://avatar_url@webhook_id/webhook_token?username=Bot
 */

import { Blob } from 'node:buffer';
import { FormData } from 'undici';
import { Notification, NotifyType } from '../database/models';
import { InvalidEndpointURLError } from '../utils/errors';
import { HttpPoolCategory } from './HttpClientPools';
import { HttpEndpoint, parseServiceUrl, pathSegments } from './HttpEndpoint';

const DISCORD_API = 'https://discord.com/api/webhooks';

const COLORS: Record<NotifyType, number> = {
  info: 0x0099ff,
  success: 0x00ff00,
  warning: 0xffff00,
  error: 0xff0000,
};

export interface DiscordEmbed {
  title: string;
  description: string;
  color: number;
  footer: { text: string };
}

export interface DiscordPayload {
  content?: string;
  username?: string;
  avatar_url?: string;
  embeds?: DiscordEmbed[];
}

interface DiscordConfig {
  webhookId: string;
  webhookToken: string;
  username?: string;
  avatarUrl?: string;
}

export class DiscordEndpoint extends HttpEndpoint {
  readonly serviceId = 'discord';
  protected readonly poolCategory: HttpPoolCategory = 'cloud';
  private config: DiscordConfig | null = null;

  parse(serviceUrl: string): void {
    const url = parseServiceUrl(serviceUrl, ['discord']);
    const [webhookToken] = pathSegments(url);
    const webhookId = url.hostname;

    if (!webhookId || !webhookToken) {
      throw new InvalidEndpointURLError(
        'Discord URL needs webhook_id and webhook_token',
        serviceUrl,
      );
    }

    this.config = {
      webhookId,
      webhookToken,
      username: url.searchParams.get('username') ?? undefined,
      avatarUrl:
        url.searchParams.get('avatar') ??
        (url.username ? decodeURIComponent(url.username) : undefined),
    };
  }

  supportsAttachments(): boolean {
    return true;
  }

  maxBodyLength(): number {
    return 2000;
  }

  buildPayload(notification: Notification): DiscordPayload {
    const payload: DiscordPayload = {};
    if (this.config?.username) payload.username = this.config.username;
    if (this.config?.avatarUrl) payload.avatar_url = this.config.avatarUrl;

    const body = this.truncate(notification.body);

    // Titled messages go out as an embed, bare bodies as plain content
    if (notification.title) {
      payload.embeds = [
        {
          title: notification.title,
          description: body,
          color: COLORS[notification.type],
          footer: { text: `Type: ${notification.type}` },
        },
      ];
    } else {
      payload.content = body;
    }
    return payload;
  }

  async send(notification: Notification, signal: AbortSignal): Promise<void> {
    if (!this.config) {
      throw new InvalidEndpointURLError('Discord endpoint is not configured');
    }

    const target = `${DISCORD_API}/${encodeURIComponent(this.config.webhookId)}/${encodeURIComponent(this.config.webhookToken)}`;
    const payload = this.buildPayload(notification);

    if (notification.attachment) {
      const content = await notification.attachment.read();
      const form = new FormData();
      form.append('payload_json', JSON.stringify(payload));
      form.append(
        'files[0]',
        new Blob([content], {
          type: notification.attachment.mimeType ?? 'application/octet-stream',
        }),
        notification.attachment.name,
      );
      await this.sendHttp(target, { body: form, signal });
      return;
    }

    await this.sendHttp(target, {
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(payload),
      signal,
    });
  }
}
