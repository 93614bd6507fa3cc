import type { Logger } from 'winston';
import { z } from 'zod';
import { DeliveryError } from '../../errors';
import { discordFailure } from '../../infrastructure/http';

export const DISCORD_USERNAME = 'Strava Webhook';
export const DISCORD_AVATAR_URL = 'https://d3nn82uaxijpm6.cloudfront.net/mstile-144x144.png';

export interface DiscordEmbedField {
  name: string;
  value: string;
  inline?: boolean;
}

export interface DiscordEmbed {
  title: string;
  url?: string;
  color?: number;
  timestamp?: string;
  author?: { name: string; url?: string; icon_url?: string };
  footer?: { text: string; icon_url?: string };
  fields?: DiscordEmbedField[];
}

export interface DiscordMessage {
  content: string;
  embeds: DiscordEmbed[];
}

// With ?wait=true Discord answers with the created message instead of 204
const createdMessageSchema = z.object({ id: z.string() });

/**
 * Posts messages to a single Discord channel webhook.
 */
export class DiscordWebhookClient {
  constructor(private webhookUrl: string, private logger?: Logger) {}

  /**
   * @returns The id of the created Discord message
   * @throws DeliveryError if Discord refuses the message or cannot be reached
   */
  async send(message: DiscordMessage): Promise<string> {
    const url = new URL(this.webhookUrl);
    url.searchParams.set('wait', 'true');

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          content: message.content,
          username: DISCORD_USERNAME,
          avatar_url: DISCORD_AVATAR_URL,
          embeds: message.embeds,
        }),
      });
    } catch (error) {
      throw new DeliveryError('Discord webhook unreachable', 0, { cause: error });
    }

    const failure = await discordFailure(response);
    if (failure) {
      this.logger?.error('Discord rejected message', { status: failure.status, error: failure.message });
      throw failure;
    }

    const parsed = createdMessageSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new DeliveryError('Discord webhook returned no message id', response.status, { cause: parsed.error });
    }
    return parsed.data.id;
  }
}
