import { PubSub, Topic } from '@google-cloud/pubsub';
import { Logger } from 'winston';
import { CloudEvent } from 'cloudevents';

export class CloudEventPublisher<T> {
  private topic: Topic;

  constructor(
    private pubsub: PubSub,
    private topicName: string,
    private source: string, // CloudEvent 'source' (URI-reference)
    private type: string,   // CloudEvent 'type'
    private logger?: Logger
  ) {
    this.topic = this.pubsub.topic(this.topicName);
  }

  /**
   * Publishes a message wrapped in a CloudEvent envelope.
   * @param subject Optional subject (e.g. resource ID)
   * @returns The Pub/Sub message ID
   */
  async publish(data: T, subject?: string): Promise<string> {
    const ce = new CloudEvent({
      type: this.type,
      source: this.source,
      subject,
      data,
      datacontenttype: 'application/json',
    });

    try {
      // The whole envelope travels as the Pub/Sub message data
      const messageBuffer = Buffer.from(JSON.stringify(ce));
      const messageId = await this.topic.publishMessage({ data: messageBuffer });

      this.logger?.debug(`Published CloudEvent to ${this.topicName}`, {
        messageId,
        ceType: this.type,
        ceSource: this.source,
        ceId: ce.id,
      });

      return messageId;
    } catch (error) {
      this.logger?.error(`Failed to publish CloudEvent to ${this.topicName}`, { error });
      throw error;
    }
  }

  /**
   * Unwrap the `data` of a CloudEvent envelope from a raw payload.
   *
   * Accepts the parsed envelope, its JSON text, or the base64 text Pub/Sub push
   * delivers. Returns undefined when the payload is not an envelope; callers validate
   * the returned value themselves.
   */
  static unwrap(raw: unknown): unknown {
    if (raw === undefined || raw === null) return undefined;

    if (Buffer.isBuffer(raw)) {
      return CloudEventPublisher.unwrap(raw.toString('utf-8'));
    }

    if (typeof raw === 'string') {
      let text = raw.trim();
      if (!text.startsWith('{')) {
        text = Buffer.from(text, 'base64').toString('utf-8');
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch {
        return undefined;
      }
      return CloudEventPublisher.unwrap(parsed);
    }

    if (typeof raw === 'object' && raw !== null && 'specversion' in raw && 'data' in raw) {
      return raw.data;
    }

    // Pub/Sub push body: { message: { data: <base64> } }
    if (typeof raw === 'object' && raw !== null && 'message' in raw) {
      const message = raw.message;
      if (typeof message === 'object' && message !== null && 'data' in message) {
        return CloudEventPublisher.unwrap(message.data);
      }
    }

    return undefined;
  }
}
