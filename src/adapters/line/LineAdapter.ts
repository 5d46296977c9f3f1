import { messagingApi, type WebhookEvent } from '@line/bot-sdk';
import type { Config } from '../../config/index.js';
import type { IncomingEvent, MessagePort, OutgoingMessage } from '../../ports/MessagePort.js';
import { LineError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';

/** LINE rejects reply/push requests carrying more than five messages. */
const MAX_MESSAGES_PER_REQUEST = 5;

export class LineAdapter implements MessagePort {
  private readonly logger = createLogger({ adapter: 'LineAdapter' });
  private readonly client: messagingApi.MessagingApiClient;
  private eventHandlers: Array<(event: IncomingEvent) => Promise<void>> = [];

  constructor(config: Pick<Config, 'lineChannelAccessToken'>) {
    this.client = new messagingApi.MessagingApiClient({
      channelAccessToken: config.lineChannelAccessToken,
    });
  }

  async sendReply(replyToken: string, messages: OutgoingMessage[]): Promise<void> {
    const logger = this.logger.child({ method: 'sendReply' });
    logger.info({ count: messages.length }, 'Sending reply');

    try {
      await this.client.replyMessage({ replyToken, messages: messages.slice(0, MAX_MESSAGES_PER_REQUEST) });
    } catch (error) {
      logger.error({ error }, 'Failed to send reply');
      throw new LineError('Failed to send reply', { cause: error });
    }
  }

  async sendPush(userId: string, messages: OutgoingMessage[]): Promise<void> {
    const logger = this.logger.child({ method: 'sendPush', userId });
    logger.info({ count: messages.length }, 'Sending push message');

    try {
      await this.client.pushMessage({ to: userId, messages: messages.slice(0, MAX_MESSAGES_PER_REQUEST) });
    } catch (error) {
      logger.error({ error }, 'Failed to send push message');
      throw new LineError('Failed to send push message', { cause: error });
    }
  }

  onEvent(handler: (event: IncomingEvent) => Promise<void>): void {
    this.eventHandlers.push(handler);
  }

  /** Dispatches verified webhook events; one failing event does not stop the others. */
  async handleWebhook(events: readonly WebhookEvent[], correlationId?: string): Promise<void> {
    const logger = this.logger.child({ method: 'handleWebhook', correlationId });

    const incoming = events
      .map((event) => this.toIncomingEvent(event))
      .filter((event): event is IncomingEvent => event !== null);
    logger.debug({ received: events.length, handled: incoming.length }, 'Processing webhook events');

    const results = await Promise.allSettled(
      incoming.flatMap((event) => this.eventHandlers.map((handler) => handler(event)))
    );
    for (const result of results) {
      if (result.status === 'rejected') {
        logger.error({ error: result.reason }, 'Event handler failed');
      }
    }
  }

  toIncomingEvent(event: WebhookEvent): IncomingEvent | null {
    const userId = event.source?.userId;
    if (!userId) {
      return null;
    }
    const timestamp = new Date(event.timestamp);

    switch (event.type) {
      case 'message':
        if (event.message.type !== 'text' || !event.replyToken) return null;
        return { type: 'text', userId, replyToken: event.replyToken, timestamp, text: event.message.text };
      case 'postback':
        if (!event.replyToken) return null;
        return { type: 'postback', userId, replyToken: event.replyToken, timestamp, data: event.postback.data };
      case 'follow':
        if (!event.replyToken) return null;
        return { type: 'follow', userId, replyToken: event.replyToken, timestamp };
      default:
        return null;
    }
  }
}
