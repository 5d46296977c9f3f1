import type { messagingApi } from '@line/bot-sdk';

export type OutgoingMessage = messagingApi.Message;

interface IncomingEventBase {
  userId: string;
  replyToken: string;
  timestamp: Date;
}

export type IncomingEvent =
  | (IncomingEventBase & { type: 'text'; text: string })
  | (IncomingEventBase & { type: 'postback'; data: string })
  | (IncomingEventBase & { type: 'follow' });

export interface MessagePort {
  sendReply(replyToken: string, messages: OutgoingMessage[]): Promise<void>;
  sendPush(userId: string, messages: OutgoingMessage[]): Promise<void>;
  onEvent(handler: (event: IncomingEvent) => Promise<void>): void;
}
