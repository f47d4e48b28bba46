import { WaymarkError } from '../errors';
import type { AnyMessage } from '../typing';

export type ScheduleOptions = { afterInMs: number } | { at: Date };

export interface CommandSender {
  send<MessageType extends AnyMessage = AnyMessage>(
    message: MessageType,
  ): Promise<void>;
}

export interface EventsPublisher {
  publish<MessageType extends AnyMessage = AnyMessage>(
    message: MessageType,
  ): Promise<void>;
}

export interface MessageScheduler {
  schedule<MessageType extends AnyMessage = AnyMessage>(
    message: MessageType,
    when?: ScheduleOptions,
  ): Promise<void>;
}

export interface MessageBus
  extends CommandSender,
    EventsPublisher,
    MessageScheduler {}

export type MessageBusHandler = (message: AnyMessage) => Promise<void> | void;

export interface MessageSubscription {
  subscribe(
    handler: MessageBusHandler,
    ...messageTypes: string[]
  ): void;
}

export type ScheduledMessage = {
  message: AnyMessage;
  options?: ScheduleOptions;
};

export interface ScheduledMessageProcessor {
  dequeue(): ScheduledMessage[];
}

export type InMemoryMessageBus = MessageBus &
  MessageSubscription &
  ScheduledMessageProcessor & {
    sent(): AnyMessage[];
    published(): AnyMessage[];
  };

/**
 * In-process bus used to wire the output processor in tests and samples.
 * Sent messages go to the first handler registered for their type,
 * published ones to all of them; scheduled messages wait until dequeued.
 */
export const getInMemoryMessageBus = (): InMemoryMessageBus => {
  const allHandlers = new Map<string, MessageBusHandler[]>();
  let sentMessages: AnyMessage[] = [];
  let publishedMessages: AnyMessage[] = [];
  let pendingMessages: ScheduledMessage[] = [];

  return {
    send: async <MessageType extends AnyMessage = AnyMessage>(
      message: MessageType,
    ): Promise<void> => {
      const handlers = allHandlers.get(message.type) ?? [];

      const [handler] = handlers;

      if (handler === undefined)
        throw new WaymarkError(
          `No handler registered for message ${message.type}!`,
        );

      await handler(message);
      sentMessages = [...sentMessages, message];
    },

    publish: async <MessageType extends AnyMessage = AnyMessage>(
      message: MessageType,
    ): Promise<void> => {
      const handlers = allHandlers.get(message.type) ?? [];

      for (const handler of handlers) {
        await handler(message);
      }
      publishedMessages = [...publishedMessages, message];
    },

    schedule: <MessageType extends AnyMessage = AnyMessage>(
      message: MessageType,
      when?: ScheduleOptions,
    ): Promise<void> => {
      pendingMessages = [...pendingMessages, { message, options: when }];
      return Promise.resolve();
    },

    subscribe(
      handler: MessageBusHandler,
      ...messageTypes: string[]
    ): void {
      for (const messageType of messageTypes) {
        allHandlers.set(messageType, [
          ...(allHandlers.get(messageType) ?? []),
          handler,
        ]);
      }
    },

    dequeue: (): ScheduledMessage[] => {
      const pending = pendingMessages;
      pendingMessages = [];
      return pending;
    },

    sent: () => [...sentMessages],
    published: () => [...publishedMessages],
  };
};
