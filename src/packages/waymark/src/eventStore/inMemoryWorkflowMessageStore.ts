import { v4 as uuid } from 'uuid';
import { InvalidOperationError } from '../errors';
import { InProcessLock, type Lock } from '../utils';
import { assertNotEmptyArray, assertNotEmptyString } from '../validation';
import {
  tryPublishMessagesAfterCommit,
  type WorkflowMessageStoreHooks,
} from './afterCommit';
import {
  assertExpectedPositionMatchesCurrent,
  WorkflowStreamDefaultPosition,
} from './expectedPosition';
import {
  isOutputCommand,
  isPendingCommand,
  type NewWorkflowMessage,
  type WorkflowMessage,
  type WorkflowStreamPosition,
} from './workflowMessage';
import type {
  AppendToStreamOptions,
  GetPendingCommandsOptions,
  ReadStreamOptions,
  WorkflowMessageStore,
} from './workflowMessageStore';

export type InMemoryWorkflowMessageStoreOptions<Payload = unknown> = {
  hooks?: WorkflowMessageStoreHooks<Payload>;
  /**
   * Lock guarding writes to a single workflow stream, one lock id per workflow.
   */
  lock?: Lock;
};

export type InMemoryWorkflowMessageStore<Payload = unknown> =
  WorkflowMessageStore<Payload>;

type WorkflowStream<Payload> = {
  // replaced on each write, never mutated, so readers can keep a reference
  messages: readonly WorkflowMessage<Payload>[];
  // pending output commands by position, in append order
  pending: Map<WorkflowStreamPosition, WorkflowMessage<Payload>>;
};

export const getInMemoryWorkflowMessageStore = <Payload = unknown>(
  options?: InMemoryWorkflowMessageStoreOptions<Payload>,
): InMemoryWorkflowMessageStore<Payload> => {
  const streams = new Map<string, WorkflowStream<Payload>>();
  const lock = options?.lock ?? InProcessLock();

  const toStoredMessage = (
    workflowId: string,
    position: WorkflowStreamPosition,
    message: NewWorkflowMessage<Payload>,
    now: Date,
  ): WorkflowMessage<Payload> =>
    Object.freeze({
      workflowId,
      position,
      messageId: uuid(),
      kind: message.kind,
      direction: message.direction,
      message: message.message,
      timestamp: message.timestamp ?? now,
      processed: isOutputCommand(message) ? false : null,
    });

  return {
    appendToStream: async (
      workflowId: string,
      messages: readonly NewWorkflowMessage<Payload>[],
      appendOptions?: AppendToStreamOptions,
    ): Promise<WorkflowStreamPosition> => {
      assertNotEmptyString(workflowId);
      assertNotEmptyArray(messages);

      const newMessages = await lock.withAcquire(
        () => {
          const stream = streams.get(workflowId);
          const currentPosition = stream
            ? BigInt(stream.messages.length)
            : WorkflowStreamDefaultPosition;

          assertExpectedPositionMatchesCurrent(
            currentPosition,
            appendOptions?.expectedPosition,
          );

          const now = new Date();

          const appended = messages.map((message, index) =>
            toStoredMessage(
              workflowId,
              currentPosition + BigInt(index + 1),
              message,
              now,
            ),
          );

          const pending = new Map(stream?.pending);
          for (const message of appended) {
            if (isPendingCommand(message)) pending.set(message.position, message);
          }

          streams.set(workflowId, {
            messages: [...(stream?.messages ?? []), ...appended],
            pending,
          });

          return Promise.resolve(appended);
        },
        { lockId: workflowId },
      );

      await tryPublishMessagesAfterCommit(newMessages, options?.hooks);

      return newMessages[newMessages.length - 1]?.position ??
        WorkflowStreamDefaultPosition;
    },

    readStream: (
      workflowId: string,
      readOptions?: ReadStreamOptions,
    ): Promise<WorkflowMessage<Payload>[]> => {
      assertNotEmptyString(workflowId);

      const messages = streams.get(workflowId)?.messages ?? [];
      const from = readOptions?.from ?? 1n;

      // positions are gapless, so position N sits at index N - 1
      const startIndex = from > 1n ? Number(from - 1n) : 0;

      return Promise.resolve(messages.slice(startIndex));
    },

    getPendingCommands: (
      pendingOptions?: GetPendingCommandsOptions,
    ): Promise<WorkflowMessage<Payload>[]> => {
      const workflowId = pendingOptions?.workflowId;

      const selected =
        workflowId !== undefined
          ? [streams.get(workflowId)]
          : Array.from(streams.values());

      return Promise.resolve(
        selected.flatMap((stream) =>
          stream ? Array.from(stream.pending.values()) : [],
        ),
      );
    },

    markCommandProcessed: (
      workflowId: string,
      position: WorkflowStreamPosition,
    ): Promise<void> => {
      assertNotEmptyString(workflowId);

      return lock.withAcquire(
        () => {
          const stream = streams.get(workflowId);

          if (stream === undefined)
            throw new InvalidOperationError(
              'WorkflowNotFound',
              `Workflow ${workflowId} not found`,
            );

          const index =
            position >= 1n && position <= BigInt(stream.messages.length)
              ? Number(position - 1n)
              : -1;
          const message = index >= 0 ? stream.messages[index] : undefined;

          if (message === undefined)
            throw new InvalidOperationError(
              'PositionNotFound',
              `Message at position ${position} not found in workflow ${workflowId}`,
            );

          if (!isPendingCommand(message))
            throw new InvalidOperationError(
              'NotAPendingCommand',
              `Message at position ${position} in workflow ${workflowId} is not a pending output command`,
            );

          const pending = new Map(stream.pending);
          pending.delete(position);

          streams.set(workflowId, {
            messages: stream.messages.map((m, i) =>
              i === index ? Object.freeze({ ...m, processed: true }) : m,
            ),
            pending,
          });

          return Promise.resolve();
        },
        { lockId: workflowId },
      );
    },

    exists: (workflowId: string): Promise<boolean> => {
      assertNotEmptyString(workflowId);

      return Promise.resolve(
        (streams.get(workflowId)?.messages.length ?? 0) > 0,
      );
    },

    deleteStream: (workflowId: string): Promise<void> => {
      assertNotEmptyString(workflowId);

      return lock.withAcquire(
        () => {
          streams.delete(workflowId);
          return Promise.resolve();
        },
        { lockId: workflowId },
      );
    },
  };
};
