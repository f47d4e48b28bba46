import { IllegalStateError } from '../errors';
import type { MessageBus } from '../messageBus';
import type { AnyMessage } from '../typing';
import type { WorkflowStreamPosition } from '../eventStore/workflowMessage';
import type { WorkflowCommand } from '../workflows/workflow';

export type CommandExecutionContext = {
  workflowId: string;
  position: WorkflowStreamPosition;
  messageId: string;
  /**
   * `{workflowId}:{commandKind}:{position}`, stable across redeliveries
   * of the same stored command.
   */
  idempotencyKey: string;
};

export interface CommandExecutor<Output extends AnyMessage = AnyMessage> {
  execute(
    command: WorkflowCommand<Output>,
    context: CommandExecutionContext,
  ): Promise<void>;
}

export type CommandReplyHandler<Output extends AnyMessage = AnyMessage> = (
  message: Output,
  context: CommandExecutionContext,
) => Promise<void> | void;

export type WorkflowCompletionHandler = (
  context: CommandExecutionContext,
) => Promise<void> | void;

export type CompositeCommandExecutorOptions<
  Output extends AnyMessage = AnyMessage,
> = {
  messageBus?: MessageBus;
  onReply?: CommandReplyHandler<Output>;
  onComplete?: WorkflowCompletionHandler;
};

/**
 * Routes `Send`, `Publish` and `Schedule` to the message bus,
 * `Reply` and `Complete` to the registered callbacks.
 * Completion is already recorded in the stream, so without `onComplete`
 * it only gets acknowledged.
 */
export const CompositeCommandExecutor = <
  Output extends AnyMessage = AnyMessage,
>(
  options: CompositeCommandExecutorOptions<Output> = {},
): CommandExecutor<Output> => {
  const { messageBus, onReply, onComplete } = options;

  const requireMessageBus = (kind: string): MessageBus => {
    if (messageBus === undefined)
      throw new IllegalStateError(
        `Message bus is not configured, cannot execute '${kind}' command`,
      );
    return messageBus;
  };

  return {
    execute: async (command, context) => {
      const { kind } = command;

      switch (kind) {
        case 'Send':
          return requireMessageBus(kind).send(command.message);
        case 'Publish':
          return requireMessageBus(kind).publish(command.message);
        case 'Schedule':
          return requireMessageBus(kind).schedule(
            command.message,
            command.when,
          );
        case 'Reply':
          if (onReply === undefined)
            throw new IllegalStateError(
              `Reply handler is not configured, cannot execute '${kind}' command`,
            );
          return onReply(command.message, context);
        case 'Complete':
          return onComplete?.(context);
        default: {
          const _notExistingCommandKind: never = kind;
          throw new IllegalStateError(
            `Unknown command kind: ${String(_notExistingCommandKind)}`,
          );
        }
      }
    },
  };
};
