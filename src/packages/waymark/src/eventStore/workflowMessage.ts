/**
 * `Command` messages are instructions the output processor executes,
 * `Event` messages are facts used to rebuild the workflow state.
 */
export type WorkflowMessageKind = 'Event' | 'Command';

/**
 * `Input` messages were received by the workflow, `Output` ones produced by it.
 */
export type WorkflowMessageDirection = 'Input' | 'Output';

export type WorkflowStreamPosition = bigint;

/**
 * Entry of a workflow stream. The stream is both the inbox and the outbox
 * of a single workflow instance.
 */
export type WorkflowMessage<Payload = unknown> = Readonly<{
  workflowId: string;
  /**
   * 1-based, gapless within the stream, assigned on append.
   */
  position: WorkflowStreamPosition;
  messageId: string;
  kind: WorkflowMessageKind;
  direction: WorkflowMessageDirection;
  message: Payload;
  timestamp: Date;
  /**
   * `false` until the output command was executed, `null` for anything
   * that is not an output command.
   */
  processed: boolean | null;
}>;

export type NewWorkflowMessage<Payload = unknown> = Readonly<{
  kind: WorkflowMessageKind;
  direction: WorkflowMessageDirection;
  message: Payload;
  timestamp?: Date;
}>;

export const isOutputCommand = (
  message: Pick<WorkflowMessage, 'kind' | 'direction'>,
): boolean => message.kind === 'Command' && message.direction === 'Output';

export const isPendingCommand = (
  message: Pick<WorkflowMessage, 'kind' | 'direction' | 'processed'>,
): boolean => isOutputCommand(message) && message.processed === false;

export const isEventForStateEvolution = (
  message: Pick<WorkflowMessage, 'kind'>,
): boolean => message.kind === 'Event';

export const inputEvent = <Payload>(
  message: Payload,
): NewWorkflowMessage<Payload> => ({
  kind: 'Event',
  direction: 'Input',
  message,
});

export const outputEvent = <Payload>(
  message: Payload,
): NewWorkflowMessage<Payload> => ({
  kind: 'Event',
  direction: 'Output',
  message,
});

export const inputCommand = <Payload>(
  message: Payload,
): NewWorkflowMessage<Payload> => ({
  kind: 'Command',
  direction: 'Input',
  message,
});

export const outputCommand = <Payload>(
  message: Payload,
): NewWorkflowMessage<Payload> => ({
  kind: 'Command',
  direction: 'Output',
  message,
});
