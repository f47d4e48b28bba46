import {
  inputEvent,
  outputCommand,
  outputEvent,
  type NewWorkflowMessage,
} from '../eventStore/workflowMessage';
import type { AnyMessage } from '../typing';
import type { WorkflowCommand, WorkflowEvent } from './workflow';

/**
 * Payload stored in a workflow stream: recorded workflow events
 * and the commands waiting for the output processor.
 */
export type WorkflowStreamMessage<
  Input extends AnyMessage = AnyMessage,
  Output extends AnyMessage = AnyMessage,
> = WorkflowEvent<Input, Output> | WorkflowCommand<Output>;

export const isWorkflowEvent = <
  Input extends AnyMessage,
  Output extends AnyMessage,
>(
  message: WorkflowStreamMessage<Input, Output>,
): message is WorkflowEvent<Input, Output> => 'type' in message;

export const isWorkflowCommand = <
  Input extends AnyMessage,
  Output extends AnyMessage,
>(
  message: WorkflowStreamMessage<Input, Output>,
): message is WorkflowCommand<Output> => !('type' in message);

const isInputEvent = (event: WorkflowEvent<AnyMessage, AnyMessage>) =>
  event.type === 'Began' ||
  event.type === 'InitiatedBy' ||
  event.type === 'Received';

/**
 * Events first, in translation order, then the commands to dispatch.
 */
export const toNewWorkflowMessages = <
  Input extends AnyMessage,
  Output extends AnyMessage,
>(
  events: readonly WorkflowEvent<Input, Output>[],
  commands: readonly WorkflowCommand<Output>[],
): NewWorkflowMessage<WorkflowStreamMessage<Input, Output>>[] => [
  ...events.map((event) =>
    isInputEvent(event)
      ? inputEvent<WorkflowStreamMessage<Input, Output>>(event)
      : outputEvent<WorkflowStreamMessage<Input, Output>>(event),
  ),
  ...commands.map((command) =>
    outputCommand<WorkflowStreamMessage<Input, Output>>(command),
  ),
];
