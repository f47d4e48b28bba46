import type { AnyMessage } from '../typing';
import {
  began,
  completed,
  initiatedBy,
  published,
  received,
  replied,
  scheduled,
  sent,
  type WorkflowCommand,
  type WorkflowEvent,
} from './workflow';

export const toWorkflowEvent = <
  Input extends AnyMessage,
  Output extends AnyMessage,
>(
  command: WorkflowCommand<Output>,
): WorkflowEvent<Input, Output> => {
  const { kind } = command;

  switch (kind) {
    case 'Reply':
      return replied(command.message);
    case 'Send':
      return sent(command.message);
    case 'Publish':
      return published(command.message);
    case 'Schedule':
      return scheduled(command.message, command.when);
    case 'Complete':
      return completed();
    default: {
      const _notExistingCommandKind: never = kind;
      return _notExistingCommandKind;
    }
  }
};

/**
 * Maps the decided commands into the events recorded for them.
 *
 * The input is recorded first, as `Began` + `InitiatedBy` when it started
 * the workflow instance, or as `Received` otherwise. One event per command
 * follows, in the order of commands.
 */
export const translate = <Input extends AnyMessage, Output extends AnyMessage>(
  begins: boolean,
  input: Input,
  commands: readonly WorkflowCommand<Output>[],
): WorkflowEvent<Input, Output>[] => {
  const inputEvents: WorkflowEvent<Input, Output>[] = begins
    ? [began(), initiatedBy(input)]
    : [received(input)];

  return [
    ...inputEvents,
    ...commands.map((command) => toWorkflowEvent<Input, Output>(command)),
  ];
};
