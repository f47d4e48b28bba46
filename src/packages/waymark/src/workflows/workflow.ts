import type { ScheduleOptions } from '../messageBus';
import type { AnyMessage, Event } from '../typing';

/// Inspired by https://blog.bittacklr.be/the-workflow-pattern.html

////////////////////////////////////////////
////////// Commands
///////////////////////////////////////////

export type WorkflowCommand<Output extends AnyMessage> =
  | { kind: 'Reply'; message: Output }
  | { kind: 'Send'; message: Output }
  | { kind: 'Publish'; message: Output }
  | { kind: 'Schedule'; message: Output; when: ScheduleOptions }
  | { kind: 'Complete' };

export type WorkflowCommandKind = WorkflowCommand<AnyMessage>['kind'];

export const reply = <Output extends AnyMessage>(
  message: Output,
): WorkflowCommand<Output> => {
  return {
    kind: 'Reply',
    message,
  };
};

export const send = <Output extends AnyMessage>(
  message: Output,
): WorkflowCommand<Output> => {
  return {
    kind: 'Send',
    message,
  };
};

export const publish = <Output extends AnyMessage>(
  message: Output,
): WorkflowCommand<Output> => {
  return {
    kind: 'Publish',
    message,
  };
};

export const schedule = <Output extends AnyMessage>(
  message: Output,
  when: ScheduleOptions,
): WorkflowCommand<Output> => {
  return {
    kind: 'Schedule',
    message,
    when,
  };
};

export const complete = <
  Output extends AnyMessage,
>(): WorkflowCommand<Output> => {
  return {
    kind: 'Complete',
  };
};

////////////////////////////////////////////
////////// Events
///////////////////////////////////////////

export type Began = Event<'Began', Record<string, never>>;
export type InitiatedBy<Input extends AnyMessage> = Event<
  'InitiatedBy',
  { message: Input }
>;
export type Received<Input extends AnyMessage> = Event<
  'Received',
  { message: Input }
>;
export type Replied<Output extends AnyMessage> = Event<
  'Replied',
  { message: Output }
>;
export type Sent<Output extends AnyMessage> = Event<
  'Sent',
  { message: Output }
>;
export type Published<Output extends AnyMessage> = Event<
  'Published',
  { message: Output }
>;
export type Scheduled<Output extends AnyMessage> = Event<
  'Scheduled',
  { message: Output; when: ScheduleOptions }
>;
export type Completed = Event<'Completed', Record<string, never>>;

/**
 * Lifecycle and dispatch events recorded for every workflow.
 * They leave the state untouched unless a workflow chooses to react to them.
 */
export type GenericWorkflowEvent<Output extends AnyMessage> =
  | Began
  | Replied<Output>
  | Sent<Output>
  | Published<Output>
  | Scheduled<Output>
  | Completed;

export type WorkflowEvent<
  Input extends AnyMessage,
  Output extends AnyMessage,
> = InitiatedBy<Input> | Received<Input> | GenericWorkflowEvent<Output>;

export type WorkflowEventType = WorkflowEvent<AnyMessage, AnyMessage>['type'];

const genericWorkflowEventTypes: ReadonlySet<WorkflowEventType> =
  new Set<WorkflowEventType>([
    'Began',
    'Replied',
    'Sent',
    'Published',
    'Scheduled',
    'Completed',
  ]);

export const isGenericWorkflowEvent = <
  Input extends AnyMessage,
  Output extends AnyMessage,
>(
  event: WorkflowEvent<Input, Output>,
): event is GenericWorkflowEvent<Output> =>
  genericWorkflowEventTypes.has(event.type);

export const began = (): Began => ({ type: 'Began', data: {} });

export const initiatedBy = <Input extends AnyMessage>(
  message: Input,
): InitiatedBy<Input> => ({ type: 'InitiatedBy', data: { message } });

export const received = <Input extends AnyMessage>(
  message: Input,
): Received<Input> => ({ type: 'Received', data: { message } });

export const replied = <Output extends AnyMessage>(
  message: Output,
): Replied<Output> => ({ type: 'Replied', data: { message } });

export const sent = <Output extends AnyMessage>(
  message: Output,
): Sent<Output> => ({ type: 'Sent', data: { message } });

export const published = <Output extends AnyMessage>(
  message: Output,
): Published<Output> => ({ type: 'Published', data: { message } });

export const scheduled = <Output extends AnyMessage>(
  message: Output,
  when: ScheduleOptions,
): Scheduled<Output> => ({ type: 'Scheduled', data: { message, when } });

export const completed = (): Completed => ({ type: 'Completed', data: {} });

////////////////////////////////////////////
////////// Workflow
///////////////////////////////////////////

/**
 * Pure definition of a workflow.
 *
 * `decide` turns an input into the commands to dispatch, `evolve` folds the
 * recorded events into the next state. Every event `translate` can produce
 * for this workflow has to be accepted by `evolve`.
 */
export type Workflow<
  Input extends AnyMessage,
  State,
  Output extends AnyMessage,
> = {
  name?: string;
  decide: (input: Input, state: State) => WorkflowCommand<Output>[];
  evolve: (currentState: State, event: WorkflowEvent<Input, Output>) => State;
  initialState: () => State;
};

export const Workflow = <
  Input extends AnyMessage,
  State,
  Output extends AnyMessage,
>(
  workflow: Workflow<Input, State, Output>,
): Workflow<Input, State, Output> => {
  return workflow;
};
