import { isConcurrencyError } from '../errors';
import {
  STREAM_DOES_NOT_EXIST,
  WorkflowStreamDefaultPosition,
  type ExpectedStreamPosition,
} from '../eventStore/expectedPosition';
import {
  isEventForStateEvolution,
  type WorkflowStreamPosition,
} from '../eventStore/workflowMessage';
import type { WorkflowMessageStore } from '../eventStore/workflowMessageStore';
import type { AnyMessage } from '../typing';
import { asyncRetry, NoRetries, type AsyncRetryOptions } from '../utils';
import type { Workflow, WorkflowCommand, WorkflowEvent } from './workflow';
import { evolveState, runWorkflow } from './workflowOrchestrator';
import {
  isWorkflowEvent,
  toNewWorkflowMessages,
  type WorkflowStreamMessage,
} from './workflowStreamMessage';

export const WorkflowHandlerStreamPositionConflictRetryOptions: AsyncRetryOptions =
  {
    retries: 3,
    minTimeout: 100,
    factor: 1.5,
    shouldRetryError: isConcurrencyError,
  };

export type WorkflowHandlerRetryOptions =
  | AsyncRetryOptions
  | { onPositionConflict: true | number | AsyncRetryOptions };

const fromWorkflowHandlerRetryOptions = (
  retryOptions: WorkflowHandlerRetryOptions | undefined,
): AsyncRetryOptions => {
  if (retryOptions === undefined) return NoRetries;

  if ('onPositionConflict' in retryOptions) {
    if (typeof retryOptions.onPositionConflict === 'boolean')
      return WorkflowHandlerStreamPositionConflictRetryOptions;
    else if (typeof retryOptions.onPositionConflict === 'number')
      return {
        ...WorkflowHandlerStreamPositionConflictRetryOptions,
        retries: retryOptions.onPositionConflict,
      };
    else return retryOptions.onPositionConflict;
  }

  return retryOptions;
};

export type WorkflowHandlerOptions<
  Input extends AnyMessage,
  State,
  Output extends AnyMessage,
> = {
  workflow: Workflow<Input, State, Output>;
  /**
   * Resolves the workflow instance the input belongs to.
   * `null` means the input is not handled by this workflow.
   */
  getWorkflowId: (input: Input) => string | null;
  retry?: WorkflowHandlerRetryOptions;
};

// #region workflow-handler
export type WorkflowHandlerResult<
  Input extends AnyMessage,
  State,
  Output extends AnyMessage,
> = {
  workflowId: string | null;
  state: State;
  commands: WorkflowCommand<Output>[];
  events: WorkflowEvent<Input, Output>[];
  lastPosition: WorkflowStreamPosition;
  createdNewStream: boolean;
};

export type HandleWorkflowOptions = {
  expectedPosition?: ExpectedStreamPosition;
  retry?: WorkflowHandlerRetryOptions;
};

export const WorkflowHandler =
  <Input extends AnyMessage, State, Output extends AnyMessage>(
    options: WorkflowHandlerOptions<Input, State, Output>,
  ) =>
  (
    store: WorkflowMessageStore<WorkflowStreamMessage<Input, Output>>,
    input: Input,
    handleOptions?: HandleWorkflowOptions,
  ): Promise<WorkflowHandlerResult<Input, State, Output>> =>
    asyncRetry(
      async () => {
        const { workflow, getWorkflowId } = options;

        const workflowId = getWorkflowId(input);

        if (workflowId === null) {
          return {
            workflowId,
            state: workflow.initialState(),
            commands: [],
            events: [],
            lastPosition: WorkflowStreamDefaultPosition,
            createdNewStream: false,
          };
        }

        // 1. Rebuild the state from the recorded events
        const stream = await store.readStream(workflowId);

        const eventHistory = stream
          .filter(isEventForStateEvolution)
          .flatMap((stored) => {
            const { message } = stored;
            return isWorkflowEvent(message) ? [message] : [];
          });

        const currentPosition =
          stream[stream.length - 1]?.position ?? WorkflowStreamDefaultPosition;

        // 2. Run business logic
        const { snapshot, commands, events } = runWorkflow(
          workflow,
          {
            state: evolveState(workflow, workflow.initialState(), eventHistory),
            eventHistory,
          },
          input,
          { begins: stream.length === 0 },
        );

        // Either use:
        // - provided expected stream position,
        // - the last read position,
        // - or expect stream not to exist otherwise.
        const expectedPosition: ExpectedStreamPosition =
          handleOptions?.expectedPosition ??
          (stream.length > 0 ? currentPosition : STREAM_DOES_NOT_EXIST);

        // 3. Append events and pending commands
        const lastPosition = await store.appendToStream(
          workflowId,
          toNewWorkflowMessages(events, commands),
          { expectedPosition },
        );

        return {
          workflowId,
          state: snapshot.state,
          commands,
          events,
          lastPosition,
          createdNewStream: stream.length === 0,
        };
      },
      fromWorkflowHandlerRetryOptions(
        handleOptions?.retry ?? options.retry,
      ),
    );
// #endregion workflow-handler
