import type { AnyMessage } from '../typing';
import { translate } from './translate';
import type { Workflow, WorkflowCommand, WorkflowEvent } from './workflow';

export type WorkflowSnapshot<
  Input extends AnyMessage,
  State,
  Output extends AnyMessage,
> = {
  state: State;
  eventHistory: WorkflowEvent<Input, Output>[];
};

export type WorkflowRunResult<
  Input extends AnyMessage,
  State,
  Output extends AnyMessage,
> = {
  snapshot: WorkflowSnapshot<Input, State, Output>;
  commands: WorkflowCommand<Output>[];
  events: WorkflowEvent<Input, Output>[];
};

export type RunWorkflowOptions = {
  /**
   * Whether the input starts the workflow instance.
   * Defaults to `true` when the snapshot has no recorded events yet.
   */
  begins?: boolean;
};

export const initialSnapshot = <
  Input extends AnyMessage,
  State,
  Output extends AnyMessage,
>(
  workflow: Workflow<Input, State, Output>,
): WorkflowSnapshot<Input, State, Output> => ({
  state: workflow.initialState(),
  eventHistory: [],
});

export const evolveState = <
  Input extends AnyMessage,
  State,
  Output extends AnyMessage,
>(
  workflow: Pick<Workflow<Input, State, Output>, 'evolve'>,
  state: State,
  events: readonly WorkflowEvent<Input, Output>[],
): State => events.reduce<State>(workflow.evolve, state);

// #region workflow-orchestrator
export const runWorkflow = <
  Input extends AnyMessage,
  State,
  Output extends AnyMessage,
>(
  workflow: Workflow<Input, State, Output>,
  snapshot: WorkflowSnapshot<Input, State, Output>,
  input: Input,
  options?: RunWorkflowOptions,
): WorkflowRunResult<Input, State, Output> => {
  const begins = options?.begins ?? snapshot.eventHistory.length === 0;

  // 1. Decide which commands to dispatch
  const commands = workflow.decide(input, snapshot.state);

  // 2. Record the input and the commands as events
  const events = translate<Input, Output>(begins, input, commands);

  // 3. Fold the new events into the state
  const state = evolveState(workflow, snapshot.state, events);

  return {
    snapshot: {
      state,
      eventHistory: [...snapshot.eventHistory, ...events],
    },
    commands,
    events,
  };
};
// #endregion workflow-orchestrator
