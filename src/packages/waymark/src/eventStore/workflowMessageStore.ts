import type { ExpectedStreamPosition } from './expectedPosition';
import type {
  NewWorkflowMessage,
  WorkflowMessage,
  WorkflowStreamPosition,
} from './workflowMessage';

export type AppendToStreamOptions = {
  /**
   * Fails the append with `ExpectedPositionConflictError` when the stream
   * is not at this position (or existence state) at the time of appending.
   */
  expectedPosition?: ExpectedStreamPosition;
};

export type ReadStreamOptions = {
  /**
   * First position to read. Defaults to `1n`, i.e. the whole stream.
   */
  from?: WorkflowStreamPosition;
};

export type GetPendingCommandsOptions = {
  workflowId?: string;
};

// #region workflow-message-store
export interface WorkflowMessageStore<Payload = unknown> {
  /**
   * Appends the whole batch atomically, assigning positions that follow the
   * last one in the stream. Resolves with the position of the last appended message.
   */
  appendToStream(
    workflowId: string,
    messages: readonly NewWorkflowMessage<Payload>[],
    options?: AppendToStreamOptions,
  ): Promise<WorkflowStreamPosition>;

  /**
   * Messages with position greater or equal to `from`, in ascending order.
   * An unknown workflow has an empty stream.
   */
  readStream(
    workflowId: string,
    options?: ReadStreamOptions,
  ): Promise<WorkflowMessage<Payload>[]>;

  /**
   * Output commands that were not marked as processed yet.
   */
  getPendingCommands(
    options?: GetPendingCommandsOptions,
  ): Promise<WorkflowMessage<Payload>[]>;

  /**
   * Acknowledges the execution of the pending output command at the given position.
   * Fails with `InvalidOperationError` for anything else.
   */
  markCommandProcessed(
    workflowId: string,
    position: WorkflowStreamPosition,
  ): Promise<void>;

  exists(workflowId: string): Promise<boolean>;

  deleteStream(workflowId: string): Promise<void>;
}
// #endregion workflow-message-store
