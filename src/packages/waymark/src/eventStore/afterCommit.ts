import type { WorkflowMessage } from './workflowMessage';

export type AfterWorkflowStoreCommitHandler<Payload = unknown> = (
  messages: WorkflowMessage<Payload>[],
) => Promise<void> | void;

export type WorkflowMessageStoreHooks<Payload = unknown> = {
  /**
   * Called once the appended messages are visible to readers.
   * A failing hook doesn't fail the append.
   */
  onAfterCommit?: AfterWorkflowStoreCommitHandler<Payload>;
};

export const tryPublishMessagesAfterCommit = async <Payload>(
  messages: WorkflowMessage<Payload>[],
  hooks: WorkflowMessageStoreHooks<Payload> | undefined,
): Promise<boolean> => {
  if (hooks?.onAfterCommit === undefined) return false;

  try {
    await hooks.onAfterCommit(messages);
    return true;
  } catch (error) {
    console.error(`Error in on after commit hook`, error);
    return false;
  }
};
