import { getWorkflowOutputProcessorConfig } from '../config';
import { IllegalStateError } from '../errors';
import type { WorkflowMessage } from '../eventStore/workflowMessage';
import type {
  GetPendingCommandsOptions,
  WorkflowMessageStore,
} from '../eventStore/workflowMessageStore';
import type { AnyMessage } from '../typing';
import {
  asyncRetry,
  InProcessLock,
  type AsyncRetryOptions,
  type Closeable,
} from '../utils';
import {
  isWorkflowCommand,
  type WorkflowStreamMessage,
} from '../workflows/workflowStreamMessage';
import type {
  CommandExecutionContext,
  CommandExecutor,
} from './commandExecutor';

export type WorkflowOutputProcessorOptions<
  Input extends AnyMessage = AnyMessage,
  Output extends AnyMessage = AnyMessage,
> = {
  store: Pick<
    WorkflowMessageStore<WorkflowStreamMessage<Input, Output>>,
    'getPendingCommands' | 'markCommandProcessed'
  >;
  executor: CommandExecutor<Output>;
  /**
   * Falls back to `WAYMARK_POLLING_INTERVAL_MS`, then to the default.
   */
  pollingIntervalInMs?: number;
  /**
   * Retries of a single command execution before it's left pending
   * for the next polling pass.
   * Falls back to `WAYMARK_COMMAND_RETRIES`, then to no retries.
   */
  retry?: AsyncRetryOptions;
};

export type ProcessBatchResult = {
  processed: number;
  failed: number;
};

export type WorkflowOutputProcessor = Closeable & {
  readonly isActive: boolean;
  processBatch(options?: GetPendingCommandsOptions): Promise<ProcessBatchResult>;
  start(): void;
};

export const idempotencyKeyFor = (
  message: Pick<WorkflowMessage, 'workflowId' | 'position'>,
  commandKind: string,
): string => `${message.workflowId}:${commandKind}:${message.position}`;

export const WorkflowOutputProcessor = <
  Input extends AnyMessage = AnyMessage,
  Output extends AnyMessage = AnyMessage,
>(
  options: WorkflowOutputProcessorOptions<Input, Output>,
): WorkflowOutputProcessor => {
  const { store, executor } = options;
  const { pollingIntervalInMs, retry } = getWorkflowOutputProcessorConfig({
    pollingIntervalInMs: options.pollingIntervalInMs,
    retry: options.retry,
  });

  // one pass at a time, whether started by polling or called directly
  const passLock = InProcessLock();
  const passLockId = 'workflow-output-processor-pass';

  let isActive = false;
  // bumped on every start and close, so a loop left from before stops itself
  let generation = 0;
  let polling: Promise<void> | undefined;
  let wakeUp: (() => void) | undefined;

  const execute = async (
    stored: WorkflowMessage<WorkflowStreamMessage<Input, Output>>,
  ): Promise<void> => {
    const command = stored.message;

    if (!isWorkflowCommand(command))
      throw new IllegalStateError(
        `Message at position ${stored.position} in workflow ${stored.workflowId} is not a workflow command`,
      );

    const context: CommandExecutionContext = {
      workflowId: stored.workflowId,
      position: stored.position,
      messageId: stored.messageId,
      idempotencyKey: idempotencyKeyFor(stored, command.kind),
    };

    await asyncRetry(() => executor.execute(command, context), retry);

    await store.markCommandProcessed(stored.workflowId, stored.position);
  };

  const processPendingCommands = async (
    batchOptions?: GetPendingCommandsOptions,
  ): Promise<ProcessBatchResult> => {
    const pendingCommands = await store.getPendingCommands(batchOptions);

    const result: ProcessBatchResult = { processed: 0, failed: 0 };

    for (const stored of pendingCommands) {
      try {
        await execute(stored);
        result.processed++;
      } catch (error) {
        // left pending, so it's picked again by the next pass
        console.error(
          `Error executing command at position ${stored.position} for workflow ${stored.workflowId}`,
          error,
        );
        result.failed++;
      }
    }

    return result;
  };

  const processBatch = (
    batchOptions?: GetPendingCommandsOptions,
  ): Promise<ProcessBatchResult> =>
    passLock.withAcquire(() => processPendingCommands(batchOptions), {
      lockId: passLockId,
    });

  const waitForNextPass = () =>
    new Promise<void>((resolve) => {
      const timeout = setTimeout(resolve, pollingIntervalInMs);
      wakeUp = () => {
        clearTimeout(timeout);
        resolve();
      };
    });

  const poll = async (loopGeneration: number): Promise<void> => {
    while (generation === loopGeneration) {
      try {
        await processBatch();
      } catch (error) {
        console.warn(`Error processing pending commands`, error);
      }

      if (generation !== loopGeneration) break;

      await waitForNextPass();
    }
  };

  return {
    get isActive() {
      return isActive;
    },
    processBatch,
    start: () => {
      if (isActive) return;

      isActive = true;
      polling = poll(++generation);
    },
    close: async () => {
      if (!isActive) return;

      isActive = false;
      generation++;
      wakeUp?.();
      wakeUp = undefined;

      const stopped = polling;
      await stopped;
      if (polling === stopped) polling = undefined;
    },
  };
};
