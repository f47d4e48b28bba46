import { beforeEach, describe, it } from 'node:test';
import {
  InvalidOperationError,
  ValidationError,
  type InvalidOperationReason,
} from '../errors';
import {
  assertDeepEqual,
  assertEqual,
  assertFalse,
  assertOk,
  assertThatArray,
  assertThrowsAsync,
  assertTrue,
} from '../testing';
import {
  ExpectedPositionConflictError,
  STREAM_DOES_NOT_EXIST,
} from './expectedPosition';
import {
  getInMemoryWorkflowMessageStore,
  type InMemoryWorkflowMessageStore,
} from './inMemoryWorkflowMessageStore';
import {
  inputCommand,
  inputEvent,
  outputCommand,
  outputEvent,
  type WorkflowMessage,
} from './workflowMessage';

const positionsOf = (messages: WorkflowMessage[]) =>
  messages.map((m) => m.position);

const payloadsOf = (messages: WorkflowMessage<string>[]) =>
  messages.map((m) => m.message);

const isInvalidOperation =
  (reason: InvalidOperationReason) =>
  (error: Error): boolean =>
    error instanceof InvalidOperationError && error.reason === reason;

void describe('InMemoryWorkflowMessageStore', () => {
  let store: InMemoryWorkflowMessageStore<string>;

  beforeEach(() => {
    store = getInMemoryWorkflowMessageStore<string>();
  });

  void describe('appendToStream', () => {
    void it('assigns sequential positions starting from 1', async () => {
      const lastPosition = await store.appendToStream('workflow-1', [
        inputEvent('Input1'),
        outputEvent('Output1'),
      ]);

      assertEqual(2n, lastPosition);

      const stored = await store.readStream('workflow-1');
      assertDeepEqual(positionsOf(stored), [1n, 2n]);
      assertDeepEqual(payloadsOf(stored), ['Input1', 'Output1']);
    });

    void it('continues positions across appends regardless of batch size', async () => {
      assertEqual(1n, await store.appendToStream('workflow-1', [inputEvent('1')]));
      assertEqual(
        4n,
        await store.appendToStream('workflow-1', [
          inputEvent('2'),
          outputEvent('3'),
          outputCommand('4'),
        ]),
      );
      assertEqual(5n, await store.appendToStream('workflow-1', [inputEvent('5')]));

      const stored = await store.readStream('workflow-1');
      assertDeepEqual(positionsOf(stored), [1n, 2n, 3n, 4n, 5n]);
      assertDeepEqual(payloadsOf(stored), ['1', '2', '3', '4', '5']);
    });

    void it('keeps position counters of different workflows independent', async () => {
      await store.appendToStream('workflow-1', [inputEvent('a'), inputEvent('b')]);
      const lastPosition = await store.appendToStream('workflow-2', [
        inputEvent('c'),
      ]);

      assertEqual(1n, lastPosition);
    });

    void it('assigns unique positions to concurrent single-message appends', async () => {
      const appendsCount = 50;

      const lastPositions = await Promise.all(
        Array.from({ length: appendsCount }, (_, index) =>
          store.appendToStream('workflow-concurrent', [
            inputEvent(`Message-${index}`),
          ]),
        ),
      );

      const stored = await store.readStream('workflow-concurrent');

      const expectedPositions = Array.from(
        { length: appendsCount },
        (_, index) => BigInt(index + 1),
      );

      assertDeepEqual(positionsOf(stored), expectedPositions);
      assertThatArray(lastPositions).containsExactlyInAnyOrder(
        expectedPositions,
      );
      assertEqual(appendsCount, new Set(payloadsOf(stored)).size);
    });

    void it('keeps batches contiguous under concurrent appends', async () => {
      await Promise.all(
        ['a', 'b', 'c'].map((batch) =>
          store.appendToStream('workflow-batches', [
            inputEvent(`${batch}1`),
            inputEvent(`${batch}2`),
            inputEvent(`${batch}3`),
          ]),
        ),
      );

      const stored = await store.readStream('workflow-batches');

      assertDeepEqual(payloadsOf(stored), [
        'a1',
        'a2',
        'a3',
        'b1',
        'b2',
        'b3',
        'c1',
        'c2',
        'c3',
      ]);
    });

    void it('marks only output commands as not processed', async () => {
      await store.appendToStream('workflow-1', [
        inputEvent('event-in'),
        outputEvent('event-out'),
        inputCommand('command-in'),
        outputCommand('command-out'),
      ]);

      const stored = await store.readStream('workflow-1');

      assertDeepEqual(
        stored.map((m) => m.processed),
        [null, null, null, false],
      );
    });

    void it('stores output commands as not processed whatever the caller passes', async () => {
      const alreadyProcessed = {
        ...outputCommand('command-out'),
        processed: true,
      };

      await store.appendToStream('workflow-1', [alreadyProcessed]);

      const [stored] = await store.readStream('workflow-1');
      assertEqual(false, stored?.processed);
      assertDeepEqual(payloadsOf(await store.getPendingCommands()), [
        'command-out',
      ]);
    });

    void it('stores workflow id, a message id and a timestamp for each message', async () => {
      const timestamp = new Date('2025-03-01T10:00:00Z');

      await store.appendToStream('workflow-1', [
        { ...inputEvent('with-timestamp'), timestamp },
        inputEvent('without-timestamp'),
      ]);

      const [first, second] = await store.readStream('workflow-1');

      assertEqual('workflow-1', first?.workflowId);
      assertEqual(timestamp.getTime(), first?.timestamp.getTime());
      assertTrue(second?.timestamp instanceof Date);
      assertTrue(
        first !== undefined &&
          second !== undefined &&
          first.messageId !== second.messageId,
      );
    });

    void it('fails for an empty batch', async () => {
      await assertThrowsAsync(
        () => store.appendToStream('workflow-1', []),
        (error) => error instanceof ValidationError,
      );

      assertFalse(await store.exists('workflow-1'));
    });

    void it('fails for an empty workflow id', async () => {
      await assertThrowsAsync(
        () => store.appendToStream('', [inputEvent('message')]),
        (error) => error instanceof ValidationError,
      );
    });

    void it('appends nothing when the expected position does not match', async () => {
      await store.appendToStream('workflow-1', [inputEvent('first')]);

      await assertThrowsAsync(
        () =>
          store.appendToStream('workflow-1', [inputEvent('second')], {
            expectedPosition: STREAM_DOES_NOT_EXIST,
          }),
        (error) => error instanceof ExpectedPositionConflictError,
      );
      await assertThrowsAsync(
        () =>
          store.appendToStream('workflow-1', [inputEvent('second')], {
            expectedPosition: 2n,
          }),
        (error) => error instanceof ExpectedPositionConflictError,
      );

      const stored = await store.readStream('workflow-1');
      assertDeepEqual(payloadsOf(stored), ['first']);
    });

    void it('appends when the expected position matches', async () => {
      await store.appendToStream('workflow-1', [inputEvent('first')], {
        expectedPosition: STREAM_DOES_NOT_EXIST,
      });
      const lastPosition = await store.appendToStream(
        'workflow-1',
        [inputEvent('second')],
        { expectedPosition: 1n },
      );

      assertEqual(2n, lastPosition);
    });

    void it('calls the after commit hook with the appended messages', async () => {
      const committed: WorkflowMessage<string>[][] = [];

      const storeWithHooks = getInMemoryWorkflowMessageStore<string>({
        hooks: {
          onAfterCommit: (messages) => {
            committed.push(messages);
          },
        },
      });

      await storeWithHooks.appendToStream('workflow-1', [inputEvent('a')]);
      await storeWithHooks.appendToStream('workflow-1', [
        outputEvent('b'),
        outputCommand('c'),
      ]);

      assertDeepEqual(
        committed.map((messages) => positionsOf(messages)),
        [[1n], [2n, 3n]],
      );
    });

    void it('does not fail the append when the after commit hook throws', async () => {
      const storeWithFailingHook = getInMemoryWorkflowMessageStore<string>({
        hooks: {
          onAfterCommit: () => {
            throw new Error('hook failed');
          },
        },
      });

      const lastPosition = await storeWithFailingHook.appendToStream(
        'workflow-1',
        [inputEvent('a')],
      );

      assertEqual(1n, lastPosition);
    });
  });

  void describe('readStream', () => {
    void it('returns messages from the given position in ascending order', async () => {
      await store.appendToStream('workflow-2', [
        inputEvent('Message1'),
        inputEvent('Message2'),
        inputEvent('Message3'),
      ]);

      const result = await store.readStream('workflow-2', { from: 2n });

      assertDeepEqual(positionsOf(result), [2n, 3n]);
      assertDeepEqual(payloadsOf(result), ['Message2', 'Message3']);
    });

    void it('returns the whole stream for positions below 1', async () => {
      await store.appendToStream('workflow-2', [
        inputEvent('Message1'),
        inputEvent('Message2'),
      ]);

      const result = await store.readStream('workflow-2', { from: 0n });

      assertDeepEqual(positionsOf(result), [1n, 2n]);
    });

    void it('returns nothing for a position after the end of the stream', async () => {
      await store.appendToStream('workflow-2', [inputEvent('Message1')]);

      assertThatArray(
        await store.readStream('workflow-2', { from: 5n }),
      ).isEmpty();
    });

    void it('returns an empty stream for an unknown workflow', async () => {
      assertThatArray(await store.readStream('unknown-workflow')).isEmpty();
    });

    void it('returns messages that cannot be modified by the caller', async () => {
      await store.appendToStream('workflow-2', [outputCommand('command')]);

      const [message] = await store.readStream('workflow-2');

      assertTrue(message !== undefined && Object.isFrozen(message));
    });
  });

  void describe('getPendingCommands', () => {
    void it('returns only output commands that were not processed', async () => {
      await store.appendToStream('workflow-3', [
        inputEvent('Input'),
        outputEvent('Event'),
        outputCommand('Command1'),
        inputCommand('InputCommand'),
        outputCommand('Command2'),
        outputCommand('AlreadyProcessed'),
      ]);
      await store.markCommandProcessed('workflow-3', 6n);

      const pending = await store.getPendingCommands();

      assertDeepEqual(payloadsOf(pending), ['Command1', 'Command2']);
      assertDeepEqual(positionsOf(pending), [3n, 5n]);
      assertTrue(
        pending.every(
          (m) =>
            m.kind === 'Command' &&
            m.direction === 'Output' &&
            m.processed === false,
        ),
      );
    });

    void it('filters by workflow id', async () => {
      await store.appendToStream('workflow-4', [outputCommand('Command-4')]);
      await store.appendToStream('workflow-5', [outputCommand('Command-5')]);

      const pending = await store.getPendingCommands({
        workflowId: 'workflow-4',
      });

      assertDeepEqual(
        pending.map((m) => [m.workflowId, m.message]),
        [['workflow-4', 'Command-4']],
      );
    });

    void it('returns commands of all workflows without a filter', async () => {
      await store.appendToStream('workflow-4', [outputCommand('Command-4')]);
      await store.appendToStream('workflow-5', [outputCommand('Command-5')]);

      const pending = await store.getPendingCommands();

      assertThatArray(payloadsOf(pending)).containsExactlyInAnyOrder([
        'Command-4',
        'Command-5',
      ]);
    });

    void it('returns nothing for an unknown workflow', async () => {
      await store.appendToStream('workflow-4', [outputCommand('Command-4')]);

      assertThatArray(
        await store.getPendingCommands({ workflowId: 'unknown' }),
      ).isEmpty();
    });
  });

  void describe('markCommandProcessed', () => {
    void it('removes the command from pending ones and marks it as processed', async () => {
      await store.appendToStream('workflow-6', [
        outputCommand('Command1'),
        outputCommand('Command2'),
      ]);

      await store.markCommandProcessed('workflow-6', 1n);

      const pending = await store.getPendingCommands({
        workflowId: 'workflow-6',
      });
      assertDeepEqual(payloadsOf(pending), ['Command2']);

      const stored = await store.readStream('workflow-6');
      assertDeepEqual(
        stored.map((m) => m.processed),
        [true, false],
      );
    });

    void it('keeps the rest of the message unchanged', async () => {
      await store.appendToStream('workflow-6', [outputCommand('Command1')]);
      const [before] = await store.readStream('workflow-6');

      await store.markCommandProcessed('workflow-6', 1n);

      const [after] = await store.readStream('workflow-6');
      assertOk(before);
      assertDeepEqual(after, { ...before, processed: true });
    });

    void it('fails for an unknown workflow', async () => {
      await assertThrowsAsync(
        () => store.markCommandProcessed('non-existent', 1n),
        isInvalidOperation('WorkflowNotFound'),
      );
    });

    void it('fails for an unknown position', async () => {
      await store.appendToStream('workflow-7', [outputCommand('Command')]);

      await assertThrowsAsync(
        () => store.markCommandProcessed('workflow-7', 999n),
        isInvalidOperation('PositionNotFound'),
      );
      await assertThrowsAsync(
        () => store.markCommandProcessed('workflow-7', 0n),
        isInvalidOperation('PositionNotFound'),
      );
    });

    void it('fails for an event', async () => {
      await store.appendToStream('workflow-8', [outputEvent('Event')]);

      await assertThrowsAsync(
        () => store.markCommandProcessed('workflow-8', 1n),
        isInvalidOperation('NotAPendingCommand'),
      );
    });

    void it('fails for an input command', async () => {
      await store.appendToStream('workflow-8', [inputCommand('Command')]);

      await assertThrowsAsync(
        () => store.markCommandProcessed('workflow-8', 1n),
        isInvalidOperation('NotAPendingCommand'),
      );

      const [stored] = await store.readStream('workflow-8');
      assertEqual(null, stored?.processed);
    });

    void it('fails for an already processed command', async () => {
      await store.appendToStream('workflow-8', [outputCommand('Command')]);
      await store.markCommandProcessed('workflow-8', 1n);

      await assertThrowsAsync(
        () => store.markCommandProcessed('workflow-8', 1n),
        isInvalidOperation('NotAPendingCommand'),
      );

      const [stored] = await store.readStream('workflow-8');
      assertEqual(true, stored?.processed);
    });
  });

  void describe('exists', () => {
    void it('returns true only for workflows with appended messages', async () => {
      await store.appendToStream('workflow-9', [inputEvent('Message')]);

      assertTrue(await store.exists('workflow-9'));
      assertFalse(await store.exists('workflow-10'));
    });
  });

  void describe('deleteStream', () => {
    void it('removes the whole stream', async () => {
      await store.appendToStream('workflow-11', [
        inputEvent('Message'),
        outputCommand('Command'),
      ]);

      await store.deleteStream('workflow-11');

      assertFalse(await store.exists('workflow-11'));
      assertThatArray(await store.readStream('workflow-11')).isEmpty();
      assertThatArray(
        await store.getPendingCommands({ workflowId: 'workflow-11' }),
      ).isEmpty();
    });

    void it('is idempotent', async () => {
      await store.deleteStream('never-existed');
      await store.deleteStream('never-existed');

      assertFalse(await store.exists('never-existed'));
    });

    void it('starts positions from 1 when the stream is appended again', async () => {
      await store.appendToStream('workflow-12', [
        inputEvent('a'),
        inputEvent('b'),
      ]);
      await store.deleteStream('workflow-12');

      const lastPosition = await store.appendToStream('workflow-12', [
        inputEvent('c'),
      ]);

      assertEqual(1n, lastPosition);
    });
  });
});
