export type AcquireLockOptions = { lockId: string };
export type ReleaseLockOptions = { lockId: string };

export type Lock = {
  acquire(options: AcquireLockOptions): Promise<void>;
  tryAcquire(options: AcquireLockOptions): Promise<boolean>;
  release(options: ReleaseLockOptions): Promise<boolean>;
  withAcquire: <Result = unknown>(
    handle: () => Promise<Result>,
    options: AcquireLockOptions,
  ) => Promise<Result>;
};

type Ticket = { released: Promise<void>; release: () => void };

const ticket = (): Ticket => {
  let release: () => void = () => {};
  const released = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { released, release };
};

/**
 * Exclusive lock per lock id, kept in memory of the current process.
 * Waiters for the same id are granted the lock in the order they asked for it;
 * different ids never wait for each other.
 */
export const InProcessLock = (): Lock => {
  // lockId -> promise resolved when the last queued holder releases the lock
  const queues = new Map<string, Promise<void>>();
  // lockId -> release function of the current holder
  const holders = new Map<string, () => void>();

  const acquire = async ({ lockId }: AcquireLockOptions): Promise<void> => {
    const previous = queues.get(lockId) ?? Promise.resolve();
    const current = ticket();
    const queue = previous.then(() => current.released);

    queues.set(lockId, queue);

    await previous;

    holders.set(lockId, () => {
      // nobody queued up after us, so the id can be forgotten
      if (queues.get(lockId) === queue) queues.delete(lockId);
      current.release();
    });
  };

  const release = ({ lockId }: ReleaseLockOptions): Promise<boolean> => {
    const releaseHolder = holders.get(lockId);
    if (releaseHolder === undefined) {
      return Promise.resolve(false);
    }
    holders.delete(lockId);
    releaseHolder();
    return Promise.resolve(true);
  };

  return {
    acquire,

    async tryAcquire({ lockId }: AcquireLockOptions): Promise<boolean> {
      // held or awaited by someone else
      if (queues.has(lockId)) {
        return false;
      }

      await acquire({ lockId });

      return true;
    },

    release,

    async withAcquire<Result = unknown>(
      handle: () => Promise<Result>,
      { lockId }: AcquireLockOptions,
    ): Promise<Result> {
      await acquire({ lockId });
      try {
        return await handle();
      } finally {
        await release({ lockId });
      }
    },
  };
};
