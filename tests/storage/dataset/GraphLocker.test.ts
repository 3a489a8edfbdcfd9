import { describe, it, expect } from 'vitest';

import { GraphLocker } from '../../../src/storage/dataset/GraphLocker';

async function settle(): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, 10));
}

describe('GraphLocker', () => {
  it('should run callbacks on the same graph one after another', async () => {
    const locker = new GraphLocker();
    const order: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = locker.withWriteLock([ 'g' ], async () => {
      order.push('first-start');
      await gate;
      order.push('first-end');
    });
    const second = locker.withWriteLock([ 'g' ], async () => {
      order.push('second-start');
    });

    await settle();
    expect(order).toEqual([ 'first-start' ]);
    expect(locker.isLocked('g')).toBe(true);

    releaseFirst();
    await Promise.all([ first, second ]);
    expect(order).toEqual([ 'first-start', 'first-end', 'second-start' ]);
    expect(locker.isLocked('g')).toBe(false);
  });

  it('should not block callbacks on other graphs', async () => {
    const locker = new GraphLocker();
    let releaseFirst: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });
    const first = locker.withWriteLock([ 'g' ], async () => gate);

    await expect(locker.withWriteLock([ 'h' ], async () => 'done')).resolves.toBe('done');

    releaseFirst();
    await first;
  });

  it('should let readers share a graph', async () => {
    const locker = new GraphLocker();
    const order: string[] = [];
    let releaseReaders: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      releaseReaders = resolve;
    });

    const first = locker.withReadLock([ 'g' ], async () => {
      order.push('first-start');
      await gate;
    });
    const second = locker.withReadLock([ 'g' ], async () => {
      order.push('second-start');
      await gate;
    });

    await settle();
    expect(order).toEqual([ 'first-start', 'second-start' ]);

    releaseReaders();
    await Promise.all([ first, second ]);
    expect(locker.isLocked('g')).toBe(false);
  });

  it('should keep a writer apart from readers in arrival order', async () => {
    const locker = new GraphLocker();
    const order: string[] = [];
    let releaseReader: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      releaseReader = resolve;
    });

    const reader = locker.withReadLock([ 'g' ], async () => {
      order.push('reader-start');
      await gate;
      order.push('reader-end');
    });
    const writer = locker.withWriteLock([ 'g' ], async () => {
      order.push('writer');
    });
    const lateReader = locker.withReadLock([ 'g' ], async () => {
      order.push('late-reader');
    });

    await settle();
    expect(order).toEqual([ 'reader-start' ]);

    releaseReader();
    await Promise.all([ reader, writer, lateReader ]);
    expect(order).toEqual([ 'reader-start', 'reader-end', 'writer', 'late-reader' ]);
  });

  it('should release the lock when the callback throws', async () => {
    const locker = new GraphLocker();

    await expect(locker.withWriteLock([ 'g' ], async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    await expect(locker.withWriteLock([ 'g' ], async () => 42)).resolves.toBe(42);
  });
});
