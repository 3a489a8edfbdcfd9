import { getLoggerFor } from 'global-logger-factory';

/**
 * Lock key covering the whole dataset. Query evaluation may read any graph,
 * so the engine takes this key for every statement.
 */
export const DATASET_LOCK = '*';

type LockMode = 'read' | 'write';

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

interface LockState {
  readers: number;
  writer: boolean;
  queue: Waiter[];
}

/**
 * In-process readers-writer locker keyed by graph.
 *
 * Readers of a key share it; a writer holds it alone. Waiters are served in
 * arrival order, so a queued writer is not overtaken by later readers.
 * Multiple keys are acquired in sorted order so two statements locking
 * overlapping key sets cannot deadlock.
 */
export class GraphLocker {
  protected readonly logger = getLoggerFor(this);
  private readonly states = new Map<string, LockState>();

  public async withReadLock<T>(keys: Iterable<string>, callback: () => Promise<T>): Promise<T> {
    return this.withLock('read', keys, callback);
  }

  public async withWriteLock<T>(keys: Iterable<string>, callback: () => Promise<T>): Promise<T> {
    return this.withLock('write', keys, callback);
  }

  public isLocked(key: string): boolean {
    return this.states.has(key);
  }

  private async withLock<T>(mode: LockMode, keys: Iterable<string>, callback: () => Promise<T>): Promise<T> {
    const sorted = [ ...new Set(keys) ].sort();
    const releases: (() => void)[] = [];
    try {
      for (const key of sorted) {
        releases.push(await this.acquire(key, mode));
      }
      return await callback();
    } finally {
      for (const release of releases.reverse()) {
        release();
      }
    }
  }

  private async acquire(key: string, mode: LockMode): Promise<() => void> {
    let state = this.states.get(key);
    if (!state) {
      state = { readers: 0, writer: false, queue: []};
      this.states.set(key, state);
    }
    this.logger.debug(`trying with${mode === 'read' ? 'Read' : 'Write'}Lock[${key || 'default'}]`);

    if (state.queue.length === 0 && canGrant(state, mode)) {
      take(state, mode);
    } else {
      const queued = state;
      await new Promise<void>((resolve) => {
        queued.queue.push({ mode, grant: resolve });
      });
    }

    const held = state;
    return (): void => {
      if (mode === 'read') {
        held.readers--;
      } else {
        held.writer = false;
      }
      this.drain(key, held);
      this.logger.debug(`releasing with${mode === 'read' ? 'Read' : 'Write'}Lock[${key || 'default'}]`);
    };
  }

  private drain(key: string, state: LockState): void {
    while (state.queue.length > 0) {
      const [ next ] = state.queue;
      if (!canGrant(state, next.mode)) {
        break;
      }
      state.queue.shift();
      take(state, next.mode);
      next.grant();
    }
    if (state.readers === 0 && !state.writer && state.queue.length === 0) {
      this.states.delete(key);
    }
  }
}

function canGrant(state: LockState, mode: LockMode): boolean {
  return mode === 'read' ? !state.writer : !state.writer && state.readers === 0;
}

function take(state: LockState, mode: LockMode): void {
  if (mode === 'read') {
    state.readers++;
  } else {
    state.writer = true;
  }
}
