/**
 * Tessera SDK - Read/Write Lock
 *
 * Guards the in-memory message store: queries share, mutations exclude.
 */

import { Semaphore } from 'async-mutex';

const MAX_READERS = 1024;

/**
 * ReadWriteLock - Shared-read / exclusive-write discipline over a weighted semaphore.
 *
 * A reader takes one permit; a writer takes every permit, so it waits for all
 * active readers and blocks new ones. Waiters are served in arrival order, which
 * keeps a queued writer from being starved by a stream of readers.
 */
export class ReadWriteLock {
  private readonly semaphore = new Semaphore(MAX_READERS);

  read<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.semaphore.runExclusive(fn, 1);
  }

  write<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.semaphore.runExclusive(fn, MAX_READERS);
  }

  /** True while any reader or writer holds the lock. */
  isLocked(): boolean {
    return this.semaphore.getValue() < MAX_READERS;
  }
}
