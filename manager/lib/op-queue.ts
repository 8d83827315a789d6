/**
 * Operation Queue - per-key promise serialization
 *
 * Ensures operations sharing a key are executed one at a time, in the order
 * they were queued.
 *
 * - Strict serialization per key (one operation at a time)
 * - Different keys run in parallel
 * - Queue continues even if a previous operation failed
 *
 * Used per session id (open/close of the same session never overlap) and for
 * the nft binary (one rule-set edit at a time).
 */

import { log } from './logger';

export class OperationQueue {
  // Per-key promise chains; the stored tail never rejects
  private readonly queues = new Map<string, Promise<void>>();

  constructor(private readonly name: string = 'queue') {}

  /**
   * Execute a function within the key's queue
   * @returns Result of the function (rejections reach the caller, not the queue)
   */
  run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const current = this.queues.get(key) || Promise.resolve();

    const next = current.then(() => {
      log.queue(`${this.name} executing`, { key });
      return fn();
    });

    // Store a promise that always resolves, so failures don't block subsequent operations
    // The chained promise (next) is returned to caller so they receive any rejection
    const tail: Promise<void> = next.then(
      () => undefined,
      (err: unknown) => {
        log.debugFor('queue', `${this.name} operation failed; continuing queue`, {
          key,
          error: err instanceof Error ? err.message : String(err),
        });
      },
    ).then(() => {
      // Drop the chain once nothing else has been queued behind it
      if (this.queues.get(key) === tail) {
        this.queues.delete(key);
      }
    });
    this.queues.set(key, tail);

    return next;
  }
}
