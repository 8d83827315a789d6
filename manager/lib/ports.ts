/**
 * Ingress port pool for forwarding sessions.
 *
 * Every port in the configured range is in exactly one of two sets: free or
 * allocated. `allocate()` hands out the port that has been free the longest
 * (Set iteration order is insertion order), so a port that was just released
 * goes to the back of the line and is reused last.
 */

import { ResourceExhaustedError } from './errors';
import { log } from './logger';

/** Lowest port the pool will manage (below this are well-known/system ports) */
export const MIN_POOL_PORT = 1024;
export const MAX_PORT = 65535;

export interface PortRange {
  start: number;
  end: number;
}

export class PortPool {
  private readonly free = new Set<number>();
  private readonly allocated = new Set<number>();
  readonly range: Readonly<PortRange>;

  /**
   * @param start - First port in the pool (inclusive)
   * @param end - Last port in the pool (inclusive)
   */
  constructor(start: number, end: number) {
    if (!Number.isInteger(start) || !Number.isInteger(end)) {
      throw new RangeError(`Port range bounds must be integers (got ${start}-${end})`);
    }
    if (start < MIN_POOL_PORT || end > MAX_PORT || start > end) {
      throw new RangeError(`Invalid port range ${start}-${end}: must satisfy ${MIN_POOL_PORT} <= start <= end <= ${MAX_PORT}`);
    }
    this.range = Object.freeze({ start, end });
    for (let port = start; port <= end; port++) {
      this.free.add(port);
    }
  }

  /**
   * Take one free port out of the pool
   * @throws {ResourceExhaustedError} If every port is allocated
   */
  allocate(): number {
    const next = this.free.values().next();
    if (next.done) {
      throw new ResourceExhaustedError('No free ingress ports available', {
        range: `${this.range.start}-${this.range.end}`,
        allocated: this.allocated.size,
      });
    }
    const port = next.value;
    this.free.delete(port);
    this.allocated.add(port);
    log.pool('Allocated', { port, free: this.free.size });
    return port;
  }

  /**
   * Return a port to the pool.
   * Releasing a port that is out of range or already free is a no-op: it
   * points at a caller bug, not a leak, so it is logged and ignored.
   * @returns Whether the port was actually returned
   */
  release(port: number): boolean {
    if (!this.allocated.has(port)) {
      const reason = this.inRange(port) ? 'already free' : 'out of range';
      log.warn(`Ignoring release of port ${port}: ${reason}`, { port });
      return false;
    }
    this.allocated.delete(port);
    this.free.add(port);
    log.pool('Released', { port, free: this.free.size });
    return true;
  }

  inRange(port: number): boolean {
    return Number.isInteger(port) && port >= this.range.start && port <= this.range.end;
  }

  get freeCount(): number {
    return this.free.size;
  }

  get allocatedCount(): number {
    return this.allocated.size;
  }

  /** Total number of ports managed by the pool */
  get size(): number {
    return this.range.end - this.range.start + 1;
  }
}
