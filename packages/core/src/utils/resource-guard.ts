/**
 * Scoped cleanup
 *
 * Collects release callbacks while resources are acquired. `release()` runs them in
 * reverse order and never throws; `transfer()` hands them to a new owner and leaves the guard empty,
 * so a later `release()` in a finally block does nothing.
 */

import { logger } from './logger.js';
import { describeError } from './errors.js';

export type Release = () => Promise<void>;

export class ResourceGuard {
  private releases: { label: string; release: Release }[] = [];

  defer(label: string, release: Release): void {
    this.releases.push({ label, release });
  }

  get size(): number {
    return this.releases.length;
  }

  /**
   * Release everything held, newest first. Every callback runs even if an earlier
   * one throws; failures are logged and returned in the order they occurred.
   */
  async release(): Promise<unknown[]> {
    const pending = this.releases.reverse();
    this.releases = [];

    const failures: unknown[] = [];
    for (const { label, release } of pending) {
      try {
        await release();
      } catch (error) {
        logger.warn({ resource: label, err: describeError(error) }, '[guard] Release failed');
        failures.push(error);
      }
    }
    return failures;
  }

  /**
   * Move ownership of every held resource to a fresh guard
   */
  transfer(): ResourceGuard {
    const next = new ResourceGuard();
    next.releases = this.releases;
    this.releases = [];
    return next;
  }
}
