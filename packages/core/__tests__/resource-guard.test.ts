import { describe, it, expect } from 'vitest';
import { ResourceGuard } from '../src/index.js';

describe('ResourceGuard', () => {
  it('should release in reverse order of acquisition', async () => {
    const order: string[] = [];
    const guard = new ResourceGuard();
    guard.defer('lease', async () => {
      order.push('lease');
    });
    guard.defer('tunnel', async () => {
      order.push('tunnel');
    });

    const failures = await guard.release();

    expect(order).toEqual(['tunnel', 'lease']);
    expect(failures).toEqual([]);
    expect(guard.size).toBe(0);
  });

  it('should keep releasing after a failure and report it', async () => {
    const order: string[] = [];
    const failure = new Error('kill failed');
    const guard = new ResourceGuard();
    guard.defer('lease', async () => {
      order.push('lease');
    });
    guard.defer('tunnel', async () => {
      throw failure;
    });

    const failures = await guard.release();

    expect(order).toEqual(['lease']);
    expect(failures).toEqual([failure]);
  });

  it('should hand everything to the new owner on transfer', async () => {
    const order: string[] = [];
    const guard = new ResourceGuard();
    guard.defer('lease', async () => {
      order.push('lease');
    });

    const next = guard.transfer();
    await guard.release();

    expect(order).toEqual([]);
    expect(guard.size).toBe(0);
    expect(next.size).toBe(1);

    await next.release();
    expect(order).toEqual(['lease']);
  });

  it('should release each resource only once', async () => {
    let calls = 0;
    const guard = new ResourceGuard();
    guard.defer('lease', async () => {
      calls += 1;
    });

    await guard.release();
    await guard.release();

    expect(calls).toBe(1);
  });
});
