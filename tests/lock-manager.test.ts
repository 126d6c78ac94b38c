import { describe, it, expect } from 'vitest';
import { LockManager } from '../src/store/lock-manager';
import { ErrorCode, InfrastructureError } from '../src/types/error.types';
import { tick } from './helpers';

describe('LockManager', () => {
  it('grants a key to one holder at a time, in arrival order', async () => {
    const locks = new LockManager(1000);
    const events: string[] = [];

    const releaseFirst = await locks.acquire('raffle:1');
    const second = locks.acquire('raffle:1').then((release) => {
      events.push('second acquired');
      return release;
    });

    await tick();
    expect(events).toEqual([]);

    events.push('first released');
    releaseFirst();
    const releaseSecond = await second;
    releaseSecond();

    expect(events).toEqual(['first released', 'second acquired']);
    expect(locks.has('raffle:1')).toBe(false);
  });

  it('does not block unrelated keys', async () => {
    const locks = new LockManager(50);

    const releaseA = await locks.acquire('ticket:a');
    const releaseB = await locks.acquire('ticket:b');

    releaseA();
    releaseB();
    expect(locks.has('ticket:a')).toBe(false);
    expect(locks.has('ticket:b')).toBe(false);
  });

  it('times out a waiter with LOCK_TIMEOUT', async () => {
    const locks = new LockManager(1000);
    const release = await locks.acquire('order:1');

    const error = await locks.acquire('order:1', 20).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InfrastructureError);
    expect(error).toMatchObject({
      code: ErrorCode.LOCK_TIMEOUT,
      retryable: true,
      message: 'Timed out after 20ms waiting for lock on order:1',
    });
    release();
  });

  it('keeps later waiters behind the holder after a timeout', async () => {
    const locks = new LockManager(1000);
    const releaseFirst = await locks.acquire('service:1');

    await expect(locks.acquire('service:1', 20)).rejects.toBeInstanceOf(InfrastructureError);

    let thirdAcquired = false;
    const third = locks.acquire('service:1').then((release) => {
      thirdAcquired = true;
      return release;
    });

    await tick(20);
    expect(thirdAcquired).toBe(false);

    releaseFirst();
    const releaseThird = await third;
    expect(thirdAcquired).toBe(true);

    releaseThird();
    await tick();
    expect(locks.has('service:1')).toBe(false);
  });
});
