import { describe, expect, it } from 'vitest';
import { CheckGuard } from './CheckGuard.js';

describe('CheckGuard', () => {
  it('hands out one handle per subscriber at a time', () => {
    const guard = new CheckGuard();

    const first = guard.tryAcquire('u1');
    const second = guard.tryAcquire('u1');

    expect(first).toBeTypeOf('function');
    expect(second).toBeNull();
    expect(guard.isHeld('u1')).toBe(true);
  });

  it('keeps subscribers independent', () => {
    const guard = new CheckGuard();

    expect(guard.tryAcquire('u1')).not.toBeNull();
    expect(guard.tryAcquire('u2')).not.toBeNull();
    expect(guard.size).toBe(2);
  });

  it('frees the subscriber on release and ignores repeated releases', () => {
    const guard = new CheckGuard();
    const release = guard.tryAcquire('u1');
    release?.();

    const next = guard.tryAcquire('u1');
    release?.();

    expect(next).not.toBeNull();
    expect(guard.isHeld('u1')).toBe(true);

    next?.();
    expect(guard.isHeld('u1')).toBe(false);
    expect(guard.size).toBe(0);
  });
});
