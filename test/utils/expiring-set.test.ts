import { describe, it, expect } from 'vitest';
import { ExpiringSet } from '../../src/utils/expiring-set';
import { SeenIdSet, DEFAULT_SEEN_TTL_MS } from '../../src/feed/seen-id-set';

describe('ExpiringSet', () => {
  it('expires its whole contents once the TTL has passed', () => {
    let now = 0;
    const set = new ExpiringSet<string>(1000, () => now);
    set.add('a');
    now = 500;
    set.add('b');
    expect(set.has('a')).toBe(true);

    now = 1000;
    expect(set.has('b')).toBe(false);
    expect(set.size).toBe(0);
    expect(set.expiresAt()).toBe(2000);
  });

  it('restarts the window on clear', () => {
    let now = 0;
    const set = new ExpiringSet<number>(1000, () => now);
    now = 900;
    set.clear();
    set.addAll([1, 2]);
    now = 1500;
    expect(set.has(1)).toBe(true);
    expect(set.size).toBe(2);
  });
});

describe('SeenIdSet', () => {
  it('defaults to a 24 hour TTL', () => {
    let now = 0;
    const seen = new SeenIdSet(undefined, () => now);
    seen.add(1);
    now = DEFAULT_SEEN_TTL_MS - 1;
    expect(seen.has(1)).toBe(true);
    now = DEFAULT_SEEN_TTL_MS;
    expect(seen.has(1)).toBe(false);
  });
});
