/**
 * Session store tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SessionStore } from '../../services/session.service.js';
import { NotFoundError } from '../../utils/errors.js';

describe('SessionStore', () => {
  let clock: number;
  let store: SessionStore;

  beforeEach(() => {
    clock = 1_000_000;
    store = new SessionStore({ idleTtlMs: 1000, now: () => clock });
  });

  it('should create a session with empty history on first use', () => {
    const session = store.getOrCreate('s1');
    expect(session.history).toEqual([]);
    expect(session.createdAt.getTime()).toBe(1_000_000);
    expect(store.size).toBe(1);
  });

  it('should return the same session on later calls', () => {
    expect(store.getOrCreate('s1')).toBe(store.getOrCreate('s1'));
  });

  it('should append messages in order', () => {
    store.append('s1', { role: 'user', content: 'one' });
    store.append('s1', { role: 'assistant', content: 'two' }, { role: 'user', content: 'three' });

    expect(store.history('s1').map((m) => m.role)).toEqual(['user', 'assistant', 'user']);
  });

  it('should keep sessions isolated', () => {
    store.append('a', { role: 'user', content: 'for a' });
    store.append('b', { role: 'user', content: 'for b' });

    expect(store.history('a')).toEqual([{ role: 'user', content: 'for a' }]);
    expect(store.history('b')).toEqual([{ role: 'user', content: 'for b' }]);
  });

  it('should return a history copy', () => {
    store.append('s1', { role: 'user', content: 'hi' });
    const copy = store.history('s1');
    copy.push({ role: 'user', content: 'injected' });

    expect(store.history('s1')).toHaveLength(1);
  });

  it('should throw NotFoundError for an unknown session', () => {
    expect(() => store.history('missing')).toThrow(NotFoundError);
    expect(() => store.history('missing')).toThrow("Session 'missing' not found");
  });

  it('should allow a single writer per session', () => {
    expect(store.tryLock('s1')).toBe(true);
    expect(store.tryLock('s1')).toBe(false);
    expect(store.tryLock('s2')).toBe(true);
    expect(store.isLocked('s1')).toBe(true);

    store.unlock('s1');
    expect(store.isLocked('s1')).toBe(false);
    expect(store.tryLock('s1')).toBe(true);
  });

  it('should evict sessions idle past the TTL', () => {
    store.append('old', { role: 'user', content: 'x' });
    clock += 600;
    store.append('fresh', { role: 'user', content: 'y' });
    clock += 600;

    expect(store.evictIdle()).toBe(1);
    expect(store.get('old')).toBeUndefined();
    expect(store.get('fresh')).toBeDefined();
  });

  it('should not evict a session with a turn in flight', () => {
    store.append('busy', { role: 'user', content: 'x' });
    store.tryLock('busy');
    clock += 5000;

    expect(store.evictIdle()).toBe(0);
    expect(store.get('busy')).toBeDefined();
  });

  it('should refresh activity on append', () => {
    store.append('s1', { role: 'user', content: 'x' });
    clock += 900;
    store.append('s1', { role: 'assistant', content: 'y' });
    clock += 900;

    expect(store.evictIdle()).toBe(0);
  });

  it('should delete sessions and their locks', () => {
    store.getOrCreate('s1');
    store.tryLock('s1');

    expect(store.delete('s1')).toBe(true);
    expect(store.isLocked('s1')).toBe(false);
    expect(store.size).toBe(0);
  });
});
