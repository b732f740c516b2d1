import { describe, expect, it } from 'vitest';
import { SessionStore } from '../lib/session';

describe('Session', () => {
  it('returns defaults for fields that were never set', () => {
    const { session } = new SessionStore(60_000).open();

    expect(session.get('userEmail')).toBeNull();
    expect(session.get('isSubscribed')).toBe(false);
    expect(session.get('plan')).toBe('none');
    expect(session.get('currentJobId')).toBeNull();
  });

  it('keeps values until they are overwritten or cleared', () => {
    const { session } = new SessionStore(60_000).open();

    session.set('userEmail', 'a@b.ch');
    session.set('plan', 'pro');
    expect(session.get('userEmail')).toBe('a@b.ch');
    expect(session.get('plan')).toBe('pro');

    session.set('plan', 'enterprise');
    expect(session.get('plan')).toBe('enterprise');

    session.clear();
    expect(session.get('userEmail')).toBeNull();
    expect(session.get('plan')).toBe('none');
  });

  it('does not share state between sessions', () => {
    const store = new SessionStore(60_000);
    const first = store.open().session;
    const second = store.open().session;

    first.set('userEmail', 'first@example.com');

    expect(first.id).not.toBe(second.id);
    expect(second.get('userEmail')).toBeNull();
  });

  it('serialises tasks queued on the same session', async () => {
    const { session } = new SessionStore(60_000).open();
    const order: string[] = [];

    const slow = session.runExclusive(async () => {
      await new Promise((resolve) => setTimeout(resolve, 20));
      order.push('slow');
    });
    const fast = session.runExclusive(async () => {
      order.push('fast');
    });

    await Promise.all([slow, fast]);
    expect(order).toEqual(['slow', 'fast']);
  });

  it('keeps running queued tasks after one fails', async () => {
    const { session } = new SessionStore(60_000).open();

    const failing = session.runExclusive(async () => {
      throw new Error('boom');
    });
    const next = session.runExclusive(async () => 'ran');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ran');
  });
});

describe('SessionStore', () => {
  it('reopens a known token and creates a new session for an unknown one', () => {
    const store = new SessionStore(60_000);
    const first = store.open();

    expect(first.created).toBe(true);
    expect(store.open(first.session.id)).toEqual({ session: first.session, created: false });

    const other = store.open('not-a-session');
    expect(other.created).toBe(true);
    expect(other.session.id).not.toBe('not-a-session');
  });

  it('drops sessions idle for longer than the ttl', () => {
    let now = 1_000;
    const store = new SessionStore(60_000, () => now);
    const { session } = store.open();
    session.set('userEmail', 'a@b.ch');

    now += 60_001;
    const reopened = store.open(session.id);

    expect(reopened.created).toBe(true);
    expect(reopened.session.get('userEmail')).toBeNull();
    expect(store.get(session.id)).toBeUndefined();
  });

  it('destroys a session on request', () => {
    const store = new SessionStore(60_000);
    const { session } = store.open();

    store.destroy(session.id);

    expect(store.size).toBe(0);
  });
});
