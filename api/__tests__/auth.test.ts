import { describe, expect, it } from 'vitest';
import { authenticate, isEmailShaped, logout } from '../lib/auth';
import { resolveView } from '../lib/viewRouter';
import { NEXT_MONTH, NOW, PRO_PRICE, createHarness } from './helpers';

describe('isEmailShaped', () => {
  it.each([
    ['a@b.ch', true],
    ['User.Name@Example.org', true],
    ['not-an-email', false],
    ['@example.com', false],
    ['user@', false],
    ['two words@example.com', false],
  ])('%s -> %s', (email, expected) => {
    expect(isEmailShaped(email)).toBe(expected);
  });
});

describe('authenticate', () => {
  it('rejects a malformed email and leaves the session untouched', async () => {
    const { session, services, gateway } = createHarness();
    const before = session.snapshot();

    const result = await authenticate(session, 'not-an-email', services.billing, services.now);

    expect(result).toEqual({ ok: false, reason: 'InvalidEmail' });
    expect(session.snapshot()).toEqual(before);
    expect(gateway.lookups).toBe(0);
  });

  it('sends a user without a subscription to the paywall', async () => {
    const { session, services } = createHarness();

    const result = await authenticate(session, 'user@example.com', services.billing, services.now);

    expect(result).toEqual({ ok: true });
    expect(session.get('userEmail')).toBe('user@example.com');
    expect(session.get('isSubscribed')).toBe(false);
    expect(resolveView(session, NOW)).toBe('paywall');
  });

  it('stores the plan and period end of an active subscription', async () => {
    const { session, services, gateway } = createHarness();
    gateway.subscribe('Researcher@Example.com', 'active', PRO_PRICE);

    await authenticate(session, '  Researcher@Example.com ', services.billing, services.now);

    expect(session.get('userId')).toBe('researcher@example.com');
    expect(session.get('userEmail')).toBe('Researcher@Example.com');
    expect(session.get('plan')).toBe('pro');
    expect(session.get('validUntil')).toEqual(NEXT_MONTH);
    expect(session.get('lastVerifiedAt')).toEqual(NOW);
    expect(resolveView(session, NOW)).toBe('workspace');
  });

  it('forgets the previous identity when another email signs in', async () => {
    const { session, services } = createHarness();
    await authenticate(session, 'first@example.com', services.billing, services.now);
    session.set('pendingCheckoutPlan', 'pro');

    await authenticate(session, 'second@example.com', services.billing, services.now);

    expect(session.get('userId')).toBe('second@example.com');
    expect(session.get('pendingCheckoutPlan')).toBeNull();
  });
});

describe('logout', () => {
  it('is idempotent', async () => {
    const { session, services, gateway } = createHarness();
    gateway.subscribe('a@b.ch', 'active', PRO_PRICE);
    await authenticate(session, 'a@b.ch', services.billing, services.now);

    logout(session);
    const once = session.snapshot();
    logout(session);

    expect(session.snapshot()).toEqual(once);
    expect(once.userId).toBeNull();
    expect(once.isSubscribed).toBe(false);
    expect(once.plan).toBe('none');
    expect(once.validUntil).toBeNull();
    expect(resolveView(session, NOW)).toBe('landing');
  });
});
