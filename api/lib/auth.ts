/**
 * Email-only sign in. The address is taken at face value: nothing proves the
 * visitor owns it, so this is session bookkeeping, not authentication.
 */

import { logger } from '../../src/utils/logger';
import { applySubscription, type BillingClient } from './billing';
import type { Session } from './session';

export type AuthResult = { ok: true } | { ok: false; reason: 'InvalidEmail' };

const EMAIL_SHAPE = /^[^\s@]+@[^\s@]+$/;

export function isEmailShaped(email: string): boolean {
  return EMAIL_SHAPE.test(email);
}

export async function authenticate(
  session: Session,
  email: string,
  billing: BillingClient,
  now: () => Date = () => new Date()
): Promise<AuthResult> {
  const trimmed = email.trim();

  if (!isEmailShaped(trimmed)) {
    return { ok: false, reason: 'InvalidEmail' };
  }

  const userId = trimmed.toLowerCase();
  const status = await billing.checkSubscription(trimmed);

  if (session.get('userId') !== userId) {
    session.clear();
  }

  session.set('userEmail', trimmed);
  session.set('userId', userId);
  applySubscription(session, status, now());

  logger.log(`[session ${session.id.slice(0, 8)}] signed in as ${userId}, subscribed: ${session.get('isSubscribed')}`);
  return { ok: true };
}

export function logout(session: Session): void {
  session.clear();
}
