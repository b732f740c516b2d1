/**
 * Picks which of the three views a session sees, and which actions each view
 * offers. Anything a view does not offer is a no-op for that session.
 *
 *   landing  --login-->            paywall | workspace
 *   paywall  --checkout verified--> workspace
 *   workspace --expired on recheck--> paywall
 *   paywall | workspace --logout--> landing
 */

import type { ViewName } from '../../src/types';
import { logger } from '../../src/utils/logger';
import { applySubscription, type BillingClient } from './billing';
import type { Session } from './session';

export type ViewAction =
  | 'login'
  | 'logout'
  | 'create-checkout'
  | 'portal'
  | 'start-job'
  | 'cancel-job'
  | 'view-image';

const VIEW_ACTIONS: Record<ViewName, readonly ViewAction[]> = {
  landing: ['login'],
  paywall: ['logout', 'create-checkout'],
  workspace: ['logout', 'portal', 'start-job', 'cancel-job', 'view-image'],
};

export function resolveView(session: Session, now: Date): ViewName {
  if (!session.get('userId')) {
    return 'landing';
  }

  const validUntil = session.get('validUntil');
  if (
    session.get('isSubscribed') &&
    session.get('plan') !== 'none' &&
    validUntil !== null &&
    validUntil.getTime() > now.getTime()
  ) {
    return 'workspace';
  }

  return 'paywall';
}

export function allows(view: ViewName, action: ViewAction): boolean {
  return VIEW_ACTIONS[view].includes(action);
}

export interface RefreshOptions {
  checkoutReturned?: 'success' | 'cancel';
}

/**
 * Re-verifies the subscription when the visitor comes back from checkout
 * (or has one pending), and when a subscribed session's period has ended.
 * Returns the view to render afterwards.
 */
export async function refreshSession(
  session: Session,
  billing: BillingClient,
  now: Date,
  options: RefreshOptions = {}
): Promise<ViewName> {
  const email = session.get('userEmail');
  if (!email) {
    return 'landing';
  }

  const before = resolveView(session, now);

  if (options.checkoutReturned === 'cancel') {
    session.set('pendingCheckoutPlan', null);
    return before;
  }

  const validUntil = session.get('validUntil');
  const expired = session.get('isSubscribed') && (validUntil === null || validUntil.getTime() <= now.getTime());
  const checkoutPending = options.checkoutReturned === 'success' || session.get('pendingCheckoutPlan') !== null;

  if (!expired && !(checkoutPending && before === 'paywall')) {
    return before;
  }

  const status = await billing.checkSubscription(email);
  applySubscription(session, status, now);

  const after = resolveView(session, now);
  if (after === 'workspace') {
    session.set('pendingCheckoutPlan', null);
  }
  const from: ViewName = expired ? 'workspace' : before;
  if (after !== from) {
    logger.log(`[session ${session.id.slice(0, 8)}] ${from} -> ${after}`);
  }

  return after;
}
