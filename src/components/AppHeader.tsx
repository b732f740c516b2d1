/**
 * AppHeader - Product title plus the signed-in account, plan and log out action
 */

import * as React from 'react';
import type { PlanSelection } from '../types';

interface AppHeaderProps {
  userEmail: string | null;
  plan: PlanSelection;
  canManageSubscription: boolean;
}

const PLAN_LABELS: Record<PlanSelection, string> = {
  none: 'No plan',
  pro: 'Pro plan',
  enterprise: 'Enterprise plan',
};

export const AppHeader: React.FC<AppHeaderProps> = ({ userEmail, plan, canManageSubscription }) => {
  return (
    <header className="app-header">
      <h1 className="app-title">Methodgraph Studio</h1>
      {userEmail && (
        <div className="account">
          <span className="account-email">{userEmail}</span>
          <span className="plan-label">{PLAN_LABELS[plan]}</span>
          {canManageSubscription && (
            <form method="post" action="/api/subscription?action=portal">
              <button type="submit" className="link-button">
                Manage subscription
              </button>
            </form>
          )}
          <form method="post" action="/api/auth?action=logout">
            <button type="submit" className="link-button">
              Log out
            </button>
          </form>
        </div>
      )}
    </header>
  );
};
