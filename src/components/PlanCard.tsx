/**
 * PlanCard - One subscription plan with its subscribe action
 */

import * as React from 'react';
import type { SubscriptionPlan } from '../types';

interface PlanCardProps {
  plan: SubscriptionPlan;
  pending: boolean;
}

export const PlanCard: React.FC<PlanCardProps> = ({ plan, pending }) => {
  const purchasable = plan.providerPriceId !== null;

  return (
    <div className="card plan-card">
      <h3>{plan.displayName}</h3>
      <div className="plan-price">
        {`${plan.currency} ${plan.monthlyPrice} / month`}
      </div>
      <ul className="plan-features">
        {plan.features.map((feature) => (
          <li key={feature}>{feature}</li>
        ))}
      </ul>
      <form method="post" action="/api/subscription?action=create-checkout">
        <input type="hidden" name="plan_id" value={plan.id} />
        <button type="submit" disabled={!purchasable} aria-label={`Subscribe to ${plan.displayName}`}>
          {purchasable ? (pending ? 'Resume checkout' : `Subscribe to ${plan.displayName}`) : 'Not available'}
        </button>
      </form>
    </div>
  );
};
