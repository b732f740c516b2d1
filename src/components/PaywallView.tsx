import * as React from 'react';
import type { PlanId, SubscriptionPlan } from '../types';
import { PlanCard } from './PlanCard';

interface PaywallViewProps {
  plans: readonly SubscriptionPlan[];
  pendingPlan: PlanId | null;
}

export const PaywallView: React.FC<PaywallViewProps> = ({ plans, pendingPlan }) => {
  return (
    <section className="paywall">
      <h2>Choose a plan</h2>
      <p>Diagram generation is available with an active subscription.</p>
      <div className="plans">
        {plans.map((plan) => (
          <PlanCard key={plan.id} plan={plan} pending={pendingPlan === plan.id} />
        ))}
      </div>
      {pendingPlan && (
        <p className="small-text">
          Finished paying? <a href="/?checkout=success">Check my subscription again</a>.
        </p>
      )}
    </section>
  );
};
