import * as React from 'react';
import { renderToStaticMarkup } from 'react-dom/server';
import { AppHeader } from './components/AppHeader';
import { LoginForm } from './components/LoginForm';
import { NoticeBanner } from './components/NoticeBanner';
import { PaywallView } from './components/PaywallView';
import { WorkspaceView } from './components/WorkspaceView';
import { STYLES } from './styles';
import type {
  GenerationJob,
  GenerationRequest,
  Notice,
  PlanId,
  PlanSelection,
  SubscriptionPlan,
  ViewName,
} from './types';

export interface PageProps {
  view: ViewName;
  userEmail: string | null;
  plan: PlanSelection;
  validUntil: Date | null;
  pendingPlan: PlanId | null;
  plans: readonly SubscriptionPlan[];
  job: GenerationJob | null;
  now: Date;
  notice?: Notice;
  draft?: Partial<GenerationRequest>;
  loginEmail?: string;
}

// Seconds between reloads while a job is still running
export const POLL_INTERVAL_SECONDS = 4;

export const App: React.FC<PageProps> = (props) => {
  const { view, job } = props;
  const polling = view === 'workspace' && job !== null && (job.status === 'queued' || job.status === 'processing');

  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1" />
        {polling && <meta httpEquiv="refresh" content={String(POLL_INTERVAL_SECONDS)} />}
        <title>Methodgraph Studio</title>
        <style dangerouslySetInnerHTML={{ __html: STYLES }} />
      </head>
      <body data-view={view}>
        <AppHeader
          userEmail={view === 'landing' ? null : props.userEmail}
          plan={props.plan}
          canManageSubscription={view === 'workspace'}
        />
        <main>
          {props.notice && <NoticeBanner notice={props.notice} />}
          {view === 'landing' && <LoginForm email={props.loginEmail} />}
          {view === 'paywall' && <PaywallView plans={props.plans} pendingPlan={props.pendingPlan} />}
          {view === 'workspace' && (
            <WorkspaceView job={job} draft={props.draft} validUntil={props.validUntil} now={props.now} />
          )}
        </main>
      </body>
    </html>
  );
};

export function renderPage(props: PageProps): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(<App {...props} />)}`;
}
