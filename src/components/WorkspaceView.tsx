import * as React from 'react';
import type { GenerationJob, GenerationRequest } from '../types';
import { GenerateForm } from './GenerateForm';
import { JobPanel } from './JobPanel';

interface WorkspaceViewProps {
  job: GenerationJob | null;
  draft?: Partial<GenerationRequest>;
  validUntil: Date | null;
  now: Date;
}

export const WorkspaceView: React.FC<WorkspaceViewProps> = ({ job, draft, validUntil, now }) => {
  const busy = job !== null && (job.status === 'queued' || job.status === 'processing');

  return (
    <section className="workspace">
      {job && <JobPanel job={job} now={now} />}
      <GenerateForm draft={draft ?? job?.request} busy={busy} />
      {validUntil && (
        <p className="small-text">{`Subscription active until ${validUntil.toISOString().slice(0, 10)}.`}</p>
      )}
    </section>
  );
};
