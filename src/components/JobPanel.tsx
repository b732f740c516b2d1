/**
 * JobPanel - Progress, result or failure of the session's latest generation job
 */

import * as React from 'react';
import type { GenerationJob } from '../types';

interface JobPanelProps {
  job: GenerationJob;
  now: Date;
}

const formatElapsed = (from: string, now: Date): string => {
  const seconds = Math.max(0, Math.floor((now.getTime() - Date.parse(from)) / 1000));
  const minutes = Math.floor(seconds / 60);

  if (minutes > 0) {
    return `${minutes} minute${minutes > 1 ? 's' : ''}`;
  }
  return `${seconds} second${seconds === 1 ? '' : 's'}`;
};

export const JobPanel: React.FC<JobPanelProps> = ({ job, now }) => {
  const caption = job.request.caption;

  if (job.status === 'queued' || job.status === 'processing') {
    return (
      <section className="card job-panel">
        <div className="job-status">
          <span className="spinner"></span>
          <span className="status-text">{`Generating diagram for ${formatElapsed(job.createdAt, now)}...`}</span>
        </div>
        <p className="small-text">Retriever, planner, stylist, visualizer and critic can take a few minutes.</p>
        <form method="post" action="/api/cancel-job">
          <input type="hidden" name="job_id" value={job.id} />
          <button type="submit">Cancel</button>
        </form>
      </section>
    );
  }

  if (job.status === 'done') {
    return (
      <section className="card job-panel">
        <h3>Done!</h3>
        <img className="result-image" src={`/api/image?job_id=${job.id}`} alt={caption} />
        <p className="small-text">{caption}</p>
        <a className="download-link" href={`/api/image?job_id=${job.id}&download=1`}>
          Download PNG
        </a>
      </section>
    );
  }

  if (job.status === 'cancelled') {
    return (
      <section className="card job-panel">
        <p className="status-text">Generation cancelled.</p>
      </section>
    );
  }

  return (
    <section className="card job-panel">
      <p className="status-text notice-error">{job.error ?? 'Diagram generation failed.'}</p>
      <p className="small-text">Adjust the text or caption and try again.</p>
    </section>
  );
};
