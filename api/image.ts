import { logger } from '../src/utils/logger';
import { downloadFileName } from './lib/jobs';
import { type ApiRequest, type ApiResponse, type RequestContext, queryParam, redirectHome } from './lib/http';
import { allows, resolveView } from './lib/viewRouter';

/**
 * Serves a finished job's image inline, or as a PNG download with ?download=1.
 */
export default async function handler(req: ApiRequest, res: ApiResponse, ctx: RequestContext): Promise<void> {
  if (req.method !== 'GET') {
    res.status(405).json({ error: 'Method not allowed. Use GET.' });
    return;
  }

  const { session, services } = ctx;

  if (!allows(resolveView(session, services.now()), 'view-image')) {
    redirectHome(res);
    return;
  }

  const jobId = queryParam(req, 'job_id');
  const job = jobId ? services.jobs.getJob(jobId) : null;

  if (!job || job.sessionId !== session.id || job.status !== 'done' || !job.output) {
    res.status(404).json({ error: 'Image not found' });
    return;
  }

  const onError = (error?: Error) => {
    if (error) {
      logger.error(`Failed to send image for job ${job.id}:`, error.message);
    }
  };

  res.setHeader('Cache-Control', 'private, no-store');

  if (queryParam(req, 'download') === '1') {
    res.download(job.output.imagePath, downloadFileName(job.request), onError);
  } else {
    res.sendFile(job.output.imagePath, onError);
  }
}
