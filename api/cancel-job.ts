import { z } from 'zod';
import { logger } from '../src/utils/logger';
import { type ApiRequest, type ApiResponse, type RequestContext, redirectHome, wantsJson } from './lib/http';

const CancelJobSchema = z.object({
  job_id: z.string().optional(),
});

export default async function handler(req: ApiRequest, res: ApiResponse, ctx: RequestContext): Promise<void> {
  if (req.method !== 'POST') {
    res.status(405).json({ error: 'Method not allowed' });
    return;
  }

  const { session, services } = ctx;
  const parsed = CancelJobSchema.safeParse(req.body ?? {});
  const jobId = (parsed.success ? parsed.data.job_id : undefined) ?? session.get('currentJobId');

  const job = jobId ? services.jobs.getJob(jobId) : null;

  // Someone else's job, or none at all: nothing to do
  if (!job || job.sessionId !== session.id) {
    if (wantsJson(req)) {
      res.status(404).json({ error: 'Job not found' });
    } else {
      redirectHome(res);
    }
    return;
  }

  const cancelled = services.jobs.cancelJob(job.id);
  if (cancelled) {
    logger.log(`[session ${session.id.slice(0, 8)}] cancelled job ${job.id}`);
  }

  if (wantsJson(req)) {
    res.status(200).json({ success: cancelled, job_id: job.id });
  } else {
    redirectHome(res);
  }
}
