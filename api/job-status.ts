import { type ApiRequest, type ApiResponse, type RequestContext, queryParam } from './lib/http';

/**
 * Job status for polling clients. Only the session that started a job can see it.
 */
export default async function handler(req: ApiRequest, res: ApiResponse, ctx: RequestContext): Promise<void> {
  if (req.method !== 'GET') {
    res.status(405).json({ error: 'Method not allowed. Use GET.' });
    return;
  }

  const jobId = queryParam(req, 'job_id');

  if (!jobId) {
    res.status(400).json({
      error: 'Missing or invalid job_id parameter',
    });
    return;
  }

  const job = ctx.services.jobs.getJob(jobId);

  if (!job || job.sessionId !== ctx.session.id) {
    res.status(404).json({
      error: 'Job not found',
      job_id: jobId,
    });
    return;
  }

  const response: Record<string, unknown> = {
    job_id: job.id,
    status: job.status,
    created_at: job.createdAt,
    updated_at: job.updatedAt,
  };

  if (job.status === 'done' && job.output) {
    response.output = {
      image_url: `/api/image?job_id=${job.id}`,
      download_url: `/api/image?job_id=${job.id}&download=1`,
    };
  }

  if (job.status === 'error' && job.error) {
    response.error = job.error;
    response.error_code = job.errorCode;
  }

  res.status(200).json(response);
}
