import { z } from 'zod';
import {
  ApiErrorBodySchema,
  JobDetailSchema,
  JobListSchema,
  type CopiedJobCount,
  type JobDetail,
  type JobSummary,
} from '../types/index.js';
import { ApiError } from './errors.js';

export type QueryParams = Record<string, string | number | boolean>;

/**
 * Minimal Galaxy REST client covering the job endpoints the cache check
 * needs. Authenticates with the user's API key in the `x-api-key` header.
 */
export class GalaxyClient {
  readonly url: string;
  private readonly key: string;

  constructor(url: string, key: string) {
    // Keep a trailing slash so relative endpoints resolve below a sub-path install
    this.url = url.endsWith('/') ? url : `${url}/`;
    this.key = key;
  }

  async makeGetRequest<S extends z.ZodTypeAny>(
    endpoint: string,
    schema: S,
    params: QueryParams = {},
  ): Promise<z.infer<S>> {
    const target = new URL(endpoint, this.url);
    for (const [name, value] of Object.entries(params)) {
      target.searchParams.set(name, String(value));
    }

    const response = await fetch(target, {
      headers: { 'x-api-key': this.key, accept: 'application/json' },
    });

    if (response.status !== 200) {
      throw new ApiError(await readErrorMessage(response), response.status);
    }

    return schema.parse(await response.json());
  }

  async getJobs(params: QueryParams = {}): Promise<JobSummary[]> {
    return this.makeGetRequest('api/jobs', JobListSchema, params);
  }

  async getJobById(jobId: string): Promise<JobDetail> {
    return this.makeGetRequest(`api/jobs/${encodeURIComponent(jobId)}`, JobDetailSchema);
  }
}

async function readErrorMessage(response: Response): Promise<string> {
  const fallback = `HTTP ${response.status}: ${response.statusText}`;
  try {
    const parsed = ApiErrorBodySchema.safeParse(await response.json());
    return parsed.success ? parsed.data.err_msg : fallback;
  } catch {
    return fallback;
  }
}

// ─── Invocation helpers ───

/** Full job records of an invocation, fetched one by one. */
export async function getInvocationJobs(client: GalaxyClient, invocationId: string): Promise<JobDetail[]> {
  const jobs = await client.getJobs({ invocation_id: invocationId });
  const details: JobDetail[] = [];
  for (const job of jobs) {
    details.push(await client.getJobById(job.id));
  }
  return details;
}

export async function countCopiedInvocationJobs(client: GalaxyClient, invocationId: string): Promise<CopiedJobCount> {
  const jobs = await getInvocationJobs(client, invocationId);
  const copied = jobs.filter(job => job.copied_from_job_id !== null).length;
  return { copied, total: jobs.length, invocationId };
}

/** True when every job of the invocation was served from the job cache. */
export async function invocationJobsAreCopied(client: GalaxyClient, invocationId: string): Promise<boolean> {
  const { copied, total } = await countCopiedInvocationJobs(client, invocationId);
  return copied === total;
}
