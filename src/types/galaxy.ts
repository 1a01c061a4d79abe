import { z } from 'zod';

// ─── Galaxy API Payloads ───

export const JobSummarySchema = z.object({
  id: z.string(),
  state: z.string().optional(),
  tool_id: z.string().optional(),
}).passthrough();

export const JobListSchema = z.array(JobSummarySchema);

export const JobDetailSchema = z.object({
  id: z.string(),
  state: z.string().optional(),
  tool_id: z.string().optional(),
  copied_from_job_id: z.string().nullable(),
}).passthrough();

export const ApiErrorBodySchema = z.object({
  err_msg: z.string(),
  err_code: z.number().optional(),
});

export type JobSummary = z.infer<typeof JobSummarySchema>;
export type JobDetail = z.infer<typeof JobDetailSchema>;

export interface CopiedJobCount {
  copied: number;
  total: number;
  invocationId: string;
}

export interface CacheCheckResult {
  invocationId: string;
  rerunInvocationId: string;
  copied: number;
  total: number;
  success: boolean;
}
