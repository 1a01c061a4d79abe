import path from 'path';
import { z } from 'zod';

// ─── Artifact Collector Options ───

export const CollectOptionsSchema = z.object({
  workflowsDir: z.string().min(1).transform(p => path.resolve(p)),
  outputDir: z.string().min(1).transform(p => path.resolve(p)),
  dryRun: z.boolean().default(false),
  verbose: z.number().int().nonnegative().default(0),
});

// ─── Cache Checker Options ───

export const DEFAULT_GALAXY_URL = 'http://127.0.0.1:8080/';

export const CheckCacheOptionsSchema = z.object({
  workflowFile: z.string().min(1),
  jobFile: z.string().min(1),
  galaxyUrl: z.string().url().default(DEFAULT_GALAXY_URL),
  galaxyUserKey: z.string().min(1, 'Galaxy user key must not be empty'),
});

export type CollectOptions = z.infer<typeof CollectOptionsSchema>;
export type CheckCacheOptions = z.infer<typeof CheckCacheOptionsSchema>;
