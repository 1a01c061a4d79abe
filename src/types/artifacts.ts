import type { YAMLMap } from 'yaml';

// ─── Artifact Types ───

/** The `job` mapping node of a tests file, kept as parsed. */
export type JobMapping = YAMLMap<unknown, unknown>;

export interface CollectSummary {
  directories: number;
  filesCopied: number;
  treesCopied: number;
  jobFiles: number;
  warnings: number;
}
