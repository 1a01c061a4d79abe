export * from './types/index.js';
export { ArtifactCollector, collectArtifacts, README_NAME, TEST_DATA_DIRS } from './core/artifact-collector.js';
export { findGaFiles, findTestsFiles, pickMatchingTests, similarityScore, stemOf } from './core/test-matcher.js';
export { extractJob, readTestsJobMapping, renderJobYaml } from './core/job-extractor.js';
export { Logger, type LogLevel, type LogOptions } from './core/logger.js';
export {
  GalaxyClient,
  getInvocationJobs,
  countCopiedInvocationJobs,
  invocationJobsAreCopied,
  type QueryParams,
} from './core/galaxy-client.js';
export {
  parseInvocationId,
  planemoEnv,
  runPlanemoAndGetInvocationId,
  runWorkflowAndCheckCache,
  type CacheCheckRequest,
  type CacheCheckDeps,
} from './core/cache-checker.js';
export { ProcessRunner, CommandFailedError } from './core/command-runner.js';
export { ApiError, InvocationNotFoundError, errorMessage } from './core/errors.js';
