import chalk from 'chalk';
import { Command } from 'commander';
import { CheckCacheOptionsSchema, DEFAULT_GALAXY_URL, type CacheCheckResult } from '../types/index.js';
import { runWorkflowAndCheckCache, type CacheCheckDeps } from '../core/cache-checker.js';
import { ApiError, errorMessage } from '../core/errors.js';
import { formatIssues } from './options.js';

export interface CheckInvocationFlags {
  galaxy_url?: string;
  galaxy_user_key: string;
}

export const checkInvocationCommand = async (
  workflowFile: string,
  jobFile: string,
  flags: CheckInvocationFlags,
  deps: CacheCheckDeps = {},
): Promise<number> => {
  const parsed = CheckCacheOptionsSchema.safeParse({
    workflowFile,
    jobFile,
    galaxyUrl: flags.galaxy_url,
    galaxyUserKey: flags.galaxy_user_key,
  });
  if (!parsed.success) {
    console.error(chalk.red(`Invalid options: ${formatIssues(parsed.error)}`));
    return 1;
  }

  console.log(chalk.bold('--- Running initial workflow ---'));

  let result: CacheCheckResult;
  try {
    result = await runWorkflowAndCheckCache(parsed.data, deps);
  } catch (err) {
    if (err instanceof ApiError) {
      console.error(chalk.red(`An API error occurred: ${err.message}`));
    } else {
      console.error(chalk.red(errorMessage(err)));
    }
    return 1;
  }

  console.log(`Successfully extracted Invocation ID: ${result.invocationId}`);
  console.log(chalk.bold('\n--- Rerunning workflow from cache ---'));
  console.log(`Successfully extracted Rerun Invocation ID: ${result.rerunInvocationId}`);

  console.log(chalk.bold('\n--- Verifying cached jobs ---'));
  console.log(`Copied jobs: ${result.copied} / ${result.total}`);
  if (result.success) {
    console.log(chalk.green('Success: The rerun invocation consists of copied (cached) jobs.'));
  } else {
    console.log(chalk.yellow('Failure: The rerun invocation does not consist of entirely copied jobs.'));
  }
  return 0;
};

export function createCheckInvocationProgram(
  onExit: (code: number) => void = code => { process.exitCode = code; },
  deps: CacheCheckDeps = {},
): Command {
  return new Command()
    .name('check-invocation-cache')
    .description('Run a Galaxy workflow and check for cached jobs on rerun.')
    .argument('<workflow_file>', 'Path to the workflow file (.ga)')
    .argument('<job_file>', 'Path to the job definition file (.yml)')
    .option('--galaxy_url <url>', 'URL of the Galaxy instance.', DEFAULT_GALAXY_URL)
    .requiredOption('--galaxy_user_key <key>', 'API key for the Galaxy user.')
    .action(async (workflowFile: string, jobFile: string, flags: CheckInvocationFlags) => {
      onExit(await checkInvocationCommand(workflowFile, jobFile, flags, deps));
    });
}
