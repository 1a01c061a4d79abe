import chalk from 'chalk';
import type { CacheCheckResult, CommandRunner } from '../types/index.js';
import { CommandFailedError, ProcessRunner } from './command-runner.js';
import { errorCode, errorMessage, InvocationNotFoundError } from './errors.js';
import { countCopiedInvocationJobs, GalaxyClient } from './galaxy-client.js';

export type { CacheCheckResult } from '../types/index.js';

const INVOCATION_PATTERN = /Invocation <([^>]+)>/;

export const PLANEMO = 'planemo';

export interface CacheCheckRequest {
  workflowFile: string;
  jobFile: string;
  galaxyUrl: string;
  galaxyUserKey: string;
}

export interface CacheCheckDeps {
  runner?: CommandRunner;
  client?: GalaxyClient;
}

/** First `Invocation <ID>` reported in a planemo transcript. */
export function parseInvocationId(output: string): string | null {
  const match = output.match(INVOCATION_PATTERN);
  return match ? match[1] : null;
}

/**
 * The current environment without PYTHONPATH, which would leak this
 * process's Python path into planemo's own virtualenv.
 */
export function planemoEnv(base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const env = { ...base };
  delete env.PYTHONPATH;
  return env;
}

/**
 * Run a planemo command and pull the invocation ID out of its output.
 * Planemo logs to stderr, so both streams are searched. Failures are
 * reported on stderr and give null.
 */
export async function runPlanemoAndGetInvocationId(
  command: string[],
  runner: CommandRunner = new ProcessRunner(),
): Promise<string | null> {
  try {
    const { stdout, stderr } = await runner.run(command, planemoEnv());
    const output = stdout + stderr;

    const invocationId = parseInvocationId(output);
    if (invocationId) return invocationId;

    console.error(chalk.red('Error: Invocation ID not found in the output.'));
    console.error('Full output:', output);
    return null;
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      console.error(chalk.red(`Error: The command '${command[0]}' was not found.`));
      console.error(`Please ensure that '${PLANEMO}' is in your system's PATH.`);
    } else if (err instanceof CommandFailedError) {
      console.error(chalk.red(`Error executing command: ${err.message}`));
      console.error(`Return code: ${err.result.exitCode}`);
      console.error(`Output:\n${err.result.stdout}${err.result.stderr}`);
    } else {
      console.error(chalk.red(`An unexpected error occurred: ${errorMessage(err)}`));
    }
    return null;
  }
}

export function planemoRunCommand(req: CacheCheckRequest): string[] {
  return [
    PLANEMO, 'run',
    req.workflowFile,
    req.jobFile,
    '--galaxy_url', req.galaxyUrl,
    '--galaxy_user_key', req.galaxyUserKey,
  ];
}

export function planemoRerunCommand(req: CacheCheckRequest, invocationId: string): string[] {
  return [
    PLANEMO, 'rerun',
    '--use_cache',
    '--invocation', invocationId,
    '--galaxy_url', req.galaxyUrl,
    '--galaxy_user_key', req.galaxyUserKey,
  ];
}

/**
 * Run a workflow, rerun it with the job cache enabled, and count how many
 * of the rerun's jobs were copied from earlier ones.
 *
 * Throws `InvocationNotFoundError` when either run yields no invocation, and
 * `ApiError` when Galaxy rejects a job query. `success` holds when the rerun
 * has jobs and all of them were copied.
 */
export async function runWorkflowAndCheckCache(
  req: CacheCheckRequest,
  deps: CacheCheckDeps = {},
): Promise<CacheCheckResult> {
  const runner = deps.runner ?? new ProcessRunner();

  const invocationId = await runPlanemoAndGetInvocationId(planemoRunCommand(req), runner);
  if (!invocationId) {
    throw new InvocationNotFoundError('Could not get invocation ID from the initial run.');
  }

  const rerunInvocationId = await runPlanemoAndGetInvocationId(planemoRerunCommand(req, invocationId), runner);
  if (!rerunInvocationId) {
    throw new InvocationNotFoundError('Could not get invocation ID from the rerun.');
  }

  const client = deps.client ?? new GalaxyClient(req.galaxyUrl, req.galaxyUserKey);
  const { copied, total } = await countCopiedInvocationJobs(client, rerunInvocationId);

  return {
    invocationId,
    rerunInvocationId,
    copied,
    total,
    success: copied === total && total > 0,
  };
}
