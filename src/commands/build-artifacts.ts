import chalk from 'chalk';
import { Command } from 'commander';
import { CollectOptionsSchema } from '../types/index.js';
import { ArtifactCollector } from '../core/artifact-collector.js';
import { Logger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { formatIssues } from './options.js';

export interface BuildArtifactsFlags {
  workflowsDir: string;
  outputDir: string;
  dryRun?: boolean;
  verbose?: number;
}

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export const buildArtifactsCommand = async (flags: BuildArtifactsFlags): Promise<number> => {
  const parsed = CollectOptionsSchema.safeParse(flags);
  if (!parsed.success) {
    console.error(chalk.red(`[ERROR] Invalid options: ${formatIssues(parsed.error)}`));
    return 2;
  }

  const options = parsed.data;
  const collector = new ArtifactCollector(options, new Logger(options.verbose));

  try {
    return await collector.run();
  } catch (err) {
    console.error(chalk.red(`[ERROR] Artifact collection failed: ${errorMessage(err)}`));
    return 1;
  }
};

export function createBuildArtifactsProgram(
  onExit: (code: number) => void = code => { process.exitCode = code; },
): Command {
  return new Command()
    .name('build-workflow-artifacts')
    .description('Replicate workflows tree and collect key artifacts')
    .requiredOption('--workflows-dir <dir>', 'Path to the source workflows directory')
    .requiredOption('--output-dir <dir>', 'Path to the output directory')
    .option('--dry-run', 'Show what would be done without writing files', false)
    .option('-v, --verbose', 'Increase verbosity (use -vv for more)', increaseVerbosity, 0)
    .action(async (flags: BuildArtifactsFlags) => {
      onExit(await buildArtifactsCommand(flags));
    });
}
