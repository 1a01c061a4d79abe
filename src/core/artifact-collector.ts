import fs from 'fs/promises';
import path from 'path';
import type { CollectOptions, CollectSummary, JobMapping } from '../types/index.js';
import { errorMessage } from './errors.js';
import {
  atomicWrite,
  copyFilePreserving,
  copyTreePreserving,
  isDirectory,
  isFile,
} from './fs-utils.js';
import { Logger } from './logger.js';
import { readTestsJobMapping, renderJobYaml } from './job-extractor.js';
import { findGaFiles, findTestsFiles, pickMatchingTests, stemOf } from './test-matcher.js';

export type { CollectSummary } from '../types/index.js';

export const README_NAME = 'README.md';
export const TEST_DATA_DIRS = ['test_data', 'test-data'] as const;

export class ArtifactCollector {
  private summary: CollectSummary = emptySummary();
  private warningsAtStart = 0;

  constructor(
    private readonly options: CollectOptions,
    private readonly logger: Logger = new Logger(options.verbose),
  ) {}

  /**
   * Mirror the workflows tree into the output directory and collect each
   * workflow's artifacts. Returns the process exit code.
   */
  async run(): Promise<number> {
    const { workflowsDir, outputDir } = this.options;

    if (!(await isDirectory(workflowsDir))) {
      this.logger.error(`Workflows directory does not exist or is not a directory: ${workflowsDir}`);
      return 2;
    }
    if (workflowsDir === outputDir) {
      this.logger.error(`Refusing to write into the workflows directory itself; choose a different --output-dir: ${outputDir}`);
      return 2;
    }

    this.summary = emptySummary();
    this.warningsAtStart = this.logger.counts.WARN;
    this.logger.info(`Replicating structure from ${workflowsDir} -> ${outputDir}`);

    for await (const srcDir of this.walk(workflowsDir)) {
      const dstDir = path.join(outputDir, path.relative(workflowsDir, srcDir));
      await this.processDirectory(srcDir, dstDir);
    }

    const { directories, filesCopied, treesCopied, jobFiles } = this.summary;
    this.logger.info(
      `Processed ${directories} directories: ${filesCopied} files, ${treesCopied} test data trees, ${jobFiles} job files`,
      1,
    );
    this.logger.info('Done');
    return 0;
  }

  getSummary(): CollectSummary {
    return { ...this.summary, warnings: this.logger.counts.WARN - this.warningsAtStart };
  }

  /**
   * Top-down walk in name order. Each directory is listed before it is
   * handed out, symlinked directories are not followed, and an output
   * directory nested in the source tree is left out along with everything
   * below it.
   */
  private async *walk(dir: string): AsyncGenerator<string> {
    let subdirs: string[] = [];
    try {
      const entries = await fs.readdir(dir, { withFileTypes: true });
      subdirs = entries
        .filter(e => e.isDirectory())
        .map(e => path.join(dir, e.name))
        .filter(p => p !== this.options.outputDir)
        .sort();
    } catch (err) {
      this.logger.warn(`Cannot list directory ${dir}: ${errorMessage(err)}`);
    }

    yield dir;

    for (const subdir of subdirs) {
      yield* this.walk(subdir);
    }
  }

  async processDirectory(srcDir: string, dstDir: string): Promise<void> {
    this.summary.directories++;

    // Every source directory gets a counterpart, copied files or not
    await this.ensureDir(dstDir);

    const readme = path.join(srcDir, README_NAME);
    if (await isFile(readme)) {
      await this.copyFile(readme, path.join(dstDir, README_NAME));
    }

    for (const name of TEST_DATA_DIRS) {
      const testDataSrc = path.join(srcDir, name);
      if (await isDirectory(testDataSrc)) {
        await this.copyTree(testDataSrc, path.join(dstDir, name));
      }
    }

    let gaFiles: string[];
    let testsFiles: string[];
    try {
      gaFiles = await findGaFiles(srcDir);
      testsFiles = await findTestsFiles(srcDir);
    } catch (err) {
      this.logger.warn(`Cannot scan ${srcDir} for workflows: ${errorMessage(err)}`);
      return;
    }

    for (const ga of gaFiles) {
      await this.copyFile(ga, path.join(dstDir, path.basename(ga)));
    }

    for (const ga of gaFiles) {
      const matchedTests = pickMatchingTests(ga, testsFiles) ?? testsFiles[0];
      if (!matchedTests) {
        this.logger.info(`No tests YAML found for ${ga}`, 1);
        continue;
      }

      const job = await readTestsJobMapping(matchedTests, this.logger);
      if (!job || job.items.length === 0) {
        this.logger.info(`No 'job' mapping found in ${matchedTests}`, 1);
        continue;
      }

      await this.writeJobYaml(job, path.join(dstDir, `${stemOf(ga)}.yml`));
    }
  }

  // ─── Filesystem actions (dry-run aware) ───

  private async ensureDir(dir: string): Promise<void> {
    if (this.options.dryRun) {
      this.logger.info(`Would create directory: ${dir}`, 1);
      return;
    }
    try {
      await fs.mkdir(dir, { recursive: true });
    } catch (err) {
      this.logger.warn(`Failed to create directory ${dir}: ${errorMessage(err)}`);
    }
  }

  private async copyFile(src: string, dst: string): Promise<void> {
    if (this.options.dryRun) {
      this.logger.info(`Would copy ${src} -> ${dst}`);
      this.summary.filesCopied++;
      return;
    }
    try {
      await copyFilePreserving(src, dst);
      this.summary.filesCopied++;
      this.logger.info(`Copied ${src} -> ${dst}`, 1);
    } catch (err) {
      this.logger.warn(`Failed to copy ${src}: ${errorMessage(err)}`);
    }
  }

  private async copyTree(srcDir: string, dstDir: string): Promise<void> {
    if (this.options.dryRun) {
      this.logger.info(`Would copy directory ${srcDir} -> ${dstDir}`);
      this.summary.treesCopied++;
      return;
    }
    try {
      await copyTreePreserving(srcDir, dstDir);
      this.summary.treesCopied++;
      this.logger.info(`Copied directory ${srcDir} -> ${dstDir}`, 1);
    } catch (err) {
      this.logger.warn(`Failed to copy directory ${srcDir}: ${errorMessage(err)}`);
    }
  }

  private async writeJobYaml(job: JobMapping, outPath: string): Promise<void> {
    if (this.options.dryRun) {
      this.logger.info(`Would write job YAML to ${outPath}`);
      this.summary.jobFiles++;
      return;
    }
    try {
      await atomicWrite(outPath, renderJobYaml(job));
      this.summary.jobFiles++;
      this.logger.info(`Wrote job YAML: ${outPath}`, 1);
    } catch (err) {
      this.logger.warn(`Failed to write job YAML ${outPath}: ${errorMessage(err)}`);
    }
  }
}

function emptySummary(): CollectSummary {
  return { directories: 0, filesCopied: 0, treesCopied: 0, jobFiles: 0, warnings: 0 };
}

/** Run a collection pass and return its exit code and summary. */
export async function collectArtifacts(
  options: CollectOptions,
  logger: Logger = new Logger(options.verbose),
): Promise<{ exitCode: number; summary: CollectSummary }> {
  const collector = new ArtifactCollector(options, logger);
  const exitCode = await collector.run();
  return { exitCode, summary: collector.getSummary() };
}
