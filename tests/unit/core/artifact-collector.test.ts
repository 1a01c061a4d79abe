import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import YAML from 'yaml';
import { ArtifactCollector, collectArtifacts } from '../../../src/core/artifact-collector.js';
import { Logger } from '../../../src/core/logger.js';
import type { CollectOptions } from '../../../src/types/index.js';

// ─── Helpers ───

const CHIPSEQ_TESTS = [
  '- doc: Test paired-end ChIP-seq',
  '  job:',
  '    reads:',
  '      class: File',
  '      path: test-data/reads.fastq',
  '    genome: hg38',
  '  outputs:',
  '    peaks:',
  '      path: test-data/peaks.bed',
  '',
].join('\n');

async function write(file: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content, 'utf8');
}

async function exists(p: string): Promise<boolean> {
  return fs.access(p).then(() => true).catch(() => false);
}

/**
 * workflows/
 *   epigenetics/chipseq/  README, chipseq-pe.ga, tests, test-data/nested
 *   epigenetics/empty/
 *   misc/notes.txt
 */
async function setupWorkflows(root: string): Promise<void> {
  const chipseq = path.join(root, 'epigenetics', 'chipseq');
  await write(path.join(chipseq, 'README.md'), '# ChIP-seq\n');
  await write(path.join(chipseq, 'chipseq-pe.ga'), '{"name": "chipseq-pe"}');
  await write(path.join(chipseq, 'chipseq-pe-tests.yml'), CHIPSEQ_TESTS);
  await write(path.join(chipseq, 'test-data', 'reads.fastq'), '@read1\nACGT\n');
  await write(path.join(chipseq, 'test-data', 'nested', 'peaks.bed'), 'chr1\t1\t2\n');
  await fs.mkdir(path.join(root, 'epigenetics', 'empty'), { recursive: true });
  await write(path.join(root, 'misc', 'notes.txt'), 'not an artifact');
}

describe('ArtifactCollector', () => {
  let tempDir: string;
  let workflowsDir: string;
  let outputDir: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  function options(overrides: Partial<CollectOptions> = {}): CollectOptions {
    return { workflowsDir, outputDir, dryRun: false, verbose: 0, ...overrides };
  }

  function loggedLines(): string[] {
    return logSpy.mock.calls.map(call => String(call[0]));
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wf-collector-test-'));
    workflowsDir = path.join(tempDir, 'workflows');
    outputDir = path.join(tempDir, 'out');
    await fs.mkdir(workflowsDir);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should mirror every source directory', async () => {
    await setupWorkflows(workflowsDir);

    const { exitCode } = await collectArtifacts(options());

    expect(exitCode).toBe(0);
    for (const rel of [
      '',
      'epigenetics',
      'epigenetics/chipseq',
      'epigenetics/chipseq/test-data',
      'epigenetics/chipseq/test-data/nested',
      'epigenetics/empty',
      'misc',
    ]) {
      expect(await exists(path.join(outputDir, rel))).toBe(true);
    }
  });

  it('should copy README, workflow definitions and test data', async () => {
    await setupWorkflows(workflowsDir);

    await collectArtifacts(options());

    const out = path.join(outputDir, 'epigenetics', 'chipseq');
    expect(await fs.readFile(path.join(out, 'README.md'), 'utf8')).toBe('# ChIP-seq\n');
    expect(await fs.readFile(path.join(out, 'chipseq-pe.ga'), 'utf8')).toBe('{"name": "chipseq-pe"}');
    expect(await fs.readFile(path.join(out, 'test-data', 'nested', 'peaks.bed'), 'utf8')).toBe('chr1\t1\t2\n');
    expect(await exists(path.join(out, 'chipseq-pe-tests.yml'))).toBe(false);
    expect(await exists(path.join(outputDir, 'misc', 'notes.txt'))).toBe(false);
  });

  it('should write the extracted job mapping next to the workflow', async () => {
    await setupWorkflows(workflowsDir);

    await collectArtifacts(options());

    const jobText = await fs.readFile(path.join(outputDir, 'epigenetics', 'chipseq', 'chipseq-pe.yml'), 'utf8');
    expect(YAML.parse(jobText)).toEqual({
      reads: { class: 'File', path: 'test-data/reads.fastq' },
      genome: 'hg38',
    });
  });

  it('should report a summary of the pass', async () => {
    await setupWorkflows(workflowsDir);

    const { summary } = await collectArtifacts(options());

    expect(summary).toEqual({
      directories: 7,
      filesCopied: 2,
      treesCopied: 1,
      jobFiles: 1,
      warnings: 0,
    });
  });

  it('should not produce job files for directories without workflows', async () => {
    await write(path.join(workflowsDir, 'docs', 'README.md'), '# Docs\n');
    await write(path.join(workflowsDir, 'docs', 'orphan-tests.yml'), 'job:\n  a: 1\n');

    const { exitCode, summary } = await collectArtifacts(options());

    expect(exitCode).toBe(0);
    expect(await fs.readdir(path.join(outputDir, 'docs'))).toEqual(['README.md']);
    expect(summary.jobFiles).toBe(0);
    expect(summary.warnings).toBe(0);
  });

  it('should pair each workflow with its closest tests file', async () => {
    const dir = path.join(workflowsDir, 'align');
    await write(path.join(dir, 'align-pe.ga'), '{}');
    await write(path.join(dir, 'align-se.ga'), '{}');
    await write(path.join(dir, 'align-pe-tests.yml'), '- job:\n    reads: pe\n');
    await write(path.join(dir, 'align-se-tests.yml'), '- job:\n    reads: se\n');

    await collectArtifacts(options());

    const out = path.join(outputDir, 'align');
    expect(YAML.parse(await fs.readFile(path.join(out, 'align-pe.yml'), 'utf8'))).toEqual({ reads: 'pe' });
    expect(YAML.parse(await fs.readFile(path.join(out, 'align-se.yml'), 'utf8'))).toEqual({ reads: 'se' });
  });

  it('should use a lone tests file whatever its name', async () => {
    const dir = path.join(workflowsDir, 'variant');
    await write(path.join(dir, 'main.ga'), '{}');
    await write(path.join(dir, 'zeta-test.yml'), 'job:\n  sample: s1\n');

    await collectArtifacts(options());

    const jobText = await fs.readFile(path.join(outputDir, 'variant', 'main.yml'), 'utf8');
    expect(jobText).toBe('sample: s1\n');
  });

  it('should write integer keys and large integers back unchanged', async () => {
    const dir = path.join(workflowsDir, 'seeded');
    await write(path.join(dir, 'seeded.ga'), '{}');
    await write(
      path.join(dir, 'seeded-tests.yml'),
      '- doc: t\n  job:\n    reads: r\n    0: first\n    seed: 12345678901234567890\n',
    );

    await collectArtifacts(options());

    const jobText = await fs.readFile(path.join(outputDir, 'seeded', 'seeded.yml'), 'utf8');
    expect(jobText).toBe('reads: r\n0: first\nseed: 12345678901234567890\n');
  });

  it('should skip job generation when the tests file has no job', async () => {
    const dir = path.join(workflowsDir, 'nojob');
    await write(path.join(dir, 'wf.ga'), '{}');
    await write(path.join(dir, 'wf-tests.yml'), '- doc: nothing to run\n');

    const { exitCode } = await collectArtifacts(options({ verbose: 1 }));

    expect(exitCode).toBe(0);
    expect(await exists(path.join(outputDir, 'nojob', 'wf.yml'))).toBe(false);
    expect(await exists(path.join(outputDir, 'nojob', 'wf.ga'))).toBe(true);
    expect(loggedLines()).toContain(`[INFO] No 'job' mapping found in ${path.join(dir, 'wf-tests.yml')}`);
  });

  it('should log a missing tests file at verbosity 1', async () => {
    const dir = path.join(workflowsDir, 'untested');
    await write(path.join(dir, 'wf.ga'), '{}');

    await collectArtifacts(options({ verbose: 1 }));

    expect(loggedLines()).toContain(`[INFO] No tests YAML found for ${path.join(dir, 'wf.ga')}`);
  });

  it('should warn and continue on unreadable tests YAML', async () => {
    const dir = path.join(workflowsDir, 'broken');
    await write(path.join(dir, 'wf.ga'), '{}');
    await write(path.join(dir, 'wf-tests.yml'), 'job: [unclosed\n');
    await setupWorkflows(workflowsDir);

    const { exitCode, summary } = await collectArtifacts(options());

    expect(exitCode).toBe(0);
    expect(await exists(path.join(outputDir, 'broken', 'wf.yml'))).toBe(false);
    expect(summary.jobFiles).toBe(1);
    expect(summary.warnings).toBe(1);
    expect(logSpy.mock.calls.flat().join(' ')).toContain('Failed to read tests YAML');
  });

  it('should leave the filesystem untouched on a dry run', async () => {
    await setupWorkflows(workflowsDir);

    const { exitCode, summary } = await collectArtifacts(options({ dryRun: true, verbose: 1 }));

    expect(exitCode).toBe(0);
    expect(await exists(outputDir)).toBe(false);
    expect(summary.jobFiles).toBe(1);

    const src = path.join(workflowsDir, 'epigenetics', 'chipseq');
    const dst = path.join(outputDir, 'epigenetics', 'chipseq');
    const lines = loggedLines();
    expect(lines).toContain(`[INFO] Would create directory: ${outputDir}`);
    expect(lines).toContain(`[INFO] Would copy ${path.join(src, 'README.md')} -> ${path.join(dst, 'README.md')}`);
    expect(lines).toContain(`[INFO] Would copy directory ${path.join(src, 'test-data')} -> ${path.join(dst, 'test-data')}`);
    expect(lines).toContain(`[INFO] Would write job YAML to ${path.join(dst, 'chipseq-pe.yml')}`);
  });

  it('should only log directory creation from verbosity 1 on a dry run', async () => {
    await setupWorkflows(workflowsDir);

    await collectArtifacts(options({ dryRun: true }));

    const lines = loggedLines();
    expect(lines.some(l => l.startsWith('[INFO] Would create directory'))).toBe(false);
    expect(lines[0]).toBe(`[INFO] Replicating structure from ${workflowsDir} -> ${outputDir}`);
    expect(lines[lines.length - 1]).toBe('[INFO] Done');
  });

  it('should exit with 2 when the workflows directory is missing', async () => {
    const collector = new ArtifactCollector(
      options({ workflowsDir: path.join(tempDir, 'nope') }),
      new Logger(0),
    );

    expect(await collector.run()).toBe(2);
    expect(errorSpy.mock.calls.flat().join(' ')).toContain('Workflows directory does not exist or is not a directory');
    expect(await exists(outputDir)).toBe(false);
  });

  it('should exit with 2 when the workflows path is a file', async () => {
    const file = path.join(tempDir, 'file.txt');
    await fs.writeFile(file, '');

    const { exitCode } = await collectArtifacts(options({ workflowsDir: file }));
    expect(exitCode).toBe(2);
  });

  it('should refuse to write into the workflows directory itself', async () => {
    const { exitCode } = await collectArtifacts(options({ outputDir: workflowsDir }));

    expect(exitCode).toBe(2);
    expect(errorSpy.mock.calls.flat().join(' ')).toContain(
      `Refusing to write into the workflows directory itself; choose a different --output-dir: ${workflowsDir}`,
    );
  });

  it('should walk the whole tree when the output directory is an ancestor of it', async () => {
    const nestedWorkflows = path.join(tempDir, 'src', 'workflows');
    await write(path.join(nestedWorkflows, 'a', 'b', 'x.ga'), '{}');

    const { exitCode, summary } = await collectArtifacts(options({
      workflowsDir: nestedWorkflows,
      outputDir: tempDir,
    }));

    expect(exitCode).toBe(0);
    expect(summary.directories).toBe(3);
    expect(summary.filesCopied).toBe(1);
    expect(await fs.readFile(path.join(tempDir, 'a', 'b', 'x.ga'), 'utf8')).toBe('{}');
  });

  it('should not walk an output directory nested in the source tree', async () => {
    await setupWorkflows(workflowsDir);
    const nestedOut = path.join(workflowsDir, '_out');

    await collectArtifacts(options({ outputDir: nestedOut }));
    const { summary } = await collectArtifacts(options({ outputDir: nestedOut }));

    expect(summary.directories).toBe(7);
    expect(await exists(path.join(nestedOut, '_out'))).toBe(false);
    expect(await exists(path.join(nestedOut, 'epigenetics', 'chipseq', 'chipseq-pe.yml'))).toBe(true);
  });

  it('should copy both test data directory spellings', async () => {
    const dir = path.join(workflowsDir, 'both');
    await write(path.join(dir, 'test_data', 'a.txt'), 'a');
    await write(path.join(dir, 'test-data', 'b.txt'), 'b');

    const { summary } = await collectArtifacts(options());

    expect(await fs.readFile(path.join(outputDir, 'both', 'test_data', 'a.txt'), 'utf8')).toBe('a');
    expect(await fs.readFile(path.join(outputDir, 'both', 'test-data', 'b.txt'), 'utf8')).toBe('b');
    expect(summary.treesCopied).toBe(2);
  });
});
