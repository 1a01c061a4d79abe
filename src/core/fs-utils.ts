import fs from 'fs/promises';
import path from 'path';
import { randomBytes } from 'crypto';

/**
 * Write a file via a sibling temp file and rename, so an interrupted run
 * never leaves a half-written job file behind.
 */
export async function atomicWrite(filePath: string, content: string): Promise<void> {
  const dir = path.dirname(filePath);
  const tmpFile = path.join(dir, `.${path.basename(filePath)}.${randomBytes(4).toString('hex')}.tmp`);

  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(tmpFile, content, 'utf8');

  try {
    await fs.rename(tmpFile, filePath);
  } catch (err) {
    await fs.rm(tmpFile, { force: true });
    throw err;
  }
}

export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/** True for directories, following symlinks like a plain `stat`. */
export async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

/** True for regular files, following symlinks like a plain `stat`. */
export async function isFile(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isFile();
  } catch {
    return false;
  }
}

/** Copy one file, keeping its timestamps. */
export async function copyFilePreserving(src: string, dst: string): Promise<void> {
  await fs.mkdir(path.dirname(dst), { recursive: true });
  await fs.copyFile(src, dst);
  const { atime, mtime } = await fs.stat(src);
  await fs.utimes(dst, atime, mtime);
}

/** Recursive copy that merges into an existing destination. */
export async function copyTreePreserving(srcDir: string, dstDir: string): Promise<void> {
  await fs.mkdir(path.dirname(dstDir), { recursive: true });
  await fs.cp(srcDir, dstDir, { recursive: true, force: true, preserveTimestamps: true });
}
