import fs from 'fs/promises';
import path from 'path';

export const WORKFLOW_EXTENSION = '.ga';
export const TEST_SUFFIXES = ['-test.yml', '-tests.yml'] as const;

async function listFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isFile()) {
      files.push(fullPath);
    } else if (entry.isSymbolicLink()) {
      // Links count when they point at a regular file
      const stat = await fs.stat(fullPath).catch(() => null);
      if (stat?.isFile()) files.push(fullPath);
    }
  }
  return files.sort();
}

/** Workflow definitions (`*.ga`, case-sensitive) directly inside `dir`. */
export async function findGaFiles(dir: string): Promise<string[]> {
  const files = await listFiles(dir);
  return files.filter(f => path.extname(f) === WORKFLOW_EXTENSION);
}

/** Planemo test descriptions (`*-test.yml` / `*-tests.yml`) directly inside `dir`. */
export async function findTestsFiles(dir: string): Promise<string[]> {
  const files = await listFiles(dir);
  return files.filter(f => {
    const lowerName = path.basename(f).toLowerCase();
    if (path.extname(lowerName) !== '.yml') return false;
    return TEST_SUFFIXES.some(suffix => lowerName.endsWith(suffix));
  });
}

/** File name without its last extension. */
export function stemOf(filePath: string): string {
  const base = path.basename(filePath);
  return base.slice(0, base.length - path.extname(base).length);
}

function normalizeName(name: string): string {
  return name.replace(/-/g, '_').toLowerCase();
}

function commonPrefixLength(a: string, b: string): number {
  const max = Math.min(a.length, b.length);
  let i = 0;
  while (i < max && a[i] === b[i]) i++;
  return i;
}

/**
 * Name similarity between two file stems: higher is better.
 * Hyphens and underscores are treated alike and case is ignored; an exact
 * match earns 10 points on top of the shared prefix length.
 */
export function similarityScore(a: string, b: string): number {
  const aNorm = normalizeName(a);
  const bNorm = normalizeName(b);

  let score = 0;
  if (aNorm === bNorm) score += 10;
  score += commonPrefixLength(aNorm, bNorm);
  return score;
}

/**
 * Choose the tests file for a workflow. With several candidates the best
 * scoring stem wins; ties go to the earliest candidate.
 */
export function pickMatchingTests(gaPath: string, testsFiles: readonly string[]): string | null {
  if (testsFiles.length === 0) return null;
  if (testsFiles.length === 1) return testsFiles[0];

  const gaStem = stemOf(gaPath);
  let best = testsFiles[0];
  let bestScore = similarityScore(gaStem, stemOf(best));

  for (const candidate of testsFiles.slice(1)) {
    const score = similarityScore(gaStem, stemOf(candidate));
    if (score > bestScore) {
      best = candidate;
      bestScore = score;
    }
  }
  return best;
}
