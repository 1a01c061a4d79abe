import fs from 'fs/promises';
import YAML, { isAlias, isCollection, isMap, isScalar, isSeq, visit, type Document } from 'yaml';
import type { JobMapping } from '../types/index.js';
import { errorMessage } from './errors.js';
import type { Logger } from './logger.js';

// Planemo and Galaxy read job files with a YAML 1.1 loader, so both ends
// stay on 1.1 to keep strings like "yes" or "on" quoted. Integers stay
// BigInt so seeds and counts above 2^53 are written back digit for digit.
const YAML_OPTIONS = { version: '1.1', intAsBigInt: true } as const;

function isEmptyNode(node: unknown): boolean {
  if (node === null || node === undefined) return true;
  if (isScalar(node)) {
    const { value } = node;
    return value === null || value === false || value === 0 || value === 0n || value === '';
  }
  if (isCollection(node)) return node.items.length === 0;
  return false;
}

/**
 * Pull the `job` node out of a parsed tests document.
 *
 * A sequence root is a list of test cases; the first case with a non-empty
 * `job` wins. A mapping root holds a single case. Aliases are followed.
 */
export function extractJob(doc: Document.Parsed): unknown {
  const root = doc.contents;
  let job: unknown = undefined;

  if (isSeq(root)) {
    for (const item of root.items) {
      if (isMap(item) && item.has('job')) {
        job = item.get('job', true);
        if (!isEmptyNode(job)) break;
      }
    }
  } else if (isMap(root)) {
    job = root.get('job', true);
  }

  return isAlias(job) ? job.resolve(doc) : job;
}

/**
 * Replace aliases inside a job with the nodes they point to and drop anchors,
 * so the job renders without the rest of its document.
 */
function inlineAliases(job: JobMapping, doc: Document.Parsed): void {
  const dropAnchor = (_: unknown, node: { anchor?: string }): void => {
    delete node.anchor;
  };
  visit(job, {
    Alias(_, alias, path) {
      const target = alias.resolve(doc);
      if (!target) throw new ReferenceError(`Unresolved alias *${alias.source}`);
      if (path.includes(target)) throw new ReferenceError(`Alias *${alias.source} refers to an enclosing node`);
      return target;
    },
  });
  // Anchors go only after every alias has been followed
  visit(job, { Map: dropAnchor, Seq: dropAnchor, Scalar: dropAnchor });
}

/**
 * Read a tests YAML file and return its `job` mapping node, or null when the
 * file cannot be read, does not parse, or holds no mapping under `job`.
 */
export async function readTestsJobMapping(testsPath: string, logger: Logger): Promise<JobMapping | null> {
  try {
    const content = await fs.readFile(testsPath, 'utf8');
    const doc = YAML.parseDocument(content, YAML_OPTIONS);
    if (doc.errors.length > 0) throw doc.errors[0];

    const job = extractJob(doc);
    if (!isMap(job)) return null;
    inlineAliases(job, doc);
    return job;
  } catch (err) {
    logger.warn(`Failed to read tests YAML ${testsPath}: ${errorMessage(err)}`);
    return null;
  }
}

/**
 * Block-style YAML of a job mapping. Keys, key types and scalar quoting are
 * kept as they were in the tests file.
 */
export function renderJobYaml(job: JobMapping): string {
  const doc = new YAML.Document(job, YAML_OPTIONS);
  visit(doc, {
    Map(_, node) { node.flow = false; },
    Seq(_, node) { node.flow = false; },
  });
  return doc.toString();
}
