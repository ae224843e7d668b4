/**
 * Output Writer
 *
 * One pretty-printed JSON file per extracted document, written atomically.
 */

import fs from 'fs';
import path from 'path';
import {
  IOError,
  getMetrics,
  logger,
  serializeError,
  systemErrorCode,
  type DocumentRef,
  type ExtractionRecord,
} from '@invoice-digest/shared';

function firstFreeName(doc: DocumentRef, preferred: string, taken: Set<string>): string {
  for (const candidate of [preferred, `${doc.id}.json`]) {
    if (!taken.has(candidate.toLowerCase())) {
      return candidate;
    }
  }
  let suffix = 2;
  while (taken.has(`${doc.id}.${suffix}.json`.toLowerCase())) {
    suffix++;
  }
  return `${doc.id}.${suffix}.json`;
}

/**
 * Output file name for every document of a run, keyed by document ID.
 *
 * Normally the stem plus .json (invoice_001.pdf -> invoice_001.json). Documents
 * whose stems collide (compared case-insensitively, as some filesystems do)
 * keep their full file name instead (a.pdf -> a.pdf.json, a.png -> a.png.json).
 * A name already taken by an earlier document (a.txt.md after a.txt and a.md)
 * falls back to the full file name, then to a numbered suffix.
 */
export function planOutputNames(documents: DocumentRef[]): Map<string, string> {
  const stemCounts = new Map<string, number>();
  for (const doc of documents) {
    const key = doc.stem.toLowerCase();
    stemCounts.set(key, (stemCounts.get(key) ?? 0) + 1);
  }

  const taken = new Set<string>();
  const names = new Map<string, string>();
  for (const doc of documents) {
    const collides = (stemCounts.get(doc.stem.toLowerCase()) ?? 0) > 1;
    const name = firstFreeName(doc, collides ? `${doc.id}.json` : `${doc.stem}.json`, taken);
    taken.add(name.toLowerCase());
    names.set(doc.id, name);
  }
  return names;
}

/**
 * Create the output directory (and parents) if needed
 */
export async function prepareOutputDir(directory: string): Promise<void> {
  try {
    await fs.promises.mkdir(directory, { recursive: true });
  } catch (error) {
    throw new IOError(
      `Cannot create output directory ${directory} (${systemErrorCode(error) ?? 'unknown error'})`,
      directory,
      { cause: error }
    );
  }
}

/**
 * Write a file through a temporary sibling and a rename, so readers never
 * see a partially written file under the final name.
 */
async function writeFileAtomic(target: string, content: string): Promise<void> {
  const tempPath = path.join(
    path.dirname(target),
    `.${path.basename(target)}.${process.pid}.tmp`
  );

  try {
    await fs.promises.writeFile(tempPath, content, 'utf-8');
    await fs.promises.rename(tempPath, target);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warn('Could not remove temporary file', {
        path: tempPath,
        error: serializeError(cleanupError),
      });
    });
    throw new IOError(
      `Cannot write ${target} (${systemErrorCode(error) ?? 'unknown error'})`,
      target,
      { cause: error }
    );
  }
}

/**
 * Serialize an extracted record to <outputDir>/<fileName>, replacing any
 * existing file. Returns the path written.
 */
export async function writeResult(
  outputDir: string,
  fileName: string,
  record: ExtractionRecord
): Promise<string> {
  const target = path.join(outputDir, fileName);
  await writeFileAtomic(target, `${JSON.stringify(record, null, 2)}\n`);

  logger.info('Wrote extraction result', { output_path: target });
  return target;
}

/**
 * Dump the run's metrics in Prometheus text format (textfile collector)
 */
export async function writeMetricsSnapshot(metricsPath: string): Promise<void> {
  const directory = path.dirname(metricsPath);
  try {
    await fs.promises.mkdir(directory, { recursive: true });
  } catch (error) {
    throw new IOError(
      `Cannot create metrics directory ${directory} (${systemErrorCode(error) ?? 'unknown error'})`,
      directory,
      { cause: error }
    );
  }
  await writeFileAtomic(metricsPath, await getMetrics());
  logger.debug('Wrote metrics snapshot', { path: metricsPath });
}
