/**
 * Document Enumeration
 *
 * Lists the invoice documents in the input directory as a one-shot snapshot.
 */

import fs from 'fs';
import path from 'path';
import {
  IOError,
  logger,
  systemErrorCode,
  type DocumentKind,
  type DocumentRef,
  type ImageMimeType,
} from '@invoice-digest/shared';

const IMAGE_MIME_TYPES: Record<string, ImageMimeType> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
  '.gif': 'image/gif',
};

const TEXT_EXTENSIONS = new Set(['.txt', '.md']);

export function imageMimeType(extension: string): ImageMimeType | undefined {
  return IMAGE_MIME_TYPES[extension];
}

export function kindForExtension(extension: string): DocumentKind {
  if (extension === '.pdf') return 'pdf';
  if (imageMimeType(extension)) return 'image';
  if (TEXT_EXTENSIONS.has(extension)) return 'text';
  return 'unsupported';
}

export function toDocumentRef(directory: string, fileName: string): DocumentRef {
  const parsed = path.parse(fileName);
  const extension = parsed.ext.toLowerCase();
  return {
    id: fileName,
    path: path.resolve(directory, fileName),
    stem: parsed.name,
    extension,
    kind: kindForExtension(extension),
  };
}

function byCodePoint(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * List the documents present in a directory at call time.
 *
 * Regular files only, dot-files excluded, sorted by name. The returned
 * iterator is consumed once; call again for a fresh listing.
 *
 * @throws IOError if the directory is missing, unreadable or not a directory
 */
export async function enumerateDocuments(directory: string): Promise<IterableIterator<DocumentRef>> {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(directory);
  } catch (error) {
    const code = systemErrorCode(error);
    const problem = code === 'ENOENT' ? 'not found' : `not accessible (${code ?? 'unknown error'})`;
    throw new IOError(`Input directory ${problem}: ${directory}`, directory, { cause: error });
  }

  if (!stats.isDirectory()) {
    throw new IOError(`Input path is not a directory: ${directory}`, directory);
  }

  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(directory, { withFileTypes: true });
  } catch (error) {
    throw new IOError(`Cannot list input directory: ${directory}`, directory, { cause: error });
  }

  const documents = entries
    .filter((entry) => entry.isFile() && !entry.name.startsWith('.'))
    .map((entry) => entry.name)
    .sort(byCodePoint)
    .map((name) => toDocumentRef(directory, name));

  logger.info('Enumerated input documents', {
    input_dir: directory,
    document_count: documents.length,
  });

  return documents.values();
}
