/**
 * Document Loading
 *
 * Turns a DocumentRef into the content a provider sends: page text for
 * text PDFs and plain-text files, base64 bytes for images and scanned PDFs.
 */

import fs from 'fs';
import path from 'path';
import {
  IOError,
  formatPageText,
  logger,
  serializeError,
  systemErrorCode,
  type DocumentRef,
  type LoadedDocument,
  type PageText,
} from '@invoice-digest/shared';
import { imageMimeType } from './documents';
import { extractTextFromPdf } from './pdf';

/**
 * Below this many non-whitespace characters a PDF is treated as scanned
 * and the file itself is sent to the provider.
 */
export const MIN_PDF_TEXT_CHARS = 20;

export type DocumentLoader = (ref: DocumentRef) => Promise<LoadedDocument>;

export interface LoaderOptions {
  /** Write the text sent for each text-mode document here, as <stem>.md */
  debugTextDir?: string;
}

async function readDocument(ref: DocumentRef): Promise<Buffer> {
  try {
    return await fs.promises.readFile(ref.path);
  } catch (error) {
    throw new IOError(
      `Cannot read document ${ref.id} (${systemErrorCode(error) ?? 'unknown error'})`,
      ref.path,
      { cause: error }
    );
  }
}

async function loadPdf(ref: DocumentRef, bytes: Buffer): Promise<LoadedDocument> {
  let pages: PageText[];
  let textChars: number;
  try {
    ({ pages, textChars } = await extractTextFromPdf(bytes, ref.path));
  } catch (error) {
    throw new IOError(`Cannot parse PDF ${ref.id}`, ref.path, { cause: error });
  }

  if (textChars < MIN_PDF_TEXT_CHARS) {
    logger.info('PDF has no usable text layer, sending the file itself', {
      document_id: ref.id,
      text_chars: textChars,
    });
    return { mode: 'file', ref, mimeType: 'application/pdf', data: bytes.toString('base64') };
  }

  return { mode: 'text', ref, pages };
}

async function writeDebugText(directory: string, ref: DocumentRef, pages: PageText[]): Promise<void> {
  const target = path.join(directory, `${ref.stem}.md`);
  try {
    await fs.promises.mkdir(directory, { recursive: true });
    await fs.promises.writeFile(target, `${formatPageText(pages)}\n`, 'utf-8');
    logger.debug('Debug: wrote document text', { path: target });
  } catch (error) {
    logger.warn('Debug: failed to write document text', {
      path: target,
      error: serializeError(error),
    });
  }
}

async function loadContent(ref: DocumentRef): Promise<LoadedDocument> {
  switch (ref.kind) {
    case 'pdf':
      return loadPdf(ref, await readDocument(ref));

    case 'image': {
      const mimeType = imageMimeType(ref.extension);
      if (!mimeType) {
        throw new IOError(`Unsupported image type ${ref.extension}`, ref.path);
      }
      const bytes = await readDocument(ref);
      return { mode: 'image', ref, mimeType, data: bytes.toString('base64') };
    }

    case 'text': {
      const bytes = await readDocument(ref);
      return { mode: 'text', ref, pages: [{ pageNumber: 1, text: bytes.toString('utf-8') }] };
    }

    case 'unsupported':
      throw new IOError(`Unsupported document type: ${ref.id}`, ref.path);
  }
}

export function createDocumentLoader(options: LoaderOptions = {}): DocumentLoader {
  return async (ref: DocumentRef): Promise<LoadedDocument> => {
    const document = await loadContent(ref);

    if (document.mode === 'text' && options.debugTextDir) {
      await writeDebugText(options.debugTextDir, ref, document.pages);
    }

    logger.debug('Document loaded', { document_id: ref.id, mode: document.mode });
    return document;
  };
}
