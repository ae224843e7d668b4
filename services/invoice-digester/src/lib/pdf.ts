/**
 * PDF Text Extraction
 *
 * Extracts text from PDF files using pdfjs-dist.
 */

import { logger, type PageText } from '@invoice-digest/shared';

type PdfJs = typeof import('pdfjs-dist');

let pdfjs: PdfJs | null = null;

/**
 * Load pdfjs on first use, so runs without PDFs never pay for it
 */
async function loadPdfjs(): Promise<PdfJs> {
  if (!pdfjs) {
    const pdfjsLib = await import('pdfjs-dist');
    // Configure worker for Node.js environment
    pdfjsLib.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/build/pdf.worker.js');
    pdfjs = pdfjsLib;
  }
  return pdfjs;
}

export interface PositionedText {
  x: number;
  y: number;
  str: string;
}

export interface PdfTextResult {
  pages: PageText[];
  totalPages: number;
  /** Characters of text, whitespace excluded */
  textChars: number;
}

/**
 * Rebuild a page's lines from positioned text items.
 *
 * Items are grouped by rounded Y position so text on one visual line stays
 * together, lines run top to bottom and items left to right. This keeps
 * label/value pairs (e.g. "Invoice No" and its number) on the same line.
 */
export function buildPageText(items: PositionedText[]): string {
  const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

  for (const item of items) {
    if (!item.str || item.str.trim() === '') continue;

    const y = Math.round(item.y);
    const line = itemsByY.get(y) ?? [];
    line.push({ x: Math.round(item.x), str: item.str });
    itemsByY.set(y, line);
  }

  // PDF Y grows upwards: larger Y is higher on the page
  const sortedYPositions = Array.from(itemsByY.keys()).sort((a, b) => b - a);

  const lines: string[] = [];
  for (const y of sortedYPositions) {
    const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
    const lineText = lineItems.map((item) => item.str).join(' ').trim();
    if (lineText) {
      lines.push(lineText);
    }
  }

  return lines.join('\n');
}

/**
 * Extract text from PDF bytes, preserving line structure.
 */
export async function extractTextFromPdf(data: Uint8Array, source: string): Promise<PdfTextResult> {
  const pdfjsLib = await loadPdfjs();
  logger.debug('Extracting text from PDF', { source });

  // pdfjs may detach the buffer it is given; hand it a copy.
  // Its own warnings go to console.log, outside the JSON log stream.
  const pdf = await pdfjsLib.getDocument({
    data: new Uint8Array(data),
    isEvalSupported: false,
    verbosity: pdfjsLib.VerbosityLevel.ERRORS,
  }).promise;

  try {
    const pages: PageText[] = [];

    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      const items: PositionedText[] = [];
      for (const item of textContent.items) {
        if ('str' in item) {
          items.push({ x: item.transform[4], y: item.transform[5], str: item.str });
        }
      }

      pages.push({ pageNumber: pageNum, text: buildPageText(items) });
    }

    const textChars = pages.reduce((sum, p) => sum + p.text.replace(/\s/g, '').length, 0);

    logger.info('PDF text extraction complete', {
      source,
      totalPages: pdf.numPages,
      textChars,
    });

    return { pages, totalPages: pdf.numPages, textChars };
  } finally {
    await pdf.destroy();
  }
}
