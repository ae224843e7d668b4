/**
 * Document Enumeration and Loading Tests
 */

import fs from 'fs';
import path from 'path';
import { IOError } from '@invoice-digest/shared';
import {
  enumerateDocuments,
  kindForExtension,
  toDocumentRef,
} from '../../services/invoice-digester/src/lib/documents';
import { createDocumentLoader } from '../../services/invoice-digester/src/lib/loader';
import { buildPageText } from '../../services/invoice-digester/src/lib/pdf';
import { listDir, makeTempDir, removeDir, writeFiles } from './helpers';

// First four bytes of every PNG file
const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47]);

/**
 * A one-page PDF drawing `content` in Helvetica, with a correct xref table.
 */
function buildPdf(content: string): Buffer {
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>',
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
  ];

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((body, index) => {
    offsets.push(pdf.length);
    pdf += `${index + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    pdf += `${String(offset).padStart(10, '0')} 00000 n \n`;
  }
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return Buffer.from(pdf, 'latin1');
}

describe('enumerateDocuments', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should fail with IOError when the directory is missing', async () => {
    const missing = path.join(dir, 'nope');

    await expect(enumerateDocuments(missing)).rejects.toThrow(IOError);
    await expect(enumerateDocuments(missing)).rejects.toThrow(`Input directory not found: ${missing}`);
  });

  it('should fail with IOError when the path is a file', async () => {
    await writeFiles(dir, { 'invoice.pdf': 'x' });
    const filePath = path.join(dir, 'invoice.pdf');

    await expect(enumerateDocuments(filePath)).rejects.toThrow(`Input path is not a directory: ${filePath}`);
  });

  it('should yield nothing for an empty directory', async () => {
    expect(Array.from(await enumerateDocuments(dir))).toEqual([]);
  });

  it('should list regular files in name order, skipping dot-files and directories', async () => {
    await writeFiles(dir, {
      'b.pdf': 'x',
      'a.txt': 'x',
      'C.png': 'x',
      '.DS_Store': 'x',
    });
    await fs.promises.mkdir(path.join(dir, 'archive'));

    const documents = Array.from(await enumerateDocuments(dir));

    expect(documents.map((d) => d.id)).toEqual(['C.png', 'a.txt', 'b.pdf']);
    expect(documents.map((d) => d.kind)).toEqual(['image', 'text', 'pdf']);
  });

  it('should be consumable once', async () => {
    await writeFiles(dir, { 'invoice_001.pdf': 'x' });

    const documents = await enumerateDocuments(dir);

    expect(Array.from(documents)).toHaveLength(1);
    expect(Array.from(documents)).toHaveLength(0);
  });
});

describe('toDocumentRef', () => {
  it('should describe a file by name, stem and lower-cased extension', () => {
    expect(toDocumentRef('/invoices', 'Invoice_001.PDF')).toEqual({
      id: 'Invoice_001.PDF',
      path: path.resolve('/invoices', 'Invoice_001.PDF'),
      stem: 'Invoice_001',
      extension: '.pdf',
      kind: 'pdf',
    });
  });

  it('should handle files without an extension', () => {
    const ref = toDocumentRef('/invoices', 'README');

    expect(ref.stem).toBe('README');
    expect(ref.extension).toBe('');
    expect(ref.kind).toBe('unsupported');
  });
});

describe('kindForExtension', () => {
  it('should classify by extension', () => {
    expect(kindForExtension('.pdf')).toBe('pdf');
    expect(kindForExtension('.jpeg')).toBe('image');
    expect(kindForExtension('.webp')).toBe('image');
    expect(kindForExtension('.md')).toBe('text');
    expect(kindForExtension('.docx')).toBe('unsupported');
  });
});

describe('buildPageText', () => {
  it('should rebuild lines top to bottom and left to right', () => {
    const text = buildPageText([
      { x: 300, y: 700, str: 'INV-001' },
      { x: 50, y: 700.2, str: 'Invoice No' },
      { x: 50, y: 680, str: 'Total' },
      { x: 300, y: 680, str: '120.50' },
      { x: 10, y: 650, str: '   ' },
    ]);

    expect(text).toBe('Invoice No INV-001\nTotal 120.50');
  });

  it('should return an empty string for a page without text', () => {
    expect(buildPageText([])).toBe('');
  });
});

describe('createDocumentLoader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should load text files as a single page', async () => {
    await writeFiles(dir, { 'invoice_001.txt': 'Invoice INV-1\nTotal 12.00' });
    const ref = toDocumentRef(dir, 'invoice_001.txt');

    const document = await createDocumentLoader()(ref);

    expect(document).toEqual({
      mode: 'text',
      ref,
      pages: [{ pageNumber: 1, text: 'Invoice INV-1\nTotal 12.00' }],
    });
  });

  it('should load images as base64 with their MIME type', async () => {
    await writeFiles(dir, { 'scan.png': PNG_SIGNATURE });
    const ref = toDocumentRef(dir, 'scan.png');

    const document = await createDocumentLoader()(ref);

    expect(document).toEqual({ mode: 'image', ref, mimeType: 'image/png', data: 'iVBORw==' });
  });

  it('should fail with IOError when the file cannot be read', async () => {
    const ref = toDocumentRef(dir, 'vanished.txt');

    await expect(createDocumentLoader()(ref)).rejects.toThrow('Cannot read document vanished.txt (ENOENT)');
  });

  it('should refuse unsupported documents', async () => {
    await writeFiles(dir, { 'notes.docx': 'x' });

    await expect(createDocumentLoader()(toDocumentRef(dir, 'notes.docx'))).rejects.toThrow(
      'Unsupported document type: notes.docx'
    );
  });

  it('should write the text it sends to the debug directory', async () => {
    const inputDir = path.join(dir, 'in');
    const debugDir = path.join(dir, 'debug');
    await writeFiles(inputDir, { 'invoice_002.md': '# Invoice INV-2' });

    await createDocumentLoader({ debugTextDir: debugDir })(toDocumentRef(inputDir, 'invoice_002.md'));

    expect(await listDir(debugDir)).toEqual(['invoice_002.md']);
    expect(await fs.promises.readFile(path.join(debugDir, 'invoice_002.md'), 'utf-8')).toBe(
      '--- Page 1 ---\n# Invoice INV-2\n'
    );
  });

  it('should not write debug text for images', async () => {
    const debugDir = path.join(dir, 'debug');
    await writeFiles(dir, { 'scan.png': PNG_SIGNATURE });

    await createDocumentLoader({ debugTextDir: debugDir })(toDocumentRef(dir, 'scan.png'));

    expect(fs.existsSync(debugDir)).toBe(false);
  });
});

describe('createDocumentLoader with PDFs', () => {
  const PDF_TIMEOUT_MS = 20000;
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it(
    'should send the page text of a PDF with a text layer',
    async () => {
      await writeFiles(dir, {
        'invoice_001.pdf': buildPdf('BT /F1 12 Tf 72 720 Td (INV-2024-0001) Tj 0 -20 Td (TOTAL-1070.00) Tj ET'),
      });
      const ref = toDocumentRef(dir, 'invoice_001.pdf');

      const document = await createDocumentLoader()(ref);

      expect(document).toEqual({
        mode: 'text',
        ref,
        pages: [{ pageNumber: 1, text: 'INV-2024-0001\nTOTAL-1070.00' }],
      });
    },
    PDF_TIMEOUT_MS
  );

  it(
    'should send the file itself when a PDF has no text',
    async () => {
      const bytes = buildPdf('');
      await writeFiles(dir, { 'scan.pdf': bytes });
      const ref = toDocumentRef(dir, 'scan.pdf');

      const document = await createDocumentLoader()(ref);

      expect(document).toEqual({
        mode: 'file',
        ref,
        mimeType: 'application/pdf',
        data: bytes.toString('base64'),
      });
    },
    PDF_TIMEOUT_MS
  );

  it(
    'should fail with IOError when the PDF cannot be parsed',
    async () => {
      await writeFiles(dir, { 'broken.pdf': Buffer.from('this is not a pdf at all', 'latin1') });
      const load = createDocumentLoader()(toDocumentRef(dir, 'broken.pdf'));

      await expect(load).rejects.toThrow(IOError);
      await expect(createDocumentLoader()(toDocumentRef(dir, 'broken.pdf'))).rejects.toThrow(
        'Cannot parse PDF broken.pdf'
      );
    },
    PDF_TIMEOUT_MS
  );
});
