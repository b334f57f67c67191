import fs from 'fs/promises';
import { extractText, getDocumentProxy } from 'unpdf';
import type { PageRecord } from '../core/types.js';
import { ScopedLogger } from '../utils/logger.js';
import { createPageRecord, toLines } from './pageRecord.js';

/**
 * PDF loader
 *
 * Reads the text layer page by page through unpdf (PDF.js). A page with an
 * empty text layer is flagged as scanned; when any page is scanned and an
 * OCR provider is supplied, the provider's pages are used instead.
 */

/**
 * Image-to-text collaborator for scanned PDFs
 */
export interface OcrProvider {
  recognize(filePath: string): Promise<PageRecord[]>;
}

const logger = new ScopedLogger('PdfLoader');

export async function readPdfTextLayer(data: Uint8Array): Promise<PageRecord[]> {
  const pdf = await getDocumentProxy(data);

  try {
    const { text } = await extractText(pdf, { mergePages: false });
    return text.map((pageText, index) => {
      const lines = toLines(pageText);
      return createPageRecord(index + 1, lines, lines.length === 0);
    });
  } finally {
    await pdf.destroy();
  }
}

export async function loadPdf(filePath: string, ocr?: OcrProvider): Promise<PageRecord[]> {
  const buffer = await fs.readFile(filePath);
  const pages = await readPdfTextLayer(new Uint8Array(buffer));

  const scannedPages = pages.filter((page) => page.scanned).length;
  if (scannedPages === 0) {
    return pages;
  }

  if (!ocr) {
    logger.warn('PDF has pages without a text layer and no OCR provider is configured', {
      filePath,
      scannedPages,
    });
    return pages;
  }

  logger.info('Running OCR on scanned PDF', { filePath, scannedPages });
  return ocr.recognize(filePath);
}
