import fs from 'fs/promises';
import path from 'path';
import type { PageRecord } from '../core/types.js';
import { DocumentLoadError } from '../utils/errors.js';
import { loadDocx } from './docxLoader.js';
import { loadPdf, type OcrProvider } from './pdfLoader.js';
import { loadTxt } from './txtLoader.js';

export type { OcrProvider } from './pdfLoader.js';

/**
 * Document Loader
 *
 * Dispatches on file extension and returns ordered pages. Unsupported
 * extensions yield no pages; loader failures surface as DocumentLoadError.
 */

export const SUPPORTED_EXTENSIONS: readonly string[] = ['.pdf', '.docx', '.txt'];

export interface LoadOptions {
  ocr?: OcrProvider;
}

export function isSupportedDocument(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.includes(path.extname(filePath).toLowerCase());
}

export async function loadPages(filePath: string, options: LoadOptions = {}): Promise<PageRecord[]> {
  try {
    switch (path.extname(filePath).toLowerCase()) {
      case '.pdf':
        return await loadPdf(filePath, options.ocr);
      case '.docx':
        return await loadDocx(filePath);
      case '.txt':
        return await loadTxt(filePath);
      default:
        return [];
    }
  } catch (error) {
    throw new DocumentLoadError(filePath, error);
  }
}

/**
 * A supported file, or every supported file under a directory (sorted)
 */
export async function discoverInputs(inputPath: string): Promise<string[]> {
  const stats = await fs.stat(inputPath);

  if (stats.isFile()) {
    return isSupportedDocument(inputPath) ? [inputPath] : [];
  }

  const entries = await fs.readdir(inputPath, { recursive: true });
  const files: string[] = [];

  for (const entry of entries) {
    const fullPath = path.join(inputPath, entry);
    if (isSupportedDocument(fullPath) && (await fs.stat(fullPath)).isFile()) {
      files.push(fullPath);
    }
  }

  return files.sort();
}
