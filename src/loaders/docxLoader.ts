import mammoth from 'mammoth';
import type { PageRecord } from '../core/types.js';
import { createPageRecord, toLines } from './pageRecord.js';

/**
 * Word document loader
 *
 * DOCX has no page layout to recover, so every non-empty paragraph becomes a
 * line of a single page 1.
 */
export async function loadDocx(filePath: string): Promise<PageRecord[]> {
  const result = await mammoth.extractRawText({ path: filePath });
  const lines = toLines(result.value || '');
  return lines.length > 0 ? [createPageRecord(1, lines)] : [];
}
