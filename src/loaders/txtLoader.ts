import fs from 'fs/promises';
import type { PageRecord } from '../core/types.js';
import { createPageRecord, toLines } from './pageRecord.js';

/**
 * Plain-text loader
 *
 * Typed case files carry page numbers as a leading 3-4 digit number
 * ("104 The plaintiff filed..."). Such a line starts a new page with that
 * number; the number itself is dropped from the text.
 */

const PAGE_MARK = /^\s*(\d{3,4})\b/;

export function splitTextPages(content: string): PageRecord[] {
  const pages: PageRecord[] = [];
  let currentPage = 1;
  let currentLines: string[] = [];

  for (const line of toLines(content)) {
    const mark = PAGE_MARK.exec(line);
    let text = line;

    if (mark) {
      if (currentLines.length > 0) {
        pages.push(createPageRecord(currentPage, currentLines));
        currentLines = [];
      }
      currentPage = Number.parseInt(mark[1], 10);
      text = line.slice(mark[0].length).trim();
      if (!text) {
        continue;
      }
    }

    currentLines.push(text);
  }

  if (currentLines.length > 0) {
    pages.push(createPageRecord(currentPage, currentLines));
  }

  return pages;
}

export async function loadTxt(filePath: string): Promise<PageRecord[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  return splitTextPages(content);
}
