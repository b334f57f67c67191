import { beforeEach, describe, expect, it, vi } from 'vitest';

const mocks = vi.hoisted(() => ({
  extractRawText: vi.fn(),
}));

vi.mock('mammoth', () => ({
  default: { extractRawText: mocks.extractRawText },
}));

import { loadDocx } from './docxLoader.js';

describe('loadDocx', () => {
  beforeEach(() => {
    mocks.extractRawText.mockReset();
  });

  it('puts every paragraph on page 1', async () => {
    mocks.extractRawText.mockResolvedValue({ value: '  First para \n\nSecond para\n', messages: [] });

    const pages = await loadDocx('/cases/appeal.docx');

    expect(mocks.extractRawText).toHaveBeenCalledWith({ path: '/cases/appeal.docx' });
    expect(pages).toEqual([
      { page: 1, text: 'First para\nSecond para', lines: ['First para', 'Second para'], scanned: false },
    ]);
  });

  it('returns no pages for an empty document', async () => {
    mocks.extractRawText.mockResolvedValue({ value: '', messages: [] });

    expect(await loadDocx('/cases/empty.docx')).toEqual([]);
  });
});
