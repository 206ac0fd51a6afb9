// @vitest-environment node
import { describe, it, expect, vi, beforeEach } from 'vitest';

const { extractRawText } = vi.hoisted(() => ({ extractRawText: vi.fn() }));

vi.mock('mammoth', () => ({
  default: { extractRawText },
  extractRawText,
}));

import {
  createPageCollector,
  extract,
  isSupportedFile,
  joinPages,
  type PdfPageData,
} from '../extractor';
import { ExtractionError, UnsupportedFormatError } from '../errors';

const encode = (text: string) => new TextEncoder().encode(text);

describe('Extractor', () => {
  beforeEach(() => {
    extractRawText.mockReset();
  });

  describe('plain text', () => {
    it('should decode UTF-8, drop the BOM and normalize line endings', async () => {
      const doc = await extract(encode('\uFEFFhello\r\nworld'), 'notes.txt');

      expect(doc).toEqual({
        filename: 'notes.txt',
        extension: '.txt',
        text: 'hello\nworld',
        pageCount: 1,
        pageOffsets: [0],
      });
    });

    it('should treat form feeds as page breaks', async () => {
      const doc = await extract(encode('one\ftwo\fthree'), 'book.md');

      expect(doc.text).toBe('one\ntwo\nthree');
      expect(doc.pageCount).toBe(3);
      expect(doc.pageOffsets).toEqual([0, 4, 8]);
    });

    it('should return an empty document for an empty file', async () => {
      const doc = await extract(new Uint8Array(0), 'empty.txt');

      expect(doc.text).toBe('');
      expect(doc.pageCount).toBe(0);
      expect(doc.pageOffsets).toEqual([]);
    });

    it('should match extensions case-insensitively', async () => {
      const doc = await extract(encode('# Title'), 'README.MARKDOWN');
      expect(doc.extension).toBe('.markdown');
      expect(doc.text).toBe('# Title');
    });
  });

  describe('docx', () => {
    it('should extract raw text through mammoth', async () => {
      extractRawText.mockResolvedValueOnce({
        value: '  Quarterly summary\n\nRevenue grew.  ',
        messages: [],
      });

      const doc = await extract(encode('PK fake docx'), 'report.docx');

      expect(extractRawText).toHaveBeenCalledWith({ buffer: expect.any(Buffer) });
      expect(doc.text).toBe('Quarterly summary\n\nRevenue grew.');
      expect(doc.pageCount).toBe(1);
      expect(doc.pageOffsets).toEqual([0]);
    });

    it('should wrap parser failures in ExtractionError', async () => {
      extractRawText.mockRejectedValueOnce(new Error('bad zip'));

      await expect(extract(encode('junk'), 'report.docx')).rejects.toThrow(
        'Could not extract text from report.docx: bad zip'
      );
    });
  });

  describe('pdf', () => {
    it('should reject bytes that are not a PDF', async () => {
      await expect(extract(encode('not a pdf'), 'scan.pdf')).rejects.toBeInstanceOf(
        ExtractionError
      );
    });

    function page(pageIndex: number, lines: Array<[string, number]>): PdfPageData {
      return {
        pageIndex,
        getTextContent: async () => ({
          items: lines.map(([str, y]) => ({ str, transform: [1, 0, 0, 1, 0, y] })),
        }),
      };
    }

    it('should keep paragraph breaks inside a page', async () => {
      const collector = createPageCollector();

      const first = await collector.render(
        page(0, [
          ['Intro ', 700],
          ['line', 700],
          ['', 680],
          ['Next paragraph', 660],
        ])
      );
      await collector.render(page(1, [['Second page', 700]]));

      expect(first).toBe('Intro line\n\nNext paragraph');
      expect(collector.collected(2)).toEqual(['Intro line\n\nNext paragraph', 'Second page']);
    });

    it('should leave pages that were not rendered empty', async () => {
      const collector = createPageCollector();
      await collector.render(page(2, [['Third', 700]]));

      expect(collector.collected(3)).toEqual(['', '', 'Third']);
    });
  });

  describe('unsupported formats', () => {
    it('should reject unknown extensions', async () => {
      const error = await extract(encode('png'), 'photo.png').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnsupportedFormatError);
      expect(error).toMatchObject({ filename: 'photo.png', extension: '.png' });
    });

    it('should reject files without an extension', async () => {
      await expect(extract(encode('text'), 'LICENSE')).rejects.toBeInstanceOf(
        UnsupportedFormatError
      );
    });

    it('should report supported files', () => {
      expect(isSupportedFile('a.PDF')).toBe(true);
      expect(isSupportedFile('a.docx')).toBe(true);
      expect(isSupportedFile('a.doc')).toBe(false);
    });
  });

  describe('joinPages', () => {
    it('should record where each page starts', () => {
      expect(joinPages(['ab', '', 'cde'])).toEqual({
        text: 'ab\n\ncde',
        pageCount: 3,
        pageOffsets: [0, 3, 4],
      });
    });
  });
});
