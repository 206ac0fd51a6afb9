import path from 'node:path';
import { createRequire } from 'node:module';
import { ExtractionError, UnsupportedFormatError } from './errors';
import type { ExtractedDocument } from './types';

// Lazy-loaded to avoid loading parsers at startup
const require = createRequire(import.meta.url);
type PdfParse = typeof import('pdf-parse');
let pdfParseLib: PdfParse | null = null;
let mammothLib: typeof import('mammoth') | null = null;

function getPdfParse(): PdfParse {
  if (!pdfParseLib) {
    const loaded: PdfParse = require('pdf-parse');
    pdfParseLib = loaded;
  }
  return pdfParseLib;
}

async function getMammoth() {
  if (!mammothLib) mammothLib = await import('mammoth');
  return mammothLib;
}

export const SUPPORTED_EXTENSIONS = ['.txt', '.md', '.markdown', '.pdf', '.docx'] as const;
type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

function isSupported(ext: string): ext is SupportedExtension {
  return (SUPPORTED_EXTENSIONS as readonly string[]).includes(ext);
}

export function isSupportedFile(filename: string): boolean {
  return isSupported(path.extname(filename).toLowerCase());
}

interface PagedText {
  text: string;
  pageCount: number;
  pageOffsets: number[];
}

/**
 * Join page texts with a newline and record where each page starts.
 */
export function joinPages(pages: readonly string[]): PagedText {
  if (pages.every((p) => p.length === 0)) {
    return { text: '', pageCount: 0, pageOffsets: [] };
  }
  const pageOffsets: number[] = [];
  let offset = 0;
  for (const page of pages) {
    pageOffsets.push(offset);
    offset += page.length + 1;
  }
  return { text: pages.join('\n'), pageCount: pages.length, pageOffsets };
}

function decodeText(data: Uint8Array): string {
  // TextDecoder drops a leading BOM
  return new TextDecoder('utf-8').decode(data).replace(/\r\n?/g, '\n');
}

function toBuffer(data: Uint8Array): Buffer {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

interface PdfTextItem {
  str: string;
  transform: number[];
}

/** The slice of a pdf.js page proxy that page rendering reads */
export interface PdfPageData {
  pageIndex: number;
  getTextContent(options: {
    normalizeWhitespace: boolean;
    disableCombineTextItems: boolean;
  }): Promise<{ items: PdfTextItem[] }>;
}

/**
 * A `pagerender` hook for pdf-parse that keeps each page's text, indexed by
 * page. Lines break where the text baseline moves, as in pdf-parse's own
 * renderer.
 */
export function createPageCollector() {
  const pages: string[] = [];

  async function render(pageData: PdfPageData): Promise<string> {
    const content = await pageData.getTextContent({
      normalizeWhitespace: false,
      disableCombineTextItems: false,
    });
    let lastY: number | undefined;
    let text = '';
    for (const item of content.items) {
      const y = item.transform[5];
      text += lastY === undefined || lastY === y ? item.str : `\n${item.str}`;
      lastY = y;
    }
    pages[pageData.pageIndex] = text;
    return text;
  }

  /** Page texts in order; pages that failed to render are empty */
  function collected(pageCount: number): string[] {
    return Array.from({ length: pageCount }, (_, i) => pages[i] ?? '');
  }

  return { render, collected };
}

async function extractPdf(data: Uint8Array): Promise<PagedText> {
  const pdf = getPdfParse();
  const collector = createPageCollector();
  const result = await pdf(toBuffer(data), { pagerender: collector.render });
  return joinPages(collector.collected(result.numpages).map((p) => p.trim()));
}

async function extractDocx(data: Uint8Array): Promise<PagedText> {
  const mammoth = await getMammoth();
  const result = await mammoth.extractRawText({ buffer: toBuffer(data) });
  return joinPages([result.value.trim()]);
}

function extractPlainText(data: Uint8Array): PagedText {
  // Form feeds mark page breaks in plain text exports
  return joinPages(decodeText(data).split('\f'));
}

async function readPages(
  extension: SupportedExtension,
  data: Uint8Array
): Promise<PagedText> {
  if (extension === '.pdf') return extractPdf(data);
  if (extension === '.docx') return extractDocx(data);
  return extractPlainText(data);
}

/**
 * Extract plain text from a supported file. Pure apart from decoding; an
 * empty result is returned as an empty document, not an error.
 */
export async function extract(
  data: Uint8Array,
  filename: string
): Promise<ExtractedDocument> {
  const extension = path.extname(filename).toLowerCase();
  if (!isSupported(extension)) {
    throw new UnsupportedFormatError(filename, extension, SUPPORTED_EXTENSIONS);
  }

  let paged: PagedText;
  try {
    paged = await readPages(extension, data);
  } catch (error) {
    throw new ExtractionError(filename, error);
  }

  return {
    filename,
    extension,
    text: paged.text,
    pageCount: paged.pageCount,
    pageOffsets: paged.pageOffsets,
  };
}
