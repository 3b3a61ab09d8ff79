import mammoth from 'mammoth';
import { errorMessage } from '@/lib/errors';
import { logError, logWarning } from '@/lib/logger';
import type { ResumeFile } from '@/lib/types';

export const MAX_PDF_PAGES = 30;

type PdfJs = typeof import('pdfjs-dist/legacy/build/pdf.mjs');

// Loaded on first PDF only; the legacy build runs on Node 20 without a worker URL.
let pdfjsLibPromise: Promise<PdfJs> | null = null;
const loadPdfJs = () => (pdfjsLibPromise ??= import('pdfjs-dist/legacy/build/pdf.mjs'));

export function fileExtension(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot === -1 ? '' : filename.slice(dot + 1).toLowerCase();
}

const toBytes = (data: ArrayBuffer | Uint8Array) =>
  data instanceof Uint8Array ? data : new Uint8Array(data);

async function extractPdf(filename: string, bytes: Uint8Array): Promise<string> {
  const pdfjsLib = await loadPdfJs();
  // pdfjs takes ownership of the buffer it is handed
  const pdf = await pdfjsLib.getDocument({ data: new Uint8Array(bytes), useSystemFonts: true }).promise;
  try {
    if (pdf.numPages > MAX_PDF_PAGES) {
      logWarning(`PDF truncated to first ${MAX_PDF_PAGES} pages: ${filename}`);
    }
    const pages: string[] = [];
    for (let i = 1; i <= Math.min(pdf.numPages, MAX_PDF_PAGES); i++) {
      const page = await pdf.getPage(i);
      const content = await page.getTextContent();
      pages.push(content.items.map(item => ('str' in item ? item.str : '')).join(' '));
    }
    return pages.join('\n');
  } finally {
    await pdf.destroy();
  }
}

async function extractDocx(bytes: Uint8Array): Promise<string> {
  const result = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
  return result.value;
}

/**
 * Plain text of a PDF, DOCX or TXT file. Returns an empty string for
 * unsupported types and for files that fail to parse.
 */
export async function extractText(file: ResumeFile): Promise<string> {
  const bytes = toBytes(file.data);
  try {
    switch (fileExtension(file.filename)) {
      case 'pdf':
        return await extractPdf(file.filename, bytes);
      case 'docx':
      case 'doc':
        return await extractDocx(bytes);
      case 'txt':
      case 'text':
        return new TextDecoder('utf-8').decode(bytes);
      default:
        return '';
    }
  } catch (e) {
    logError(`Extraction failed (${file.filename}): ${errorMessage(e)}`);
    return '';
  }
}
