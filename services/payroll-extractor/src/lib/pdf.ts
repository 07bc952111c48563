/**
 * PDF Text Extraction
 *
 * Extracts per-page text from PDF files using pdfjs-dist.
 */

import fs from 'fs';
import * as pdfjsLib from 'pdfjs-dist';
import {
  logger as defaultLogger,
  DocumentUnreadableError,
  pdfTextDurationHistogram,
  type Logger,
  type PageText,
} from '@payroll-extract/shared';

// Configure worker for Node.js environment
pdfjsLib.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/build/pdf.worker.js');

export interface PdfTextResult {
  /** Pages with text, in page order */
  pages: PageText[];
  /** Page count of the document, including pages without text */
  totalPages: number;
}

export type TextExtractor = (filePath: string, logger?: Logger) => Promise<PdfTextResult>;

interface PositionedText {
  x: number;
  str: string;
}

/**
 * Join a page's text items into lines, top to bottom, left to right.
 *
 * Items are grouped by their rounded Y position so that label and value
 * printed on the same visual line end up on the same text line.
 */
function buildPageText(items: Array<{ str: string; transform: number[] }>): string {
  const itemsByY = new Map<number, PositionedText[]>();

  for (const item of items) {
    if (!item.str || item.str.trim() === '') continue;

    const y = Math.round(item.transform[5]);
    const x = Math.round(item.transform[4]);

    const line = itemsByY.get(y) ?? [];
    line.push({ x, str: item.str });
    itemsByY.set(y, line);
  }

  // PDF Y grows upwards
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
 * Extract the text of every page of a PDF file.
 *
 * Pages without text are left out. Any failure to read or decode the file
 * surfaces as a DocumentUnreadableError.
 */
export async function extractTextFromPdf(
  filePath: string,
  logger: Logger = defaultLogger
): Promise<PdfTextResult> {
  const startTime = Date.now();
  logger.info('Extracting text from PDF', { filePath });

  let data: Uint8Array;
  try {
    data = new Uint8Array(fs.readFileSync(filePath));
  } catch (error) {
    throw new DocumentUnreadableError(filePath, error);
  }

  const loadingTask = pdfjsLib.getDocument({
    data,
    verbosity: pdfjsLib.VerbosityLevel.ERRORS,
    isEvalSupported: false,
  });

  try {
    const pdf = await loadingTask.promise;
    const pages: PageText[] = [];

    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      const textItems: Array<{ str: string; transform: number[] }> = [];
      for (const item of textContent.items) {
        if ('str' in item) {
          textItems.push(item);
        }
      }

      const text = buildPageText(textItems);
      if (text) {
        pages.push({ pageNumber: pageNum, text });
      } else {
        logger.debug('Skipping page without text', { filePath, pageNumber: pageNum });
      }
    }

    pdfTextDurationHistogram.observe((Date.now() - startTime) / 1000);
    logger.info('PDF text extraction complete', {
      filePath,
      totalPages: pdf.numPages,
      pagesWithText: pages.length,
    });

    return { pages, totalPages: pdf.numPages };
  } catch (error) {
    throw new DocumentUnreadableError(filePath, error);
  } finally {
    // A cleanup failure must not replace the result or the read error
    await loadingTask.destroy().catch((error: unknown) => {
      logger.debug('PDF loading task cleanup failed', {
        filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    });
  }
}
