/**
 * PDF Text Extraction
 *
 * Extracts the text layer from PDF bytes using pdfjs-dist.
 */

import { createRequire } from 'node:module';
import path from 'node:path';
import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { TextItem, TextMarkedContent } from 'pdfjs-dist/types/src/display/api';
import { logger } from './logger';

// Configure worker for Node.js environment
const require = createRequire(import.meta.url);
const workerPath = path.join(
  path.dirname(require.resolve('pdfjs-dist/package.json')),
  'legacy/build/pdf.worker.mjs'
);
pdfjsLib.GlobalWorkerOptions.workerSrc = workerPath;

/**
 * Turns raw document bytes into text. Resolves to null when the bytes cannot be read.
 */
export type TextExtractor = (bytes: Uint8Array) => Promise<string | null>;

function isTextItem(item: TextItem | TextMarkedContent): item is TextItem {
  return 'str' in item;
}

/**
 * Extract the text of a PDF, every page in order, preserving line structure.
 *
 * Text items are grouped by Y position so that table rows come out as one
 * line each. Pages are concatenated without a separator.
 */
export const extractTextFromPdf: TextExtractor = async (bytes) => {
  logger.info('Extracting text from PDF', { byteLength: bytes.byteLength });

  // pdfjs transfers the buffer to its worker; keep the caller's bytes intact
  const data = new Uint8Array(bytes);
  const loadingTask = pdfjsLib.getDocument({ data, verbosity: 0 });

  try {
    const pdf = await loadingTask.promise;

    let combinedText = '';

    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();

      const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

      for (const item of textContent.items) {
        if (!isTextItem(item) || item.str.trim() === '') continue;

        // Text on the same visual line may have slight Y variations
        const y = Math.round(item.transform[5]);
        const x = Math.round(item.transform[4]);

        const line = itemsByY.get(y) ?? [];
        line.push({ x, str: item.str });
        itemsByY.set(y, line);
      }

      // PDF Y axis grows upwards: descending Y is top to bottom
      const sortedYPositions = [...itemsByY.keys()].sort((a, b) => b - a);

      const lines: string[] = [];
      for (const y of sortedYPositions) {
        const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
        const lineText = lineItems.map((item) => item.str).join(' ').trim();
        if (lineText) {
          lines.push(lineText);
        }
      }

      if (lines.length > 0) {
        combinedText += `${lines.join('\n')}\n`;
      }
    }

    logger.info('PDF text extraction complete', {
      totalPages: pdf.numPages,
      totalChars: combinedText.length,
    });

    return combinedText;
  } catch (error) {
    logger.error('Failed to extract text from PDF bytes', error);
    return null;
  } finally {
    // Releases the document too, whether or not it finished loading
    await loadingTask.destroy();
  }
};
