/**
 * PDFKit helpers shared by the PDF renderers.
 */

import PDFDocument from 'pdfkit';
import type { DocumentBlock } from './blocks';

export const MIME_PDF = 'application/pdf';

const BODY_FONT_SIZE = 10;
const HEADING_FONT_SIZE = 12;
const MIN_CELL_FONT_SIZE = 6;

const TABLE_COLUMNS = [
  { x: 50, width: 70 },
  { x: 120, width: 230 },
  { x: 350, width: 100 },
  { x: 450, width: 100 },
];

/**
 * Build a PDF with PDFKit and collect it into a Buffer.
 */
export function renderPdf(build: (doc: PDFKit.PDFDocument) => void): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ size: 'A4', margin: 50 });
    const chunks: Buffer[] = [];

    doc.on('data', (chunk: Buffer) => chunks.push(chunk));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    try {
      build(doc);
      doc.end();
    } catch (error) {
      reject(error);
    }
  });
}

/**
 * Largest font size, down to MIN_CELL_FONT_SIZE, at which the text fits the width on one line.
 */
function cellFontSize(doc: PDFKit.PDFDocument, text: string, width: number): number {
  doc.fontSize(BODY_FONT_SIZE);
  const natural = doc.widthOfString(text);
  const available = width - 1;
  if (natural <= available) return BODY_FONT_SIZE;

  const scaled = Math.floor(((BODY_FONT_SIZE * available) / natural) * 10) / 10;
  return Math.max(scaled, MIN_CELL_FONT_SIZE);
}

/**
 * Write one table row with every cell on the same baseline, so the text layer
 * reads back as a single line per row. A cell too long for its column is set
 * in a smaller font; only past the minimum size does it wrap.
 */
function tableRow(doc: PDFKit.PDFDocument, cells: string[], bold = false): void {
  if (doc.y > doc.page.height - doc.page.margins.bottom - 30) {
    doc.addPage();
  }

  doc.font(bold ? 'Helvetica-Bold' : 'Helvetica');
  const top = doc.y;
  const baseline = top + BODY_FONT_SIZE;
  let rowHeight = doc.fontSize(BODY_FONT_SIZE).currentLineHeight(true);

  cells.forEach((cell, i) => {
    const column = TABLE_COLUMNS[i] ?? TABLE_COLUMNS[TABLE_COLUMNS.length - 1];
    const size = cellFontSize(doc, cell, column.width);
    doc.fontSize(size);
    rowHeight = Math.max(rowHeight, doc.heightOfString(cell, { width: column.width }));
    doc.text(cell, column.x, baseline, { width: column.width, baseline: 'alphabetic' });
  });

  doc.font('Helvetica').fontSize(BODY_FONT_SIZE);
  doc.x = doc.page.margins.left;
  doc.y = top + rowHeight + 4;
}

function heading(doc: PDFKit.PDFDocument, title: string): void {
  doc.moveDown();
  doc.font('Helvetica-Bold').fontSize(HEADING_FONT_SIZE).text(title);
  doc.font('Helvetica').fontSize(BODY_FONT_SIZE);
}

function signatureLine(doc: PDFKit.PDFDocument, label: string): void {
  doc.moveDown(2);
  doc.text('______________________________');
  doc.text(label);
}

function writeBlock(doc: PDFKit.PDFDocument, block: DocumentBlock): void {
  switch (block.kind) {
    case 'title':
      doc.font('Helvetica-Bold').fontSize(block.size).text(block.text, { align: 'center' });
      doc.font('Helvetica').fontSize(BODY_FONT_SIZE);
      break;
    case 'heading':
      heading(doc, block.text);
      break;
    case 'paragraph':
      block.spans.forEach((span, i) => {
        doc
          .font(span.bold ? 'Helvetica-Bold' : 'Helvetica')
          .text(span.text, { continued: i < block.spans.length - 1 });
      });
      doc.font('Helvetica');
      break;
    case 'table':
      tableRow(doc, block.header, true);
      block.rows.forEach((row) => tableRow(doc, row));
      break;
    case 'signature':
      signatureLine(doc, block.label);
      break;
    case 'space':
      doc.moveDown(block.lines);
      break;
  }
}

/**
 * Lay out document blocks in order on A4 pages.
 */
export function renderPdfBlocks(blocks: DocumentBlock[]): Promise<Buffer> {
  return renderPdf((doc) => {
    doc.font('Helvetica').fontSize(BODY_FONT_SIZE);
    blocks.forEach((block) => writeBlock(doc, block));
  });
}
