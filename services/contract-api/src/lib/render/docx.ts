/**
 * DOCX helpers shared by the Word renderers.
 */

import {
  AlignmentType,
  Document,
  Packer,
  Paragraph,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType,
} from 'docx';
import type { DocumentBlock } from './blocks';

export const MIME_DOCX = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

// docx sizes are in half-points
const BODY_SIZE = 20;
const HEADING_SIZE = 24;
// and spacing in twentieths of a point
const LINE_SPACING = 240;

function cellParagraph(text: string, bold: boolean): Paragraph {
  return new Paragraph({ children: [new TextRun({ text, bold, size: BODY_SIZE })] });
}

function tableRows(header: string[], rows: string[][]): TableRow[] {
  return [header, ...rows].map(
    (cells, rowIndex) =>
      new TableRow({
        tableHeader: rowIndex === 0,
        children: cells.map((cell) => new TableCell({ children: [cellParagraph(cell, rowIndex === 0)] })),
      })
  );
}

function toDocx(block: DocumentBlock): Array<Paragraph | Table> {
  switch (block.kind) {
    case 'title':
      return [
        new Paragraph({
          alignment: AlignmentType.CENTER,
          children: [new TextRun({ text: block.text, bold: true, size: block.size * 2 })],
        }),
      ];
    case 'heading':
      return [
        new Paragraph({
          spacing: { before: LINE_SPACING },
          children: [new TextRun({ text: block.text, bold: true, size: HEADING_SIZE })],
        }),
      ];
    case 'paragraph':
      return [
        new Paragraph({
          children: block.spans.map((span) => new TextRun({ text: span.text, bold: span.bold, size: BODY_SIZE })),
        }),
      ];
    case 'table':
      return [new Table({ width: { size: 100, type: WidthType.PERCENTAGE }, rows: tableRows(block.header, block.rows) })];
    case 'signature':
      return [
        new Paragraph({
          spacing: { before: LINE_SPACING * 2 },
          children: [new TextRun({ text: '______________________________', size: BODY_SIZE })],
        }),
        new Paragraph({ children: [new TextRun({ text: block.label, size: BODY_SIZE })] }),
      ];
    case 'space':
      return [new Paragraph({ spacing: { after: Math.round(LINE_SPACING * block.lines) } })];
  }
}

/**
 * Write document blocks into a single-section Word document.
 */
export function renderDocxBlocks(blocks: DocumentBlock[]): Promise<Buffer> {
  const document = new Document({ sections: [{ children: blocks.flatMap(toDocx) }] });
  return Packer.toBuffer(document);
}
