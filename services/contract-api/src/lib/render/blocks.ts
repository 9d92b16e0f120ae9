/**
 * Document Blocks
 *
 * Format-neutral layout shared by the PDF and DOCX renderers, so a contract
 * carries the same wording whichever format is requested.
 */

export interface TextSpan {
  text: string;
  bold?: boolean;
}

export type DocumentBlock =
  | { kind: 'title'; text: string; size: number }
  | { kind: 'heading'; text: string }
  | { kind: 'paragraph'; spans: TextSpan[] }
  | { kind: 'table'; header: string[]; rows: string[][] }
  | { kind: 'signature'; label: string }
  | { kind: 'space'; lines: number };

export function title(text: string, size: number): DocumentBlock {
  return { kind: 'title', text, size };
}

export function heading(text: string): DocumentBlock {
  return { kind: 'heading', text };
}

export function paragraph(...spans: Array<string | TextSpan>): DocumentBlock {
  return {
    kind: 'paragraph',
    spans: spans.map((span) => (typeof span === 'string' ? { text: span } : span)),
  };
}

export function table(header: string[], rows: string[][]): DocumentBlock {
  return { kind: 'table', header, rows };
}

export function signature(label: string): DocumentBlock {
  return { kind: 'signature', label };
}

export function space(lines = 1): DocumentBlock {
  return { kind: 'space', lines };
}
