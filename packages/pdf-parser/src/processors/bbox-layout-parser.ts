import type { BoundingBox } from '@tgdoc/model';

import type {
  LayoutBlock,
  LayoutLine,
  LayoutWord,
  PageLayout,
} from '../types/page-layout';

const PAGE_PATTERN =
  /<page\s+width="([\d.]+)"\s+height="([\d.]+)"\s*>([\s\S]*?)<\/page>/g;
const BLOCK_PATTERN = /<block\b[^>]*>([\s\S]*?)<\/block>/g;
const LINE_PATTERN = /<line\b[^>]*>([\s\S]*?)<\/line>/g;
const WORD_PATTERN =
  /<word\s+xMin="([-\d.]+)"\s+yMin="([-\d.]+)"\s+xMax="([-\d.]+)"\s+yMax="([-\d.]+)"\s*>([\s\S]*?)<\/word>/g;

const XML_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

function decodeEntities(text: string): string {
  return text.replace(
    /&(#x[\da-f]+|#\d+|[a-z]+);/gi,
    (entity: string, body: string) => {
      if (body.startsWith('#x') || body.startsWith('#X')) {
        return String.fromCodePoint(parseInt(body.slice(2), 16));
      }
      if (body.startsWith('#')) {
        return String.fromCodePoint(parseInt(body.slice(1), 10));
      }
      return XML_ENTITIES[body] ?? entity;
    },
  );
}

/**
 * Union of boxes. Callers pass at least one box.
 */
export function unionBoxes(boxes: readonly BoundingBox[]): BoundingBox {
  return [
    Math.min(...boxes.map((box) => box[0])),
    Math.min(...boxes.map((box) => box[1])),
    Math.max(...boxes.map((box) => box[2])),
    Math.max(...boxes.map((box) => box[3])),
  ];
}

function parseLine(lineBody: string): LayoutLine | null {
  const words: LayoutWord[] = [];
  for (const match of lineBody.matchAll(WORD_PATTERN)) {
    const text = decodeEntities(match[5]).trim();
    if (!text) continue;
    words.push({
      text,
      box: [
        parseFloat(match[1]),
        parseFloat(match[2]),
        parseFloat(match[3]),
        parseFloat(match[4]),
      ],
    });
  }

  if (words.length === 0) return null;
  return { words, box: unionBoxes(words.map((word) => word.box)) };
}

/**
 * Parse the XHTML written by `pdftotext -bbox-layout`.
 *
 * Pages keep document order; the n-th `<page>` element becomes page n.
 * Words without text and lines without words are skipped.
 */
export function parseBboxLayout(xhtml: string): PageLayout[] {
  const pages: PageLayout[] = [];

  for (const pageMatch of xhtml.matchAll(PAGE_PATTERN)) {
    const blocks: LayoutBlock[] = [];

    for (const blockMatch of pageMatch[3].matchAll(BLOCK_PATTERN)) {
      const lines: LayoutLine[] = [];
      for (const lineMatch of blockMatch[1].matchAll(LINE_PATTERN)) {
        const line = parseLine(lineMatch[1]);
        if (line) lines.push(line);
      }
      if (lines.length > 0) blocks.push({ lines });
    }

    pages.push({
      pageIndex: pages.length + 1,
      width: parseFloat(pageMatch[1]),
      height: parseFloat(pageMatch[2]),
      blocks,
    });
  }

  return pages;
}

/**
 * Text of a line: its words joined by single spaces
 */
export function lineText(line: LayoutLine): string {
  return line.words.map((word) => word.text).join(' ');
}
