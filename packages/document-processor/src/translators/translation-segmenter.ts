import { GLOSSARY_TRANSLATOR } from '../config/constants';
import { splitMathSpans } from '../utils/math-spans';

const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;
// Math spans are swapped for private-use tokens while splitting
const MATH_TOKEN = /\uE000(\d+)\uE001/g;

/**
 * Split block text into translation units of at most `maxUnitLength`
 * characters.
 *
 * Sentences are packed greedily into units. A sentence longer than the
 * limit is split at whitespace, and a single word longer than the limit is
 * cut. Math spans are measured and kept as one piece. Whitespace runs
 * outside math collapse to a single space.
 */
export function segmentText(
  text: string,
  maxUnitLength: number = GLOSSARY_TRANSLATOR.MAX_UNIT_LENGTH,
): string[] {
  const spans: string[] = [];
  const masked = splitMathSpans(text)
    .map((segment) => {
      if (!segment.math) return segment.text;
      spans.push(segment.text);
      return `\uE000${spans.length - 1}\uE001`;
    })
    .join('')
    .replace(/\s+/g, ' ')
    .trim();
  if (!masked) return [];

  const pieces = masked
    .split(SENTENCE_BOUNDARY)
    .flatMap((sentence) =>
      sentence.length <= maxUnitLength
        ? [sentence]
        : pack(
            sentence.split(' ').flatMap((word) => cutWord(word, maxUnitLength)),
            maxUnitLength,
          ),
    );

  return pack(pieces, maxUnitLength).map((unit) =>
    unit.replace(MATH_TOKEN, (_token, index: string) => spans[Number(index)]),
  );
}

/**
 * Greedily join pieces with a space while they fit
 */
function pack(pieces: readonly string[], maxUnitLength: number): string[] {
  const units: string[] = [];
  let current = '';

  for (const piece of pieces) {
    if (!current) {
      current = piece;
    } else if (current.length + 1 + piece.length <= maxUnitLength) {
      current += ` ${piece}`;
    } else {
      units.push(current);
      current = piece;
    }
  }
  if (current) units.push(current);

  return units;
}

function cutWord(word: string, maxUnitLength: number): string[] {
  if (word.length <= maxUnitLength) return [word];

  const parts: string[] = [];
  for (let start = 0; start < word.length; start += maxUnitLength) {
    parts.push(word.slice(start, start + maxUnitLength));
  }
  return parts;
}
