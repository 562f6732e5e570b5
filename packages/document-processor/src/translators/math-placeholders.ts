import { splitMathSpans } from '../utils/math-spans';

const PLACEHOLDER_PATTERN = /⟦M(\d+)⟧/g;

export interface MaskedText {
  /**
   * Text with every math span replaced by `⟦M1⟧`, `⟦M2⟧` …
   */
  masked: string;

  /**
   * Original spans; `spans[n - 1]` belongs to `⟦Mn⟧`
   */
  spans: string[];
}

export function maskMath(text: string): MaskedText {
  const spans: string[] = [];
  const masked = splitMathSpans(text)
    .map((segment) => {
      if (!segment.math) return segment.text;
      spans.push(segment.text);
      return `⟦M${spans.length}⟧`;
    })
    .join('');

  return { masked, spans };
}

/**
 * Placeholders in order of appearance
 */
export function placeholderSequence(text: string): string[] {
  return text.match(PLACEHOLDER_PATTERN) ?? [];
}

/**
 * Put the original spans back, byte for byte. Unknown placeholders are
 * left as they are.
 */
export function restoreMath(text: string, spans: readonly string[]): string {
  return text.replace(
    PLACEHOLDER_PATTERN,
    (placeholder, index: string) => spans[Number(index) - 1] ?? placeholder,
  );
}
