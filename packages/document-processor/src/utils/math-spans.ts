/**
 * Inline `$…$` or display `$$…$$` math markup
 */
export const MATH_SPAN_PATTERN = /\$\$[\s\S]+?\$\$|\$[^$\n]+?\$/g;

export interface TextSegment {
  text: string;
  math: boolean;
}

/**
 * Split text into alternating plain and math segments. Joining the
 * segment texts gives back the input.
 */
export function splitMathSpans(text: string): TextSegment[] {
  const pattern = new RegExp(MATH_SPAN_PATTERN.source, 'g');
  const segments: TextSegment[] = [];
  let cursor = 0;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    if (match.index > cursor) {
      segments.push({ text: text.slice(cursor, match.index), math: false });
    }
    segments.push({ text: match[0], math: true });
    cursor = match.index + match[0].length;
  }

  if (cursor < text.length) {
    segments.push({ text: text.slice(cursor), math: false });
  }

  return segments;
}

/**
 * Apply `transform` to every plain segment; math segments are copied as is.
 */
export function mapPlainText(
  text: string,
  transform: (plain: string) => string,
): string {
  return splitMathSpans(text)
    .map((segment) => (segment.math ? segment.text : transform(segment.text)))
    .join('');
}

/**
 * Text with every math span removed
 */
export function stripMathSpans(text: string): string {
  return splitMathSpans(text)
    .filter((segment) => !segment.math)
    .map((segment) => segment.text)
    .join('');
}
