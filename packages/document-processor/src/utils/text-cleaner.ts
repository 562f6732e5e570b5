import { splitMathSpans, stripMathSpans } from './math-spans';

/**
 * TextCleaner - Line and heading text helpers
 *
 * - Whitespace and Unicode normalization
 * - Page-number detection
 * - Joining wrapped lines into one paragraph
 * - Upper-case detection and title-casing that leave math markup alone
 */
export class TextCleaner {
  /**
   * Normalizes text
   * - Converts consecutive spaces/line breaks to single space
   * - Trims leading and trailing spaces
   * - Normalizes special whitespace characters (tabs, non-breaking spaces, etc.)
   */
  static normalize(text: string): string {
    if (!text) return '';

    return text
      .normalize('NFC')
      .replace(/[\t\u00A0\u2000-\u200B]/g, ' ')
      .replace(/\s+/g, ' ')
      .trim();
  }

  /**
   * False for empty text and for text made only of digits and spaces
   * (page numbers)
   */
  static isValidText(text: string): boolean {
    if (!text) return false;
    return !/^[\d\s]*$/.test(this.normalize(text));
  }

  /**
   * Join wrapped lines with a space. A line ending in `-` is joined to the
   * next one directly, keeping the hyphen.
   */
  static joinLines(lines: readonly string[]): string {
    let joined = '';
    for (const line of lines) {
      const text = this.normalize(line);
      if (!text) continue;
      if (!joined) {
        joined = text;
      } else {
        joined += joined.endsWith('-') ? text : ` ${text}`;
      }
    }
    return joined;
  }

  /**
   * True when the letters outside math spans are all upper-case
   * (at least two of them)
   */
  static isAllCaps(text: string): boolean {
    const letters = stripMathSpans(text).replace(/[^\p{L}]/gu, '');

    return (
      letters.length >= 2 &&
      letters === letters.toUpperCase() &&
      letters !== letters.toLowerCase()
    );
  }

  /**
   * `PRINCIPLE OF THE TEST` → `Principle Of The Test`
   *
   * Words containing digits or touching math markup keep their spelling.
   */
  static toTitleCase(text: string): string {
    const mathRanges: Array<[number, number]> = [];
    let offset = 0;
    for (const segment of splitMathSpans(text)) {
      if (segment.math) {
        mathRanges.push([offset, offset + segment.text.length]);
      }
      offset += segment.text.length;
    }

    return text.replace(/\S+/g, (word: string, start: number) => {
      const end = start + word.length;
      const touchesMath = mathRanges.some(
        ([from, to]) => start < to && end > from,
      );
      if (touchesMath || word.includes('$') || /\d/.test(word)) {
        return word;
      }
      return word.toLowerCase().replace(/\p{L}/u, (first) => first.toUpperCase());
    });
  }
}
