import type { GlossaryEntry } from '@tgdoc/model';

import { sortBy } from 'es-toolkit';

import { mapPlainText } from '../utils/math-spans';

const ASCII_WORD_CHAR = /[A-Za-z0-9]/;

/**
 * Replaces source-language terms with their fixed target terms
 *
 * Scans left to right. At each position the longest matching term wins;
 * replaced text is never scanned again. Matching is case-sensitive, and a
 * term edge that is an ASCII letter or digit must sit on a word boundary.
 * Math spans are copied unchanged.
 */
export class GlossaryApplier {
  private readonly entries: readonly GlossaryEntry[];

  constructor(entries: readonly GlossaryEntry[]) {
    this.entries = sortBy(
      entries.filter((entry) => entry.sourceTerm.length > 0),
      [(entry) => -entry.sourceTerm.length],
    );
  }

  apply(text: string): string {
    if (this.entries.length === 0) return text;
    return mapPlainText(text, (plain) => this.applyPlain(plain));
  }

  /**
   * Entries whose source term occurs in the text, longest first
   */
  findTerms(text: string): GlossaryEntry[] {
    return this.entries.filter((entry) => {
      let from = text.indexOf(entry.sourceTerm);
      while (from !== -1) {
        if (this.isBounded(text, from, entry.sourceTerm)) return true;
        from = text.indexOf(entry.sourceTerm, from + 1);
      }
      return false;
    });
  }

  private applyPlain(text: string): string {
    let output = '';
    let cursor = 0;

    while (cursor < text.length) {
      const entry = this.entries.find(
        (candidate) =>
          text.startsWith(candidate.sourceTerm, cursor) &&
          this.isBounded(text, cursor, candidate.sourceTerm),
      );
      if (entry) {
        output += entry.targetTerm;
        cursor += entry.sourceTerm.length;
      } else {
        output += text[cursor];
        cursor++;
      }
    }

    return output;
  }

  private isBounded(text: string, start: number, term: string): boolean {
    const end = start + term.length;
    const startsWord = ASCII_WORD_CHAR.test(term[0]);
    const endsWord = ASCII_WORD_CHAR.test(term[term.length - 1]);

    if (startsWord && start > 0 && ASCII_WORD_CHAR.test(text[start - 1])) {
      return false;
    }
    if (endsWord && end < text.length && ASCII_WORD_CHAR.test(text[end])) {
      return false;
    }
    return true;
  }
}
