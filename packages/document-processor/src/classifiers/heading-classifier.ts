import type { LoggerMethods } from '@tgdoc/logger';
import type { HeadingLevel } from '@tgdoc/model';

import { median } from 'es-toolkit';

import { HEADING_CLASSIFIER } from '../config/constants';
import { stripMathSpans } from '../utils/math-spans';
import { TextCleaner } from '../utils/text-cleaner';
import { SECTION_VOCABULARY, vocabularyKey } from './section-vocabulary';

export type SignalName =
  | 'short'
  | 'all-upper'
  | 'no-trailing-punctuation'
  | 'preceded-by-break'
  | 'followed-by-prose'
  | 'section-vocabulary'
  | 'numbered'
  | 'terminal-punctuation'
  | 'no-verb';

export interface ScoreSignal {
  name: SignalName;
  weight: number;
}

/**
 * Every signal that fired for a line, with the resulting total
 */
export interface ScoreBreakdown {
  signals: ScoreSignal[];
  total: number;
  threshold: number;

  /**
   * Body line whose total came within reach of the threshold
   */
  ambiguous: boolean;

  /**
   * Set when a heading-scoring line was demoted to body
   */
  downgrade?: 'short-line-run';
}

export type HeadingDecision =
  | { kind: 'heading'; level: HeadingLevel }
  | { kind: 'body' };

export interface Classification {
  decision: HeadingDecision;
  breakdown: ScoreBreakdown;
}

export interface ClassificationContext {
  /**
   * Median length of the non-blank lines on the page; 0 when unknown
   */
  medianLineLength: number;

  /**
   * Whether the line directly above was classified as a heading
   */
  previousIsHeading: boolean;
}

export interface PageClassification {
  /**
   * Heading level by line index, one map per page
   */
  headings: Map<number, HeadingLevel>[];

  /**
   * Body lines scoring between the ambiguity threshold and the threshold
   */
  ambiguousCount: number;
}

export interface HeadingClassifierOptions {
  /**
   * Score a heading must exceed (default: 4.5)
   */
  threshold?: number;

  /**
   * Score above which a body line counts as ambiguous (default: 3.5)
   */
  ambiguityThreshold?: number;

  vocabulary?: ReadonlySet<string>;
}

const NUMBERED_PATTERN = /^([1-9]\d?(?:\.\d{1,2}){0,3})\.?\s+\S/;
const PLACEHOLDER_PATTERN = /^\[(?:TABLE|FIGURE)(?::[^\]]*)?\]$/i;
const VERB_LIKE_WORDS = new Set([
  'is',
  'are',
  'was',
  'were',
  'be',
  'been',
  'being',
  'has',
  'have',
  'had',
  'do',
  'does',
  'did',
  'can',
  'could',
  'should',
  'would',
  'may',
  'might',
  'must',
  'shall',
  'will',
]);

const { WEIGHTS } = HEADING_CLASSIFIER;

/**
 * HeadingClassifier - Decides which lines of a page are section headings
 *
 * Each line gets an additive score from independent signals (length, case,
 * punctuation, surrounding lines, section vocabulary, numbering). A line is
 * a heading only when the score is strictly above the threshold, so ties
 * resolve to body text. A heading directly adjacent to another short
 * fragment is demoted, since such runs are usually table debris or
 * wrapped captions.
 */
export class HeadingClassifier {
  private readonly logger: LoggerMethods;
  private readonly threshold: number;
  private readonly ambiguityThreshold: number;
  private readonly vocabulary: ReadonlySet<string>;

  constructor(logger: LoggerMethods, options: HeadingClassifierOptions = {}) {
    this.logger = logger;
    this.threshold = options.threshold ?? HEADING_CLASSIFIER.THRESHOLD;
    this.ambiguityThreshold =
      options.ambiguityThreshold ?? HEADING_CLASSIFIER.AMBIGUITY_THRESHOLD;
    this.vocabulary = options.vocabulary ?? SECTION_VOCABULARY;
  }

  /**
   * Score one line
   *
   * @param precedingLines - Lines above, nearest last
   * @param followingLines - Lines below, nearest first
   */
  classify(
    line: string,
    precedingLines: readonly string[],
    followingLines: readonly string[],
    context: ClassificationContext,
  ): Classification {
    const text = line.trim();
    const median = context.medianLineLength;
    const signals: ScoreSignal[] = [];
    const fire = (name: SignalName, weight: number) =>
      signals.push({ name, weight });

    const short = this.isShort(text, median);
    const numbered = NUMBERED_PATTERN.exec(text);
    const previous = precedingLines.at(-1)?.trim();
    // Short fragments right below are judged by the downgrade rule instead
    const nextProse = followingLines
      .map((candidate) => candidate.trim())
      .find(
        (candidate) =>
          candidate !== '' && !this.isShortFragment(candidate, median),
      );

    if (short) fire('short', WEIGHTS.SHORT);
    if (TextCleaner.isAllCaps(text)) fire('all-upper', WEIGHTS.ALL_UPPER);
    if (!/[.,;:]$/.test(text)) {
      fire('no-trailing-punctuation', WEIGHTS.NO_TRAILING_PUNCTUATION);
    }
    if (previous === undefined || previous === '' || context.previousIsHeading) {
      fire('preceded-by-break', WEIGHTS.PRECEDED_BY_BREAK);
    }
    if (nextProse !== undefined && this.isProse(nextProse, median)) {
      fire('followed-by-prose', WEIGHTS.FOLLOWED_BY_PROSE);
    }
    if (this.vocabulary.has(vocabularyKey(text))) {
      fire('section-vocabulary', WEIGHTS.SECTION_VOCABULARY);
    }
    if (numbered) fire('numbered', WEIGHTS.NUMBERED);
    if (/[.,]$/.test(text)) {
      fire('terminal-punctuation', WEIGHTS.TERMINAL_PUNCTUATION);
    }
    if (short && !this.hasVerbLikeToken(text)) {
      fire('no-verb', WEIGHTS.NO_VERB);
    }

    const total = signals.reduce((sum, signal) => sum + signal.weight, 0);
    const breakdown: ScoreBreakdown = {
      signals,
      total,
      threshold: this.threshold,
      ambiguous: false,
    };

    if (total <= this.threshold) {
      breakdown.ambiguous = total > this.ambiguityThreshold;
      return { decision: { kind: 'body' }, breakdown };
    }

    const next = followingLines.at(0)?.trim();
    const previousFragment =
      previous !== undefined &&
      !context.previousIsHeading &&
      this.isShortFragment(previous, median);
    const nextFragment =
      next !== undefined && this.isShortFragment(next, median);

    if (previousFragment || nextFragment) {
      breakdown.downgrade = 'short-line-run';
      breakdown.ambiguous = true;
      return { decision: { kind: 'body' }, breakdown };
    }

    return {
      decision: { kind: 'heading', level: this.levelOf(numbered) },
      breakdown,
    };
  }

  /**
   * Classify the lines of every page.
   *
   * Pass 1 looks at each page on its own. Pass 2 reclassifies the last
   * candidate line of each page with the next page's lines as look-ahead.
   * A page boundary counts as a blank line.
   */
  classifyPages(pages: readonly string[]): PageClassification {
    const pageLines = pages.map((page) => page.split('\n'));
    const medians = pageLines.map((lines) => this.medianLength(lines));

    const results = pageLines.map((lines, pageIdx) =>
      this.classifyPage(lines, medians[pageIdx]),
    );

    for (let pageIdx = 0; pageIdx < pageLines.length - 1; pageIdx++) {
      const lines = pageLines[pageIdx];
      const last = this.lastCandidateIndex(lines);
      if (last === undefined) continue;

      results[pageIdx][last] = this.classify(
        lines[last],
        lines.slice(0, last),
        [...lines.slice(last + 1), '', ...pageLines[pageIdx + 1]],
        {
          medianLineLength: medians[pageIdx],
          previousIsHeading:
            results[pageIdx][last - 1]?.decision.kind === 'heading',
        },
      );
    }

    let ambiguousCount = 0;
    const headings = results.map((classifications) => {
      const levels = new Map<number, HeadingLevel>();
      classifications.forEach((classification, lineIdx) => {
        if (!classification) return;
        if (classification.decision.kind === 'heading') {
          levels.set(lineIdx, classification.decision.level);
        } else if (classification.breakdown.ambiguous) {
          ambiguousCount++;
        }
      });
      return levels;
    });

    const headingCount = headings.reduce((sum, map) => sum + map.size, 0);
    this.logger.info(
      `[HeadingClassifier] Found ${headingCount} headings on ${pages.length} pages (${ambiguousCount} ambiguous lines)`,
    );

    return { headings, ambiguousCount };
  }

  private classifyPage(
    lines: readonly string[],
    medianLineLength: number,
  ): Array<Classification | undefined> {
    const classifications: Array<Classification | undefined> = [];

    lines.forEach((line, lineIdx) => {
      if (!this.isCandidate(line)) {
        classifications[lineIdx] = undefined;
        return;
      }
      classifications[lineIdx] = this.classify(
        line,
        lines.slice(0, lineIdx),
        lines.slice(lineIdx + 1),
        {
          medianLineLength,
          previousIsHeading:
            classifications[lineIdx - 1]?.decision.kind === 'heading',
        },
      );
    });

    return classifications;
  }

  /**
   * Lines that can never be headings: blanks, page numbers, placeholders
   * and display math
   */
  private isCandidate(line: string): boolean {
    const text = line.trim();
    return (
      TextCleaner.isValidText(text) &&
      !PLACEHOLDER_PATTERN.test(text) &&
      !text.startsWith('$$')
    );
  }

  private lastCandidateIndex(lines: readonly string[]): number | undefined {
    for (let lineIdx = lines.length - 1; lineIdx >= 0; lineIdx--) {
      if (this.isCandidate(lines[lineIdx])) return lineIdx;
    }
    return undefined;
  }

  private medianLength(lines: readonly string[]): number {
    const lengths = lines
      .map((line) => line.trim().length)
      .filter((length) => length > 0);
    return lengths.length > 0 ? median(lengths) : 0;
  }

  private isShort(text: string, medianLineLength: number): boolean {
    return medianLineLength > 0
      ? text.length <= HEADING_CLASSIFIER.SHORT_LINE_RATIO * medianLineLength
      : text.length <= HEADING_CLASSIFIER.SHORT_LINE_FALLBACK;
  }

  private isProse(text: string, medianLineLength: number): boolean {
    if (!this.isCandidate(text) || TextCleaner.isAllCaps(text)) return false;
    return !this.isShort(text, medianLineLength) || /[.!?;:,]$/.test(text);
  }

  private isShortFragment(text: string, medianLineLength: number): boolean {
    return (
      this.isCandidate(text) &&
      this.isShort(text, medianLineLength) &&
      !/[.!?;:,]$/.test(text)
    );
  }

  private hasVerbLikeToken(text: string): boolean {
    const words = stripMathSpans(text)
      .toLowerCase()
      .match(/\p{L}+/gu);
    return (words ?? []).some(
      (word) =>
        VERB_LIKE_WORDS.has(word) || (word.length > 4 && word.endsWith('ed')),
    );
  }

  private levelOf(numbered: RegExpExecArray | null): HeadingLevel {
    if (!numbered) return 3;
    const depth = numbered[1].split('.').length;
    if (depth === 1) return 2;
    if (depth === 2) return 3;
    return 4;
  }
}
