import { mapPlainText } from '../utils/math-spans';

/**
 * Named equation recognized on a whole line
 */
export interface EquationTemplate {
  name: string;

  /**
   * Matched against the trimmed line
   */
  pattern: RegExp;

  /**
   * Display math that replaces the line, `$$` delimiters included
   */
  latex: string;
}

export const DEFAULT_EQUATION_TEMPLATES: readonly EquationTemplate[] = [
  {
    name: 'PIF',
    pattern:
      /^PIF\s*=\s*IC\s*[-_]?\s*50\s*\(\s*[-−–]\s*Irr\s*\)\s*\/\s*IC\s*[-_]?\s*50\s*\(\s*\+\s*Irr\s*\)$/i,
    latex:
      '$$\\text{PIF} = \\frac{\\text{IC}_{50}(-\\text{Irr})}{\\text{IC}_{50}(+\\text{Irr})}$$',
  },
  {
    name: 'MPE',
    pattern:
      /^MPE\s*=\s*[Σ∑]\s*w\s*_?\s*i\s*[·×*]?\s*PE\s*_?\s*c\s*,?\s*i\s*\/\s*[Σ∑]\s*w\s*_?\s*i$/i,
    latex:
      '$$\\text{MPE} = \\frac{\\sum_{i} w_i \\, \\text{PE}_{c,i}}{\\sum_{i} w_i}$$',
  },
  {
    name: 'relative viability',
    pattern:
      /^(?:relative\s+)?(?:cell\s+)?viability\s*(?:\(\s*%\s*\))?\s*=\s*\(?\s*OD\s*_?\s*(?:test|treated|sample)\s*\/\s*OD\s*_?\s*(?:solvent\s+)?control\s*\)?\s*(?:[×x*]\s*100)?\s*%?$/i,
    latex:
      '$$\\text{Viability}\\,(\\%) = \\frac{\\text{OD}_{\\text{test}}}{\\text{OD}_{\\text{control}}} \\times 100$$',
  },
];

/**
 * Inline rewrite rule. Lower `priority` wins when two rules match at the
 * same position.
 */
interface InlineRule {
  pattern: RegExp;
  priority: number;
  replace: (match: RegExpExecArray) => string;
}

interface InlineMatch {
  start: number;
  end: number;
  priority: number;
  replacement: string;
}

const CHEMICAL_MARKUP: Record<string, string> = {
  CO2: 'CO$_2$',
  H2O: 'H$_2$O',
  O2: 'O$_2$',
};

/**
 * Unit tokens in alternation order (longer spellings first) with their
 * LaTeX markup
 */
const UNIT_MARKUP: ReadonlyArray<readonly [source: string, latex: string]> = [
  ['mJ/cm[2²]', '\\text{mJ/cm}^2'],
  ['mW/cm[2²]', '\\text{mW/cm}^2'],
  ['J/cm[2²]', '\\text{J/cm}^2'],
  ['W/m[2²]', '\\text{W/m}^2'],
  ['°\\s?C', '^{\\circ}\\text{C}'],
  ['[µμ]g/mL', '\\mu\\text{g/mL}'],
  ['mg/mL', '\\text{mg/mL}'],
  ['mg/L', '\\text{mg/L}'],
  ['[µμ]L', '\\mu\\text{L}'],
  ['mL', '\\text{mL}'],
  ['[µμ]M', '\\mu\\text{M}'],
  ['mM', '\\text{mM}'],
  ['nm', '\\text{nm}'],
  ['min', '\\text{min}'],
  ['h', '\\text{h}'],
];

const UNIT_PATTERNS = UNIT_MARKUP.map(
  ([source, latex]) => [new RegExp(`^(?:${source})$`), latex] as const,
);

function unitMarkup(token: string): string {
  const entry = UNIT_PATTERNS.find(([pattern]) => pattern.test(token));
  return entry ? entry[1] : `\\text{${token}}`;
}

const INLINE_RULES: readonly InlineRule[] = [
  {
    pattern: /(?<![A-Za-z0-9])(IC|EC|LC|LD|ED)(?:\s?[-_]?\s?50|\s?\(50\))(?!\d)/gi,
    priority: 0,
    replace: (match) => `${match[1].toUpperCase()}$_{50}$`,
  },
  {
    pattern: /(?<![A-Za-z0-9])(CO2|H2O|O2)(?![A-Za-z0-9])/g,
    priority: 0,
    replace: (match) => CHEMICAL_MARKUP[match[1]] ?? match[0],
  },
  {
    pattern: new RegExp(
      `(?<![\\w.])(\\d+(?:\\.\\d+)?)[ \\t]*(${UNIT_MARKUP.map(([source]) => source).join('|')})(?![\\w/])`,
      'g',
    ),
    priority: 1,
    replace: (match) => `${match[1]}~$${unitMarkup(match[2])}$`,
  },
];

/**
 * FormulaNormalizer - Rewrites chemistry and unit notation as LaTeX math
 *
 * Works line by line so the line count never changes:
 *
 * 1. A whole line matching an equation template becomes display math.
 * 2. Otherwise compound symbols (`IC50` → `IC$_{50}$`, `CO2` → `CO$_2$`)
 *    and number + unit expressions (`5J/cm2` → `5~$\text{J/cm}^2$`) are
 *    rewritten inline. The leftmost match wins; at the same start the
 *    compound symbol wins, then the longer match.
 *
 * Existing `$…$` and `$$…$$` spans are never rescanned, so normalizing
 * twice gives the same text as normalizing once.
 */
export class FormulaNormalizer {
  constructor(
    private readonly templates: readonly EquationTemplate[] = DEFAULT_EQUATION_TEMPLATES,
  ) {}

  normalize(text: string): string {
    return text
      .split('\n')
      .map((line) => this.normalizeLine(line))
      .join('\n');
  }

  normalizeLine(line: string): string {
    const trimmed = line.trim();
    const template = this.templates.find((t) => t.pattern.test(trimmed));
    if (template) {
      return template.latex;
    }
    return mapPlainText(line, (plain) => this.rewriteInline(plain));
  }

  private rewriteInline(text: string): string {
    let output = '';
    let cursor = 0;

    for (;;) {
      const next = this.findNextMatch(text, cursor);
      if (!next) break;
      output += text.slice(cursor, next.start) + next.replacement;
      cursor = next.end;
    }

    return output + text.slice(cursor);
  }

  private findNextMatch(text: string, from: number): InlineMatch | undefined {
    let best: InlineMatch | undefined;

    for (const rule of INLINE_RULES) {
      rule.pattern.lastIndex = from;
      const match = rule.pattern.exec(text);
      if (!match) continue;

      const candidate: InlineMatch = {
        start: match.index,
        end: match.index + match[0].length,
        priority: rule.priority,
        replacement: rule.replace(match),
      };
      if (!best || this.isBetter(candidate, best)) {
        best = candidate;
      }
    }

    return best;
  }

  private isBetter(candidate: InlineMatch, current: InlineMatch): boolean {
    if (candidate.start !== current.start) {
      return candidate.start < current.start;
    }
    if (candidate.priority !== current.priority) {
      return candidate.priority < current.priority;
    }
    return candidate.end - candidate.start > current.end - current.start;
  }
}
