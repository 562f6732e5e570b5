import { describe, expect, test } from 'vitest';

import { mapPlainText, splitMathSpans, stripMathSpans } from './math-spans';

describe('splitMathSpans', () => {
  test('separates inline and display math from plain text', () => {
    expect(splitMathSpans('IC$_{50}$ is $$x$$ here')).toEqual([
      { text: 'IC', math: false },
      { text: '$_{50}$', math: true },
      { text: ' is ', math: false },
      { text: '$$x$$', math: true },
      { text: ' here', math: false },
    ]);
  });

  test('returns a single plain segment when there is no math', () => {
    expect(splitMathSpans('plain text')).toEqual([
      { text: 'plain text', math: false },
    ]);
  });

  test('leaves an unmatched dollar sign in plain text', () => {
    expect(splitMathSpans('costs $5')).toEqual([
      { text: 'costs $5', math: false },
    ]);
  });

  test('returns no segments for empty text', () => {
    expect(splitMathSpans('')).toEqual([]);
  });
});

describe('mapPlainText', () => {
  test('transforms only plain segments', () => {
    expect(mapPlainText('a $b$ c', (plain) => plain.toUpperCase())).toBe(
      'A $b$ C',
    );
  });
});

describe('stripMathSpans', () => {
  test('removes every math span', () => {
    expect(stripMathSpans('UNITS $\\text{mL}$ AND $$y$$')).toBe('UNITS  AND ');
  });
});
