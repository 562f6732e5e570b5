import { describe, expect, test } from 'vitest';

import { FormulaNormalizer } from './formula-normalizer';

describe('FormulaNormalizer', () => {
  const normalizer = new FormulaNormalizer();

  describe('unit expressions', () => {
    test('rewrites a dose with no space before the unit', () => {
      expect(normalizer.normalize('5J/cm2 was applied')).toBe(
        '5~$\\text{J/cm}^2$ was applied',
      );
    });

    test('drops the spaces between number and unit', () => {
      expect(normalizer.normalize('irradiated with 1.7 mW/cm2 for 50 min')).toBe(
        'irradiated with 1.7~$\\text{mW/cm}^2$ for 50~$\\text{min}$',
      );
    });

    test('prefers the longer unit spelling', () => {
      expect(normalizer.normalize('at 10 mJ/cm2 and 100 mg/mL or 2 mg/L')).toBe(
        'at 10~$\\text{mJ/cm}^2$ and 100~$\\text{mg/mL}$ or 2~$\\text{mg/L}$',
      );
    });

    test('accepts both micro signs', () => {
      expect(normalizer.normalize('10 µg/mL and 10 μg/mL')).toBe(
        '10~$\\mu\\text{g/mL}$ and 10~$\\mu\\text{g/mL}$',
      );
    });

    test('rewrites temperatures and concentrations', () => {
      expect(normalizer.normalize('kept at 37 °C with 0.5 mM for 24 h.')).toBe(
        'kept at 37~$^{\\circ}\\text{C}$ with 0.5~$\\text{mM}$ for 24~$\\text{h}$.',
      );
    });

    test('leaves words that only start with a unit', () => {
      expect(normalizer.normalize('after 5 hours and 3 minutes')).toBe(
        'after 5 hours and 3 minutes',
      );
    });

    test('leaves numbers glued to a preceding word', () => {
      expect(normalizer.normalize('Balb/c 3T3 clone A31 h')).toBe(
        'Balb/c 3T3 clone A31 h',
      );
    });
  });

  describe('compound symbols', () => {
    test('rewrites the IC50 spellings', () => {
      expect(normalizer.normalize('IC50, IC 50, IC-50, IC_50 and ic(50)')).toBe(
        'IC$_{50}$, IC$_{50}$, IC$_{50}$, IC$_{50}$ and IC$_{50}$',
      );
    });

    test('rewrites the other toxicity endpoints', () => {
      expect(normalizer.normalize('EC50 LC50 LD50 ED50')).toBe(
        'EC$_{50}$ LC$_{50}$ LD$_{50}$ ED$_{50}$',
      );
    });

    test('rewrites gas and water formulas', () => {
      expect(normalizer.normalize('5% CO2 in air, O2 and H2O')).toBe(
        '5% CO$_2$ in air, O$_2$ and H$_2$O',
      );
    });

    test('leaves formulas embedded in longer tokens', () => {
      expect(normalizer.normalize('H2O2 and pIC50 and IC500')).toBe(
        'H2O2 and pIC50 and IC500',
      );
    });

    test('rewrites a compound symbol and a unit on the same line', () => {
      expect(normalizer.normalize('an IC50 of 12 µM')).toBe(
        'an IC$_{50}$ of 12~$\\mu\\text{M}$',
      );
    });
  });

  describe('equation templates', () => {
    test('replaces a PIF line with display math', () => {
      expect(normalizer.normalize('  PIF = IC50(-Irr) / IC50(+Irr)')).toBe(
        '$$\\text{PIF} = \\frac{\\text{IC}_{50}(-\\text{Irr})}{\\text{IC}_{50}(+\\text{Irr})}$$',
      );
    });

    test('replaces an MPE line with display math', () => {
      expect(normalizer.normalize('MPE = Σ wi PEc,i / Σ wi')).toBe(
        '$$\\text{MPE} = \\frac{\\sum_{i} w_i \\, \\text{PE}_{c,i}}{\\sum_{i} w_i}$$',
      );
    });

    test('replaces a relative viability line with display math', () => {
      expect(
        normalizer.normalize('Relative viability (%) = OD test / OD control × 100'),
      ).toBe(
        '$$\\text{Viability}\\,(\\%) = \\frac{\\text{OD}_{\\text{test}}}{\\text{OD}_{\\text{control}}} \\times 100$$',
      );
    });

    test('only claims whole lines', () => {
      expect(normalizer.normalize('The PIF = IC50(-Irr) / IC50(+Irr) ratio')).toBe(
        'The PIF = IC$_{50}$(-Irr) / IC$_{50}$(+Irr) ratio',
      );
    });

    test('accepts custom templates', () => {
      const custom = new FormulaNormalizer([
        { name: 'sum', pattern: /^a \+ b$/, latex: '$$a + b$$' },
      ]);

      expect(custom.normalize('a + b\nPIF = IC50(-Irr) / IC50(+Irr)')).toBe(
        '$$a + b$$\nPIF = IC$_{50}$(-Irr) / IC$_{50}$(+Irr)',
      );
    });
  });

  describe('existing math', () => {
    test('never rewrites inside math spans', () => {
      const text = 'IC$_{50}$ of $5 mM$ and $$CO2$$';
      expect(normalizer.normalize(text)).toBe(text);
    });
  });

  test('keeps the line count', () => {
    const text = 'line one 5 h\n\n\n[TABLE]\nIC50\n';
    const result = normalizer.normalize(text);

    expect(result.split('\n')).toHaveLength(text.split('\n').length);
    expect(result).toBe('line one 5~$\\text{h}$\n\n\n[TABLE]\nIC$_{50}$\n');
  });

  test('is idempotent', () => {
    const samples = [
      '5J/cm2 was applied',
      'IC50 values at 37 °C and 5% CO2',
      'PIF = IC50(-Irr) / IC50(+Irr)',
      'costs $5 at 5 h',
      '10 µg/mL, 2.5 mg/L, 0.1 mM, 320 nm',
      'H2O2 and pIC50',
    ];

    for (const sample of samples) {
      const once = normalizer.normalize(sample);
      expect(normalizer.normalize(once)).toBe(once);
    }
  });
});
