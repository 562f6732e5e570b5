import { describe, expect, test } from 'vitest';

import { PublishError } from '../errors/publish-error';
import {
  docNumberFromFileName,
  fileStem,
  parseMetadata,
  resolveFrontmatter,
} from './publication-metadata';

const now = new Date('2026-10-19T08:00:00Z');

describe('parseMetadata', () => {
  test('accepts missing metadata', () => {
    expect(parseMetadata(undefined)).toEqual({});
  });

  test('trims text fields', () => {
    expect(
      parseMetadata({ title: '  Phototoxicity  ', keywords: [' NRU '] }),
    ).toEqual({ title: 'Phototoxicity', keywords: ['NRU'] });
  });

  test('rejects invalid dates and numbers', () => {
    expect(() =>
      parseMetadata({ docNumber: 'TG432', date: '19/10/2026' }),
    ).toThrow(PublishError);
    expect(() => parseMetadata({ docNumber: 'TG432' })).toThrow(
      /^Invalid publication metadata:\n/,
    );
  });

  test('rejects empty titles', () => {
    expect(() => parseMetadata({ title: '   ' })).toThrow(PublishError);
  });
});

describe('docNumberFromFileName', () => {
  test('takes the first three digits of the file name', () => {
    expect(docNumberFromFileName('/in/OECD_TG_432_2019.pdf')).toBe('432');
  });

  test('ignores digits in directory names', () => {
    expect(docNumberFromFileName('/data/2019/guideline.pdf')).toBeUndefined();
  });
});

describe('fileStem', () => {
  test('drops directory and extension', () => {
    expect(fileStem('/in/OECD_TG_432.pdf')).toBe('OECD_TG_432');
  });
});

describe('resolveFrontmatter', () => {
  test('derives number, title, date and keywords', () => {
    expect(resolveFrontmatter('/in/OECD_TG_432.pdf', {}, now)).toEqual({
      title: 'OECD Test Guideline No. 432',
      docNumber: '432',
      date: '2026-10-19',
      keywords: ['OECD', 'test guideline', 'toxicology', 'in vitro'],
    });
  });

  test('keeps the given metadata', () => {
    expect(
      resolveFrontmatter(
        '/in/OECD_TG_432.pdf',
        {
          title: 'In Vitro 3T3 NRU Phototoxicity Test',
          subtitle: 'Section 4',
          docNumber: '101',
          date: '2026-01-02',
          publicationDate: '2019-06-18',
          keywords: ['NRU'],
        },
        now,
      ),
    ).toEqual({
      title: 'In Vitro 3T3 NRU Phototoxicity Test',
      subtitle: 'Section 4',
      docNumber: '101',
      date: '2026-01-02',
      publicationDate: '2019-06-18',
      keywords: ['NRU'],
    });
  });

  test('falls back to the file stem without a number', () => {
    expect(resolveFrontmatter('/in/guideline.pdf', {}, now)).toEqual({
      title: 'guideline',
      date: '2026-10-19',
      keywords: ['OECD', 'test guideline', 'toxicology', 'in vitro'],
    });
  });
});
