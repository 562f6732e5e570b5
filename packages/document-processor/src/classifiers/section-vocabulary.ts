/**
 * Section titles that recur across test guidelines, lower-case
 */
export const SECTION_VOCABULARY: ReadonlySet<string> = new Set([
  'introduction',
  'initial considerations',
  'initial considerations and limitations',
  'definitions',
  'principle of the test',
  'principle of the test method',
  'description of the method',
  'description of the test method',
  'preparations',
  'preparation of cells',
  'cell culture',
  'test chemical',
  'test chemicals',
  'test conditions',
  'solvents',
  'controls',
  'positive control',
  'irradiation conditions',
  'dosimetry',
  'procedure',
  'test procedure',
  'data and reporting',
  'data',
  'results',
  'evaluation of results',
  'interpretation of results',
  'acceptance criteria',
  'acceptability criteria',
  'prediction model',
  'discussion',
  'limitations of the test',
  'applicability domain',
  'proficiency of the laboratory',
  'test report',
  'conclusions',
]);

/**
 * Lower-cased title with leading numbering and trailing punctuation removed
 */
export function vocabularyKey(line: string): string {
  return line
    .trim()
    .replace(/^[1-9]\d?(?:\.\d{1,2})*\.?\s+/, '')
    .replace(/[\s.:;,]+$/, '')
    .replace(/\s+/g, ' ')
    .toLowerCase();
}
