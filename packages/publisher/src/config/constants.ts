/**
 * Configuration constants for GuidelinePublisher
 */
export const PUBLISHER = {
  /**
   * Title used when none is given, followed by the guideline number
   */
  DEFAULT_TITLE_PREFIX: 'OECD Test Guideline No.',

  /**
   * Keywords written to the frontmatter when none are given
   */
  DEFAULT_KEYWORDS: ['OECD', 'test guideline', 'toxicology', 'in vitro'],

  /**
   * First run of three digits in the PDF file name is the guideline number
   */
  DOC_NUMBER_PATTERN: /\d{3}/,
} as const;
