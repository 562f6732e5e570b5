/**
 * Fixed terminology mapping applied after translation
 *
 * Matching on `sourceTerm` is case-sensitive; when entries overlap the
 * longest one wins.
 */
export interface GlossaryEntry {
  sourceTerm: string;
  targetTerm: string;
  note?: string;
}
