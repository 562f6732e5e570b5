import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { GlossaryError } from './translation-errors';

export const GlossaryFileSchema = z
  .object({
    sourceLanguage: z.string().min(1),
    targetLanguage: z.string().min(1),
    entries: z.array(
      z.object({
        sourceTerm: z.string().min(1),
        targetTerm: z.string().min(1),
        note: z.string().optional(),
      }),
    ),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.entries.forEach((entry, index) => {
      if (seen.has(entry.sourceTerm)) {
        ctx.addIssue({
          code: 'custom',
          message: `Duplicate source term "${entry.sourceTerm}"`,
          path: ['entries', index, 'sourceTerm'],
        });
      }
      seen.add(entry.sourceTerm);
    });
  });

export type GlossaryFile = z.infer<typeof GlossaryFileSchema>;

/**
 * English → Simplified Chinese toxicology glossary shipped with the package
 */
export const DEFAULT_GLOSSARY_PATH = fileURLToPath(
  new URL('../../glossary/en-zh.json', import.meta.url),
);

/**
 * Validate already-parsed glossary JSON
 *
 * @param source - Name used in error messages
 */
export function parseGlossary(
  data: unknown,
  source: string = 'glossary',
): GlossaryFile {
  const result = GlossaryFileSchema.safeParse(data);
  if (!result.success) {
    throw new GlossaryError(
      `Invalid ${source}:\n${z.prettifyError(result.error)}`,
      { cause: result.error },
    );
  }
  return result.data;
}

/**
 * Read and validate a glossary JSON file
 */
export async function loadGlossary(
  path: string = DEFAULT_GLOSSARY_PATH,
): Promise<GlossaryFile> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw GlossaryError.fromError(`Cannot read glossary ${path}`, error);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw GlossaryError.fromError(`Glossary ${path} is not valid JSON`, error);
  }

  return parseGlossary(data, `glossary ${path}`);
}
