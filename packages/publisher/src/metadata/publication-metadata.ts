import type { DocumentFrontmatter } from '@tgdoc/model';

import { basename, extname } from 'node:path';
import { z } from 'zod';

import { PUBLISHER } from '../config/constants';
import { PublishError } from '../errors/publish-error';

const text = z.string().trim().min(1);

export const PublicationMetadataSchema = z.object({
  title: text.optional(),
  subtitle: text.optional(),
  docNumber: z
    .string()
    .regex(/^\d+$/, 'Guideline number must contain only digits')
    .optional(),
  date: z.iso.date().optional(),
  publicationDate: z.iso.date().optional(),
  keywords: z.array(text).optional(),
});

export type PublicationMetadata = z.infer<typeof PublicationMetadataSchema>;

/**
 * Validate caller-supplied metadata
 *
 * @throws {PublishError} Listing every invalid field
 */
export function parseMetadata(data: unknown): PublicationMetadata {
  const result = PublicationMetadataSchema.safeParse(data ?? {});
  if (!result.success) {
    throw new PublishError(
      `Invalid publication metadata:\n${z.prettifyError(result.error)}`,
      { cause: result.error },
    );
  }
  return result.data;
}

/**
 * Guideline number taken from the PDF file name, e.g. `432` for
 * `OECD_TG_432_2019.pdf`
 */
export function docNumberFromFileName(pdfPath: string): string | undefined {
  return PUBLISHER.DOC_NUMBER_PATTERN.exec(basename(pdfPath))?.[0];
}

/**
 * File name without directory and extension
 */
export function fileStem(pdfPath: string): string {
  return basename(pdfPath, extname(pdfPath));
}

/**
 * Fill the gaps in the metadata with defaults derived from the PDF file
 * name and the current date.
 */
export function resolveFrontmatter(
  pdfPath: string,
  metadata: PublicationMetadata,
  now: Date = new Date(),
): DocumentFrontmatter {
  const docNumber = metadata.docNumber ?? docNumberFromFileName(pdfPath);
  const title =
    metadata.title ??
    (docNumber
      ? `${PUBLISHER.DEFAULT_TITLE_PREFIX} ${docNumber}`
      : fileStem(pdfPath));

  return {
    title,
    ...(metadata.subtitle ? { subtitle: metadata.subtitle } : {}),
    ...(docNumber ? { docNumber } : {}),
    date: metadata.date ?? now.toISOString().slice(0, 10),
    ...(metadata.publicationDate
      ? { publicationDate: metadata.publicationDate }
      : {}),
    keywords: metadata.keywords ?? [...PUBLISHER.DEFAULT_KEYWORDS],
  };
}
