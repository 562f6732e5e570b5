/**
 * @tgdoc/publisher
 *
 * Publishes a test guideline PDF as a source-language and a target-language
 * Quarto document sharing one `images/` directory.
 *
 * @packageDocumentation
 */

export { GuidelinePublisher } from './core/guideline-publisher';
export type {
  GuidelinePublisherOptions,
  PublishRequest,
  PublishResult,
} from './core/guideline-publisher';
export { PublishError } from './errors/publish-error';
export {
  PublicationMetadataSchema,
  docNumberFromFileName,
  parseMetadata,
  resolveFrontmatter,
} from './metadata/publication-metadata';
export type { PublicationMetadata } from './metadata/publication-metadata';
