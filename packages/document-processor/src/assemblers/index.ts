export { DocumentAssembler, validateReferences } from './document-assembler';
export type { AssemblyResult } from './document-assembler';
export { StructuralIntegrityError } from './structural-integrity-error';
