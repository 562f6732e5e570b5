export {
  DEFAULT_EQUATION_TEMPLATES,
  FormulaNormalizer,
} from './formula-normalizer';
export type { EquationTemplate } from './formula-normalizer';
