export { HeadingClassifier } from './heading-classifier';
export type {
  Classification,
  ClassificationContext,
  HeadingClassifierOptions,
  HeadingDecision,
  PageClassification,
  ScoreBreakdown,
  ScoreSignal,
  SignalName,
} from './heading-classifier';
export { SECTION_VOCABULARY } from './section-vocabulary';
