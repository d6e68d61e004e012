export {
  ErrorClassifier,
  errorClassifier,
  type ClassificationInput,
  type ClassificationResult,
} from './ErrorClassifier.js';
export {
  DEFAULT_RULES,
  type ClassificationContext,
  type ClassificationRule,
  type HangingVariant,
  type RuleMatch,
} from './ClassificationRules.js';
export {
  formatExplanation,
  formatMoveLabel,
  formatPawns,
  GLOSSARY,
  type ExplanationInput,
  type GlossaryTerm,
} from './ExplanationFormatter.js';
