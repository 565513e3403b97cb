/**
 * Invoice Reconciliation Engine
 *
 * Pure, deterministic stages that turn invoice lines and PO/GRN records into
 * match verdicts:
 * - Normalization (tolerant dates and amounts, line aggregation)
 * - Linking (candidate PO + exact vendor/currency join)
 * - Feature engineering
 * - Labelling and classifier training
 * - Scoring and the rule + probability decision policy
 *
 * Usage:
 * ```typescript
 * import { scorePair, decide } from './matching';
 *
 * const score = scorePair(records, model, 'INV0012', 'PO0012');
 * if (score.found) {
 *   console.log(decide(score.probability, score.facts).status); // 'match' | 'partial' | 'mismatch'
 * }
 * ```
 */

export { parseFlexibleDate, daysBetween } from './dateParsing';
export { parseAmount, parseText, aggregateInvoiceLines } from './normalize';
export { toCandidatePo, buildLinks } from './linker';
export { calculateVendorSimilarity } from './vendorSimilarity';
export { engineerFeatures, engineerFeatureTable, amountFeatures } from './features';
export { attachLabels, type UnlabelledPolicy, type AttachLabelsOptions } from './labels';
export {
  fitClassifier,
  predictProba,
  selectFeatures,
  stratifiedSplit,
  featureImportance,
  parseModelArtifact,
  type FitOptions,
  type FitResult,
} from './classifier';
export { scorePair, buildFeatureTable, findFeatureRow, factsFromRow } from './scorer';
export { decide, buildExplanation, listIssues, hasMaterialIssues, undeterminedResult } from './decisionPolicy';

export {
  FEATURE_COLUMNS,
  CLASSIFIER_DEFAULTS,
  DEFAULT_MIN_CONFIDENCE,
  DEFAULT_FACTS,
  PROBABILITY_THRESHOLDS,
  MODEL_SCHEMA_VERSION,
} from './constants';

export type {
  RawInvoiceLine,
  PurchaseOrderRecord,
  LabelledMismatchRecord,
  RecordSets,
  AggregatedInvoice,
  LinkedPair,
  Flag,
  FeatureVector,
  FeatureName,
  FeatureRow,
  LabelledExample,
  LogisticParameters,
  ModelMetadata,
  TrainedModel,
  TrainingMetrics,
  ClassReport,
  MatchStatus,
  MatchFacts,
  MatchResult,
  ScoreResult,
} from './types';
