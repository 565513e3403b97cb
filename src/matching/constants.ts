/**
 * Constants for the Reconciliation Engine
 *
 * Business tolerances, decision thresholds and the canonical feature list.
 */

import type { FeatureName, MatchFacts } from './types';

// ============================================
// LINKING
// ============================================

/** Invoice ids carrying this prefix map onto a PO number with PO_PREFIX */
export const INVOICE_PREFIX = 'INV';
export const PO_PREFIX = 'PO';

// ============================================
// FEATURE TOLERANCES
// ============================================

/** Vendor names above this token similarity count as the same vendor */
export const VENDOR_MATCH_THRESHOLD = 0.8;

export const AMOUNT_TOLERANCE = {
  /** Absolute difference, in currency units */
  ABSOLUTE: 100,
  /** Relative difference against the PO total */
  PERCENT: 0.05,
} as const;

/** Grace periods and limits for date relationships (in days) */
export const DATE_TOLERANCE = {
  /** Invoice may predate its PO by this many days */
  BEFORE_PO_GRACE: 2,
  /** Invoice later than this after the PO is flagged */
  TOO_LATE: 120,
  /** Invoice may predate the goods receipt by this many days */
  BEFORE_GRN_GRACE: 3,
} as const;

// ============================================
// DECISION POLICY
// ============================================

/** Any absolute amount difference above this is a material issue */
export const MATERIAL_AMOUNT_DELTA = 0.01;

export const PROBABILITY_THRESHOLDS = {
  MISMATCH: 0.8,
  PARTIAL: 0.6,
} as const;

/** |daysDelta| above this adds a timing concern to explanations and emails */
export const TIMING_CONCERN_DAYS = 30;

/** Tasks below this confidence get an email even when matched */
export const DEFAULT_MIN_CONFIDENCE = 0.75;

/** Facts assumed when the scorer could not supply them */
export const DEFAULT_FACTS: Readonly<MatchFacts> = {
  amountDelta: 0,
  vendorMatch: true,
  poMissing: false,
  hasGrn: true,
  daysDelta: 0,
};

// ============================================
// MODEL
// ============================================

/**
 * Canonical feature list. Training selects the non-constant subset;
 * artifacts written before the list was stored fall back to all of it.
 */
export const FEATURE_COLUMNS: readonly FeatureName[] = [
  'vendorMatch',
  'vendorSimilarity',
  'hasGrn',
  'amountDeltaAbs',
  'amountDeltaPct',
  'amountOverTolerance',
  'amountPctOverTolerance',
  'daysDelta',
  'daysSinceGrn',
  'invoiceBeforePo',
  'invoiceTooLate',
  'invoiceBeforeGrn',
  'poMissing',
  'currencyMatch',
];

export const CLASSIFIER_DEFAULTS = {
  /** Inverse regularization strength */
  C: 10,
  LEARNING_RATE: 0.1,
  MAX_ITERATIONS: 2000,
  /** Stop once the largest gradient component falls below this */
  TOLERANCE: 1e-6,
  /** Mismatches weigh twice as much as clean pairs */
  CLASS_WEIGHTS: { 0: 1, 1: 2 },
  DECISION_THRESHOLD: 0.5,
  TEST_SIZE: 0.2,
  SPLIT_SEED: 42,
} as const;

export const MODEL_SCHEMA_VERSION = 2;
