/**
 * Type Definitions for the Reconciliation Engine
 *
 * These types describe each stage of the pipeline:
 * raw records → aggregated invoices → linked pairs → feature rows
 * → (training) labelled examples / (inference) match results.
 *
 * Stage outputs are readonly: every run rebuilds them from the raw records.
 */

// ============================================
// RAW RECORDS
// ============================================

/**
 * One invoice line as read from the invoices source.
 * Numeric fields are null when the source value could not be parsed.
 */
export interface RawInvoiceLine {
  invoiceId: string;
  vendorId: string;
  vendorName: string | null;
  currency: string;
  lineItemNumber: string | null;
  quantity: number | null;
  unitPrice: number | null;
  lineTotal: number | null;
  /** Date exactly as written in the source */
  invoiceDate: string | null;
}

/**
 * Combined purchase-order / goods-receipt record.
 */
export interface PurchaseOrderRecord {
  readonly poNumber: string;
  readonly vendorId: string;
  readonly vendorName: string | null;
  readonly currency: string;
  readonly poTotal: number | null;
  readonly poDate: Date | null;
  readonly grnNumber: string | null;
  readonly grnDate: Date | null;
}

/**
 * Historical ground truth: an (invoice, PO) pair known to be a mismatch.
 */
export interface LabelledMismatchRecord {
  invoiceId: string;
  poNumber: string | null;
  mismatchType: string | null;
  difference: number | null;
}

export interface RecordSets {
  readonly invoiceLines: readonly RawInvoiceLine[];
  readonly purchaseOrders: readonly PurchaseOrderRecord[];
  readonly mismatches: readonly LabelledMismatchRecord[];
}

// ============================================
// PIPELINE STAGES
// ============================================

export interface AggregatedInvoice {
  readonly invoiceId: string;
  readonly vendorId: string;
  readonly vendorName: string | null;
  readonly currency: string;
  /** Sum of parseable line totals */
  readonly invoiceTotal: number;
  readonly lineCount: number;
  readonly maxQty: number | null;
  readonly avgUnitPrice: number | null;
  /** First parseable invoice date among the lines */
  readonly invoiceDate: Date | null;
}

/**
 * An invoice joined with its purchase order.
 * `po` is null as a whole when no PO matched, so PO-derived fields are
 * never partially present.
 */
export interface LinkedPair {
  readonly invoice: AggregatedInvoice;
  readonly candidatePo: string;
  readonly po: PurchaseOrderRecord | null;
}

/** 0/1 indicator stored as a number so it can feed the classifier */
export type Flag = 0 | 1;

export interface FeatureVector {
  vendorSimilarity: number;
  vendorMatch: Flag;
  hasGrn: Flag;
  amountDelta: number;
  amountDeltaAbs: number;
  amountDeltaPct: number;
  amountOverTolerance: Flag;
  amountPctOverTolerance: Flag;
  daysDelta: number;
  daysSinceGrn: number;
  invoiceBeforePo: Flag;
  invoiceTooLate: Flag;
  invoiceBeforeGrn: Flag;
  poMissing: Flag;
  currencyMatch: Flag;
}

export type FeatureName = keyof FeatureVector;

/**
 * Feature vector plus the identity columns needed to find and report a pair.
 */
export interface FeatureRow extends FeatureVector {
  invoiceId: string;
  candidatePo: string;
  /** Linked PO number, null when no PO was found */
  poNumber: string | null;
  vendorId: string;
  currency: string;
  invoiceVendorName: string | null;
  poVendorName: string | null;
  invoiceTotal: number;
  poTotal: number | null;
}

export interface LabelledExample extends FeatureRow {
  isMismatch: Flag;
  mismatchType: string | null;
  difference: number | null;
}

// ============================================
// MODEL
// ============================================

export interface LogisticParameters {
  intercept: number;
  /** One weight per entry of the model's feature list, in standardized units */
  weights: number[];
  means: number[];
  scales: number[];
}

export interface ModelMetadata {
  trainSize: number;
  testSize: number;
  splitSeed: number;
  /** Set when the artifact was upgraded from an older schema on load */
  migratedFromVersion: number | null;
}

export interface TrainedModel {
  schemaVersion: 2;
  /** Exact features (and order) the parameters were fitted on */
  featureList: FeatureName[];
  parameters: LogisticParameters;
  trainedAt: string;
  metadata: ModelMetadata;
}

export interface ClassReport {
  precision: number;
  recall: number;
  f1: number;
  support: number;
}

export interface TrainingMetrics {
  precisionPos: number;
  recallPos: number;
  f1Pos: number;
  accuracy: number;
  threshold: number;
  /** Split the metrics were computed on; 'train' only when the test split came out empty */
  evaluatedOn: 'test' | 'train';
  report: { '0': ClassReport; '1': ClassReport };
  featureImportance: Record<string, number>;
  featuresUsed: FeatureName[];
  droppedFeatures: FeatureName[];
  nFeatures: number;
  classDistribution: { '0': number; '1': number };
  trainSize: number;
  testSize: number;
}

// ============================================
// DECISIONS
// ============================================

export type MatchStatus = 'match' | 'partial' | 'mismatch';

/**
 * The five facts the decision policy and email drafter reason about.
 */
export interface MatchFacts {
  /** Absolute invoice − PO amount difference */
  amountDelta: number;
  vendorMatch: boolean;
  poMissing: boolean;
  hasGrn: boolean;
  daysDelta: number;
}

export interface MatchResult {
  status: MatchStatus;
  /** Always within [0, 1] */
  confidence: number;
  facts: MatchFacts;
  explanation: string;
}

export type ScoreResult =
  | { found: false; message: string }
  | { found: true; probability: number; facts: MatchFacts };
