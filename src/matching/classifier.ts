/**
 * Mismatch Classifier
 *
 * Binary logistic regression with L2 regularization and class weights,
 * trained by full-batch gradient descent on standardized features.
 *
 * Training is fully deterministic: weights start at zero and the only random
 * step (the stratified train/test split) takes an explicit seed.
 *
 * Usage:
 * ```typescript
 * const { model, metrics } = fitClassifier(examples, { seed: 42 });
 * const probability = predictProba(model, featureRow);
 * ```
 */

import { z } from 'zod';
import { ConfigurationError, InsufficientTrainingDataError } from '../utils/errors';
import { SeededRandom } from '../utils/random';
import { CLASSIFIER_DEFAULTS, FEATURE_COLUMNS, MODEL_SCHEMA_VERSION } from './constants';
import type {
  ClassReport,
  FeatureName,
  FeatureVector,
  Flag,
  LabelledExample,
  LogisticParameters,
  TrainedModel,
  TrainingMetrics,
} from './types';

// ============================================
// Types
// ============================================

export interface FitOptions {
  /** Share of each class held out for evaluation */
  testSize?: number;
  seed?: number;
  /** Inverse regularization strength */
  c?: number;
  learningRate?: number;
  maxIterations?: number;
  tolerance?: number;
  /** Features considered before constant columns are dropped */
  candidates?: readonly FeatureName[];
}

export interface FitResult {
  model: TrainedModel;
  metrics: TrainingMetrics;
}

export interface FeatureSelection {
  selected: FeatureName[];
  dropped: FeatureName[];
}

// ============================================
// Math helpers
// ============================================

export function sigmoid(z: number): number {
  if (z >= 0) {
    return 1 / (1 + Math.exp(-z));
  }
  const e = Math.exp(z);
  return e / (1 + e);
}

const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

const safeDivide = (numerator: number, denominator: number): number =>
  denominator === 0 ? 0 : numerator / denominator;

// ============================================
// Feature selection & split
// ============================================

/**
 * Keeps the candidate features that take more than one value across examples.
 */
export function selectFeatures(
  examples: readonly FeatureVector[],
  candidates: readonly FeatureName[] = FEATURE_COLUMNS
): FeatureSelection {
  const selected: FeatureName[] = [];
  const dropped: FeatureName[] = [];

  for (const name of candidates) {
    const values = new Set(examples.map((example) => example[name]));
    if (values.size > 1) {
      selected.push(name);
    } else {
      dropped.push(name);
    }
  }

  return { selected, dropped };
}

/**
 * Splits examples so each class keeps (roughly) the same share in both parts.
 * Every class keeps at least one training example. Input order is preserved
 * within each part.
 */
export function stratifiedSplit<T extends { isMismatch: Flag }>(
  examples: readonly T[],
  testSize: number,
  seed: number
): { train: T[]; test: T[] } {
  const rng = new SeededRandom(seed);
  const testIndices = new Set<number>();

  for (const label of [0, 1] as const) {
    const indices = examples
      .map((example, index) => ({ example, index }))
      .filter(({ example }) => example.isMismatch === label)
      .map(({ index }) => index);

    const count = Math.min(Math.max(0, indices.length - 1), Math.round(indices.length * testSize));
    for (const index of rng.sample(indices, count)) {
      testIndices.add(index);
    }
  }

  const train: T[] = [];
  const test: T[] = [];
  examples.forEach((example, index) => {
    (testIndices.has(index) ? test : train).push(example);
  });

  return { train, test };
}

// ============================================
// Training
// ============================================

function standardization(matrix: readonly number[][], width: number): { means: number[]; scales: number[] } {
  const means = new Array<number>(width).fill(0);
  const scales = new Array<number>(width).fill(1);
  const n = matrix.length;
  if (n === 0) return { means, scales };

  for (let j = 0; j < width; j++) {
    let sum = 0;
    for (const row of matrix) sum += row[j];
    means[j] = sum / n;

    let squares = 0;
    for (const row of matrix) squares += (row[j] - means[j]) ** 2;
    const std = Math.sqrt(squares / n);
    scales[j] = std > 0 ? std : 1;
  }

  return { means, scales };
}

/**
 * Minimizes the class-weighted mean log loss plus ||w||² / (2·C·Σweights).
 * The intercept is not regularized.
 */
export function trainLogistic(
  matrix: readonly number[][],
  labels: readonly Flag[],
  options: Required<Pick<FitOptions, 'c' | 'learningRate' | 'maxIterations' | 'tolerance'>>
): LogisticParameters {
  const width = matrix[0]?.length ?? 0;
  const { means, scales } = standardization(matrix, width);
  const x = matrix.map((row) => row.map((value, j) => (value - means[j]) / scales[j]));
  const sampleWeights = labels.map((label) => CLASSIFIER_DEFAULTS.CLASS_WEIGHTS[label]);
  const totalWeight = sampleWeights.reduce((sum, w) => sum + w, 0);

  const weights = new Array<number>(width).fill(0);
  let intercept = 0;

  for (let iteration = 0; iteration < options.maxIterations; iteration++) {
    const gradient = new Array<number>(width).fill(0);
    let gradientIntercept = 0;

    for (let i = 0; i < x.length; i++) {
      let z = intercept;
      for (let j = 0; j < width; j++) z += weights[j] * x[i][j];
      const error = (sigmoid(z) - labels[i]) * sampleWeights[i];
      gradientIntercept += error;
      for (let j = 0; j < width; j++) gradient[j] += error * x[i][j];
    }

    let largest = Math.abs(gradientIntercept / totalWeight);
    intercept -= options.learningRate * (gradientIntercept / totalWeight);

    for (let j = 0; j < width; j++) {
      const g = gradient[j] / totalWeight + weights[j] / (options.c * totalWeight);
      largest = Math.max(largest, Math.abs(g));
      weights[j] -= options.learningRate * g;
    }

    if (largest < options.tolerance) break;
  }

  return { intercept, weights, means, scales };
}

/**
 * Probability that the pair is a mismatch.
 */
export function predictProba(model: TrainedModel, features: FeatureVector): number {
  const { intercept, weights, means, scales } = model.parameters;
  let z = intercept;

  model.featureList.forEach((name, j) => {
    z += weights[j] * ((features[name] - means[j]) / scales[j]);
  });

  const probability = sigmoid(z);
  return Number.isFinite(probability) ? clamp01(probability) : 0.5;
}

// ============================================
// Evaluation
// ============================================

function classReport(truth: readonly Flag[], predicted: readonly Flag[], label: Flag): ClassReport {
  let tp = 0;
  let fp = 0;
  let fn = 0;
  truth.forEach((actual, i) => {
    if (predicted[i] === label && actual === label) tp++;
    else if (predicted[i] === label) fp++;
    else if (actual === label) fn++;
  });

  const precision = safeDivide(tp, tp + fp);
  const recall = safeDivide(tp, tp + fn);
  return {
    precision,
    recall,
    f1: safeDivide(2 * precision * recall, precision + recall),
    support: truth.filter((actual) => actual === label).length,
  };
}

/**
 * Coefficients ordered by absolute size, largest first.
 */
export function featureImportance(model: TrainedModel): Record<string, number> {
  const entries = model.featureList.map((name, j): [FeatureName, number] => [name, model.parameters.weights[j]]);
  entries.sort((a, b) => Math.abs(b[1]) - Math.abs(a[1]));
  return Object.fromEntries(entries);
}

// ============================================
// Fit
// ============================================

/**
 * Selects features, splits, trains and evaluates.
 *
 * @throws InsufficientTrainingDataError when only one class is present or
 * every candidate feature is constant
 */
export function fitClassifier(examples: readonly LabelledExample[], options: FitOptions = {}): FitResult {
  const testSize = options.testSize ?? CLASSIFIER_DEFAULTS.TEST_SIZE;
  const seed = options.seed ?? CLASSIFIER_DEFAULTS.SPLIT_SEED;
  const threshold = CLASSIFIER_DEFAULTS.DECISION_THRESHOLD;

  const positives = examples.filter((example) => example.isMismatch === 1).length;
  const negatives = examples.length - positives;
  if (positives === 0 || negatives === 0) {
    throw new InsufficientTrainingDataError(
      `Training needs both classes (mismatches: ${positives}, matches: ${negatives})`
    );
  }

  const { selected, dropped } = selectFeatures(examples, options.candidates);
  if (selected.length === 0) {
    throw new InsufficientTrainingDataError('No usable features: every candidate feature is constant');
  }

  const { train, test } = stratifiedSplit(examples, testSize, seed);
  const toMatrix = (rows: readonly LabelledExample[]): number[][] =>
    rows.map((row) => selected.map((name) => row[name]));

  const parameters = trainLogistic(
    toMatrix(train),
    train.map((row) => row.isMismatch),
    {
      c: options.c ?? CLASSIFIER_DEFAULTS.C,
      learningRate: options.learningRate ?? CLASSIFIER_DEFAULTS.LEARNING_RATE,
      maxIterations: options.maxIterations ?? CLASSIFIER_DEFAULTS.MAX_ITERATIONS,
      tolerance: options.tolerance ?? CLASSIFIER_DEFAULTS.TOLERANCE,
    }
  );

  const model: TrainedModel = {
    schemaVersion: MODEL_SCHEMA_VERSION,
    featureList: selected,
    parameters,
    trainedAt: new Date().toISOString(),
    metadata: {
      trainSize: train.length,
      testSize: test.length,
      splitSeed: seed,
      migratedFromVersion: null,
    },
  };

  const evaluatedOn = test.length > 0 ? 'test' : 'train';
  const evaluation = evaluatedOn === 'test' ? test : train;
  const truth = evaluation.map((row) => row.isMismatch);
  const predicted = evaluation.map((row): Flag => (predictProba(model, row) >= threshold ? 1 : 0));

  const negativeReport = classReport(truth, predicted, 0);
  const positiveReport = classReport(truth, predicted, 1);
  const correct = truth.filter((actual, i) => actual === predicted[i]).length;

  const metrics: TrainingMetrics = {
    precisionPos: positiveReport.precision,
    recallPos: positiveReport.recall,
    f1Pos: positiveReport.f1,
    accuracy: safeDivide(correct, truth.length),
    threshold,
    evaluatedOn,
    report: { '0': negativeReport, '1': positiveReport },
    featureImportance: featureImportance(model),
    featuresUsed: selected,
    droppedFeatures: dropped,
    nFeatures: selected.length,
    classDistribution: { '0': negatives, '1': positives },
    trainSize: train.length,
    testSize: test.length,
  };

  return { model, metrics };
}

// ============================================
// Artifact schema
// ============================================

const CANONICAL_FEATURES: ReadonlySet<string> = new Set(FEATURE_COLUMNS);

export const isFeatureName = (value: string): value is FeatureName => CANONICAL_FEATURES.has(value);

const featureNameSchema = z.string().refine(isFeatureName, { message: 'Unknown feature name' });

const parametersSchema = z.object({
  intercept: z.number(),
  weights: z.array(z.number()),
  means: z.array(z.number()),
  scales: z.array(z.number().positive()),
});

const metadataSchema = z.object({
  trainSize: z.number().int().nonnegative(),
  testSize: z.number().int().nonnegative(),
  splitSeed: z.number().int(),
  migratedFromVersion: z.number().int().nullable(),
});

const currentArtifactSchema = z.object({
  schemaVersion: z.literal(2),
  featureList: z.array(featureNameSchema).min(1),
  parameters: parametersSchema,
  trainedAt: z.string(),
  metadata: metadataSchema,
});

/** Artifacts written before the feature list was stored */
const legacyArtifactSchema = z.object({
  schemaVersion: z.literal(1).optional(),
  parameters: parametersSchema,
  trainedAt: z.string().optional(),
});

const artifactSchema = z.union([currentArtifactSchema, legacyArtifactSchema]);

/**
 * Validates a deserialized artifact, migrating version-1 artifacts onto the
 * canonical feature list.
 *
 * @throws ConfigurationError when the artifact is malformed or its parameter
 * lengths disagree with its feature list
 */
export function parseModelArtifact(raw: unknown): TrainedModel {
  const parsed = artifactSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid model artifact: ${issues.join('; ')}`);
  }

  const artifact = parsed.data;
  const model: TrainedModel =
    'featureList' in artifact
      ? artifact
      : {
          schemaVersion: MODEL_SCHEMA_VERSION,
          featureList: [...FEATURE_COLUMNS],
          parameters: artifact.parameters,
          trainedAt: artifact.trainedAt ?? new Date(0).toISOString(),
          metadata: { trainSize: 0, testSize: 0, splitSeed: 0, migratedFromVersion: 1 },
        };

  const width = model.featureList.length;
  const { weights, means, scales } = model.parameters;
  if (weights.length !== width || means.length !== width || scales.length !== width) {
    throw new ConfigurationError(
      `Invalid model artifact: ${width} features but ${weights.length} weights, ${means.length} means, ${scales.length} scales`
    );
  }

  return model;
}

export default fitClassifier;
