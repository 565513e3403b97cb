/**
 * Training Service
 *
 * load → normalize → link → features → labels → (synthetic corruption) → fit
 * → persist
 *
 * Writes three files to the output directory:
 * - features.csv  the labelled feature table
 * - metrics.json  evaluation metrics of the fitted classifier
 * - model.json    the versioned model artifact
 */

import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { stringify } from 'csv-stringify';
import {
  aggregateInvoiceLines,
  attachLabels,
  buildLinks,
  engineerFeatureTable,
  FEATURE_COLUMNS,
  fitClassifier,
  type LabelledExample,
  type TrainedModel,
  type TrainingMetrics,
  type UnlabelledPolicy,
} from '../matching';
import { JsonFileArtifactStore, loadRecordSets, sharedResources, type DataSource, type ResourceCache } from '../data';
import { corruptFeatures, corruptLinks, injectLabelNoise } from '../synthetic';
import { Logging, logger } from '../utils';
import { SeededRandom } from '../utils/random';

// ============================================
// Types
// ============================================

export interface TrainOptions {
  testSize?: number;
  splitSeed?: number;
  unlabelled?: UnlabelledPolicy;
  /** Degrade links, features and labels before fitting (offline evaluation only) */
  synthetic?: { seed: number } | false;
  /** Cache whose copy of the written model is dropped once the new one is saved */
  resources?: ResourceCache;
}

export interface TrainResult {
  model: TrainedModel;
  metrics: TrainingMetrics;
  files: { features: string; metrics: string; model: string };
}

export const OUTPUT_FILES = {
  FEATURES: 'features.csv',
  METRICS: 'metrics.json',
  MODEL: 'model.json',
} as const;

const IDENTITY_COLUMNS = [
  'invoiceId',
  'candidatePo',
  'poNumber',
  'vendorId',
  'currency',
  'invoiceVendorName',
  'poVendorName',
  'invoiceTotal',
  'poTotal',
  'amountDelta',
] as const;

const LABEL_COLUMNS = ['isMismatch', 'mismatchType', 'difference'] as const;

type ExampleColumn = (typeof IDENTITY_COLUMNS)[number] | (typeof FEATURE_COLUMNS)[number] | (typeof LABEL_COLUMNS)[number];

const FEATURE_TABLE_COLUMNS: readonly ExampleColumn[] = [...IDENTITY_COLUMNS, ...FEATURE_COLUMNS, ...LABEL_COLUMNS];

// ============================================
// Helpers
// ============================================

/**
 * Serializes the labelled feature table as CSV with a header row.
 */
export function featuresToCsv(examples: readonly LabelledExample[]): Promise<string> {
  const rows = examples.map((example) => {
    const row: Record<string, string> = {};
    for (const column of FEATURE_TABLE_COLUMNS) {
      const value = example[column];
      row[column] = value === null ? '' : String(value);
    }
    return row;
  });

  return new Promise((resolve, reject) => {
    stringify(rows, { header: true, columns: [...FEATURE_TABLE_COLUMNS] }, (error, output) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(output);
    });
  });
}

/**
 * Builds the labelled training table from a data source.
 */
export async function buildTrainingSet(
  dataSource: DataSource,
  options: Pick<TrainOptions, 'unlabelled' | 'synthetic'> = {}
): Promise<LabelledExample[]> {
  const records = await loadRecordSets(dataSource);
  const rng = options.synthetic ? new SeededRandom(options.synthetic.seed) : null;

  const invoices = aggregateInvoiceLines(records.invoiceLines);
  let pairs = buildLinks(invoices, records.purchaseOrders);
  if (rng) pairs = corruptLinks(pairs, rng);

  let rows = engineerFeatureTable(pairs);
  if (rng) rows = corruptFeatures(rows, rng);

  let examples = attachLabels(rows, records.mismatches, { unlabelled: options.unlabelled });
  if (rng) examples = injectLabelNoise(examples, records.mismatches, rng).examples;

  return examples;
}

// ============================================
// Train
// ============================================

/**
 * @throws ConfigurationError when a dataset file is missing
 * @throws InsufficientTrainingDataError when the labelled table cannot train a model
 */
export async function trainModel(
  dataSource: DataSource,
  outputDir: string,
  options: TrainOptions = {}
): Promise<TrainResult> {
  const examples = await buildTrainingSet(dataSource, options);

  const { model, metrics } = fitClassifier(examples, {
    testSize: options.testSize,
    seed: options.splitSeed,
  });

  logger.info(`Class distribution: ${JSON.stringify(metrics.classDistribution)}`);
  if (metrics.droppedFeatures.length > 0) {
    logger.warn(`Dropped constant features: ${metrics.droppedFeatures.join(', ')}`);
  }
  logger.info(`Using ${metrics.nFeatures} features: ${metrics.featuresUsed.join(', ')}`);

  await mkdir(outputDir, { recursive: true });

  const files = {
    features: path.join(outputDir, OUTPUT_FILES.FEATURES),
    metrics: path.join(outputDir, OUTPUT_FILES.METRICS),
    model: path.join(outputDir, OUTPUT_FILES.MODEL),
  };

  await writeFile(files.features, await featuresToCsv(examples), 'utf-8');
  await writeFile(files.metrics, `${JSON.stringify(metrics, null, 2)}\n`, 'utf-8');
  const store = new JsonFileArtifactStore(files.model);
  await store.save(model);
  (options.resources ?? sharedResources).invalidateModel(store);

  Logging.success(
    `Model trained: precision ${metrics.precisionPos.toFixed(3)}, recall ${metrics.recallPos.toFixed(3)}, f1 ${metrics.f1Pos.toFixed(3)}`
  );

  return { model, metrics, files };
}

export const trainingService = { trainModel, buildTrainingSet };

export default trainingService;
