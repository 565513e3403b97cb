import {
  sigmoid,
  selectFeatures,
  stratifiedSplit,
  trainLogistic,
  predictProba,
  featureImportance,
  fitClassifier,
  parseModelArtifact,
} from '../../src/matching/classifier';
import { FEATURE_COLUMNS, CLASSIFIER_DEFAULTS } from '../../src/matching/constants';
import type { FeatureVector, LabelledExample } from '../../src/matching';
import { ConfigurationError, InsufficientTrainingDataError } from '../../src/utils/errors';
import { buildModel } from '../helpers';

const baseFeatures: FeatureVector = {
  vendorSimilarity: 1,
  vendorMatch: 1,
  hasGrn: 1,
  amountDelta: 0,
  amountDeltaAbs: 0,
  amountDeltaPct: 0,
  amountOverTolerance: 0,
  amountPctOverTolerance: 0,
  daysDelta: 0,
  daysSinceGrn: 0,
  invoiceBeforePo: 0,
  invoiceTooLate: 0,
  invoiceBeforeGrn: 0,
  poMissing: 0,
  currencyMatch: 1,
};

const example = (index: number, overrides: Partial<LabelledExample> = {}): LabelledExample => ({
  ...baseFeatures,
  invoiceId: `INV${String(index).padStart(4, '0')}`,
  candidatePo: `PO${String(index).padStart(4, '0')}`,
  poNumber: `PO${String(index).padStart(4, '0')}`,
  vendorId: 'V001',
  currency: 'USD',
  invoiceVendorName: 'Acme Supplies Ltd',
  poVendorName: 'Acme Supplies Ltd',
  invoiceTotal: 100,
  poTotal: 100,
  isMismatch: 0,
  mismatchType: null,
  difference: null,
  ...overrides,
});

/** Five clean pairs, five pairs with a missing PO labelled as mismatches */
const separableExamples = (): LabelledExample[] => [
  ...[0, 1, 2, 3, 4].map((i) => example(i)),
  ...[5, 6, 7, 8, 9].map((i) => example(i, { poMissing: 1, isMismatch: 1, mismatchType: 'MISSING_PO' })),
];

describe('Mismatch Classifier', () => {
  describe('sigmoid', () => {
    it('should map 0 to 0.5', () => {
      expect(sigmoid(0)).toBe(0.5);
    });

    it('should stay finite for large inputs', () => {
      expect(sigmoid(1000)).toBe(1);
      expect(sigmoid(-1000)).toBe(0);
    });
  });

  describe('selectFeatures', () => {
    it('should drop constant features', () => {
      const { selected, dropped } = selectFeatures(separableExamples());

      expect(selected).toEqual(['poMissing']);
      expect(dropped).toHaveLength(FEATURE_COLUMNS.length - 1);
      expect(dropped).not.toContain('poMissing');
    });

    it('should respect the candidate list order', () => {
      const rows = [example(0, { daysDelta: 3, poMissing: 1 }), example(1)];

      expect(selectFeatures(rows, ['poMissing', 'daysDelta', 'hasGrn']).selected).toEqual(['poMissing', 'daysDelta']);
    });
  });

  describe('stratifiedSplit', () => {
    const rows = [
      ...Array.from({ length: 10 }, (_, i) => example(i)),
      ...Array.from({ length: 5 }, (_, i) => example(10 + i, { isMismatch: 1 })),
    ];

    it('should hold out the requested share of each class', () => {
      const { train, test } = stratifiedSplit(rows, 0.2, 42);

      expect(test.filter((row) => row.isMismatch === 0)).toHaveLength(2);
      expect(test.filter((row) => row.isMismatch === 1)).toHaveLength(1);
      expect(train).toHaveLength(12);
    });

    it('should be reproducible for a seed', () => {
      const first = stratifiedSplit(rows, 0.2, 7).test.map((row) => row.invoiceId);
      const second = stratifiedSplit(rows, 0.2, 7).test.map((row) => row.invoiceId);

      expect(first).toEqual(second);
    });

    it('should preserve input order within each part', () => {
      const { train } = stratifiedSplit(rows, 0.2, 42);
      const ids = train.map((row) => row.invoiceId);

      expect(ids).toEqual([...ids].sort());
    });

    it('should keep at least one training example per class', () => {
      const { train, test } = stratifiedSplit([example(0), example(1, { isMismatch: 1 })], 0.9, 42);

      expect(train).toHaveLength(2);
      expect(test).toHaveLength(0);
    });
  });

  describe('trainLogistic', () => {
    it('should learn a positive weight for a predictive feature', () => {
      const parameters = trainLogistic([[0], [0], [1], [1]], [0, 0, 1, 1], {
        c: CLASSIFIER_DEFAULTS.C,
        learningRate: CLASSIFIER_DEFAULTS.LEARNING_RATE,
        maxIterations: CLASSIFIER_DEFAULTS.MAX_ITERATIONS,
        tolerance: CLASSIFIER_DEFAULTS.TOLERANCE,
      });

      expect(parameters.weights[0]).toBeGreaterThan(0);
      expect(parameters.means).toEqual([0.5]);
      expect(parameters.scales).toEqual([0.5]);
    });

    it('should use a unit scale for constant columns', () => {
      const parameters = trainLogistic([[3], [3]], [0, 1], {
        c: 1,
        learningRate: 0.1,
        maxIterations: 10,
        tolerance: 1e-6,
      });

      expect(parameters.scales).toEqual([1]);
    });
  });

  describe('predictProba', () => {
    it('should apply the logistic function to the model features', () => {
      const model = buildModel();

      expect(predictProba(model, baseFeatures)).toBeCloseTo(0.2, 10);
      expect(predictProba(model, { ...baseFeatures, amountDeltaAbs: 200 })).toBeCloseTo(1 / (1 + Math.exp(-(2 - Math.log(4)))), 10);
    });

    it('should ignore features outside the model feature list', () => {
      const model = buildModel();

      expect(predictProba(model, { ...baseFeatures, daysDelta: 500 })).toBeCloseTo(0.2, 10);
    });
  });

  describe('featureImportance', () => {
    it('should order coefficients by absolute size', () => {
      expect(Object.entries(featureImportance(buildModel()))).toEqual([
        ['poMissing', 2],
        ['amountDeltaAbs', 0.01],
      ]);
    });
  });

  describe('fitClassifier', () => {
    it('should train and evaluate on a held-out split', () => {
      const { model, metrics } = fitClassifier(separableExamples());

      expect(model.schemaVersion).toBe(2);
      expect(model.featureList).toEqual(['poMissing']);
      expect(model.metadata).toEqual({ trainSize: 8, testSize: 2, splitSeed: 42, migratedFromVersion: null });
      expect(metrics.evaluatedOn).toBe('test');
      expect(metrics.accuracy).toBe(1);
      expect(metrics.precisionPos).toBe(1);
      expect(metrics.recallPos).toBe(1);
      expect(metrics.classDistribution).toEqual({ '0': 5, '1': 5 });
      expect(metrics.nFeatures).toBe(1);
      expect(metrics.threshold).toBe(0.5);
    });

    it('should be deterministic', () => {
      const first = fitClassifier(separableExamples());
      const second = fitClassifier(separableExamples());

      expect(second.model.parameters).toEqual(first.model.parameters);
    });

    it('should evaluate on the training split when the test split is empty', () => {
      const { metrics } = fitClassifier([
        example(0),
        example(1),
        example(2, { poMissing: 1, isMismatch: 1 }),
      ]);

      expect(metrics.testSize).toBe(0);
      expect(metrics.trainSize).toBe(3);
      expect(metrics.evaluatedOn).toBe('train');
    });

    it('should reject a single-class table', () => {
      expect(() => fitClassifier([example(0), example(1), example(2)])).toThrow(InsufficientTrainingDataError);
      expect(() => fitClassifier([example(0), example(1), example(2)])).toThrow(
        'Training needs both classes (mismatches: 0, matches: 3)'
      );
    });

    it('should reject a table whose features are all constant', () => {
      expect(() => fitClassifier([example(0), example(1, { isMismatch: 1 })])).toThrow(
        'No usable features: every candidate feature is constant'
      );
    });
  });

  describe('parseModelArtifact', () => {
    it('should accept a current artifact unchanged', () => {
      const model = buildModel();

      expect(parseModelArtifact(JSON.parse(JSON.stringify(model)))).toEqual(model);
    });

    it('should migrate a legacy artifact onto the canonical features', () => {
      const width = FEATURE_COLUMNS.length;
      const model = parseModelArtifact({
        schemaVersion: 1,
        parameters: {
          intercept: 0,
          weights: new Array(width).fill(0),
          means: new Array(width).fill(0),
          scales: new Array(width).fill(1),
        },
      });

      expect(model.schemaVersion).toBe(2);
      expect(model.featureList).toEqual([...FEATURE_COLUMNS]);
      expect(model.trainedAt).toBe('1970-01-01T00:00:00.000Z');
      expect(model.metadata.migratedFromVersion).toBe(1);
    });

    it('should reject parameters that disagree with the feature list', () => {
      const model = buildModel();
      const broken = { ...model, parameters: { ...model.parameters, weights: [1, 2, 3] } };

      expect(() => parseModelArtifact(broken)).toThrow(
        'Invalid model artifact: 2 features but 3 weights, 2 means, 2 scales'
      );
    });

    it('should reject malformed documents', () => {
      expect(() => parseModelArtifact({ schemaVersion: 2 })).toThrow(ConfigurationError);
      expect(() => parseModelArtifact('model')).toThrow(/Invalid model artifact/);
      expect(() => parseModelArtifact({ ...buildModel(), featureList: ['shoeSize'] })).toThrow(ConfigurationError);
    });
  });
});
