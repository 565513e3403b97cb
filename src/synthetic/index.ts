export {
  corruptLinks,
  corruptFeatures,
  injectLabelNoise,
  DEFAULT_CORRUPTION_RATES,
  LABEL_NOISE_LIMITS,
  type CorruptionRates,
  type LabelNoiseStats,
} from './corruption';
