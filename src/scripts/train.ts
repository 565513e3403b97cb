/**
 * Offline training entry point.
 *
 *   npm run train
 *
 * Reads the CSV dataset from DATA_DIR and writes features.csv, metrics.json
 * and model.json to REPORTS_DIR.
 */

import { env } from '../config';
import { openCsvDirectory } from '../data';
import { trainModel } from '../services/training.service';
import { AppError, logger, Logging } from '../utils';

const main = async (): Promise<void> => {
  Logging.box('🧮 MODEL TRAINING', `Dataset: ${env.DATA_DIR}`);

  const result = await trainModel(await openCsvDirectory(env.DATA_DIR), env.REPORTS_DIR, {
    testSize: env.TEST_SIZE,
    splitSeed: env.SPLIT_SEED,
    synthetic: env.SYNTHETIC_CORRUPTION ? { seed: env.SYNTHETIC_SEED } : false,
  });

  Logging.info(`Features: ${result.files.features}`);
  Logging.info(`Metrics:  ${result.files.metrics}`);
  Logging.info(`Model:    ${result.files.model}`);
};

main()
  .then(() => process.exit(0))
  .catch((error: unknown) => {
    if (error instanceof AppError) {
      logger.error(`Training failed: ${error.message}`);
    } else {
      logger.error('Training failed:', error);
    }
    process.exit(1);
  });
