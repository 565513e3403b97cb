/**
 * Scoring Service
 *
 * Inference entry points over a data source and a model artifact store.
 * Both are acquired through the resource cache, so only the first call per
 * source pays for reading and validating them.
 */

import { decide, scorePair, undeterminedResult } from '../matching';
import type { MatchResult, ScoreResult } from '../matching';
import { sharedResources, type DataSource, type ModelArtifactStore, type ResourceCache } from '../data';

/**
 * Scores one (invoice, PO) pair.
 *
 * @throws ConfigurationError when the dataset or model cannot be loaded
 */
export async function score(
  dataSource: DataSource,
  modelArtifact: ModelArtifactStore,
  invoiceId: string,
  poNumber: string,
  resources: ResourceCache = sharedResources
): Promise<ScoreResult> {
  const [records, model] = await Promise.all([resources.getRecords(dataSource), resources.getModel(modelArtifact)]);
  return scorePair(records, model, invoiceId, poNumber);
}

/**
 * Scores a pair and applies the decision policy. A pair without a feature
 * row becomes an undetermined `partial` verdict.
 */
export async function matchPair(
  dataSource: DataSource,
  modelArtifact: ModelArtifactStore,
  invoiceId: string,
  poNumber: string,
  resources: ResourceCache = sharedResources
): Promise<MatchResult> {
  const result = await score(dataSource, modelArtifact, invoiceId, poNumber, resources);
  return result.found ? decide(result.probability, result.facts) : undeterminedResult();
}

export const scoringService = { score, matchPair };

export default scoringService;
