import { logger } from '../utils';
import type { RecordSets, TrainedModel } from '../matching';
import type { ModelArtifactStore } from './artifactStore';
import { loadRecordSets, type DataSource } from './dataSource';

/**
 * Loads each dataset and model once per source identity and hands the same
 * (readonly) result to every later caller. A failed load is forgotten so the
 * next call retries.
 */
export class ResourceCache {
  private readonly records = new Map<string, Promise<RecordSets>>();
  private readonly models = new Map<string, Promise<TrainedModel>>();

  getRecords(source: DataSource): Promise<RecordSets> {
    return this.acquire(this.records, source.id, () => loadRecordSets(source));
  }

  getModel(store: ModelArtifactStore): Promise<TrainedModel> {
    return this.acquire(this.models, store.id, () => store.load());
  }

  /** Drops a cached model, e.g. after retraining */
  invalidateModel(store: ModelArtifactStore): void {
    this.models.delete(store.id);
  }

  clear(): void {
    this.records.clear();
    this.models.clear();
  }

  private acquire<T>(cache: Map<string, Promise<T>>, key: string, load: () => Promise<T>): Promise<T> {
    const cached = cache.get(key);
    if (cached) return cached;

    logger.debug(`Loading resource ${key}`);
    const pending = load().catch((error: unknown) => {
      cache.delete(key);
      throw error;
    });
    cache.set(key, pending);
    return pending;
  }
}

export const createResourceCache = (): ResourceCache => new ResourceCache();

/** Process-wide cache shared by the HTTP service and the worker */
export const sharedResources = createResourceCache();
