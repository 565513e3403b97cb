/**
 * Model artifact storage
 *
 * The trained model is persisted as JSON. Loading validates the document and
 * upgrades older schema versions (see `parseModelArtifact`).
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { parseModelArtifact } from '../matching';
import type { TrainedModel } from '../matching';
import { ConfigurationError } from '../utils/errors';

export interface ModelArtifactStore {
  /** Stable identity, used as the resource-cache key */
  readonly id: string;
  exists(): Promise<boolean>;
  load(): Promise<TrainedModel>;
  save(model: TrainedModel): Promise<void>;
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

export class JsonFileArtifactStore implements ModelArtifactStore {
  public readonly id: string;

  constructor(private readonly filePath: string) {
    this.id = `file:${path.resolve(filePath)}`;
  }

  async exists(): Promise<boolean> {
    try {
      await readFile(this.filePath);
      return true;
    } catch (error) {
      if (isMissingFile(error)) return false;
      throw error;
    }
  }

  /**
   * @throws ConfigurationError when the file is missing, not JSON, or not a valid artifact
   */
  async load(): Promise<TrainedModel> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        throw new ConfigurationError(`Model artifact not found at ${this.filePath}. Train a model first.`);
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Model artifact unreadable at ${this.filePath}: ${reason}`);
    }

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch {
      throw new ConfigurationError(`Model artifact at ${this.filePath} is not valid JSON`);
    }

    return parseModelArtifact(document);
  }

  async save(model: TrainedModel): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${JSON.stringify(model, null, 2)}\n`, 'utf-8');
  }
}

export default JsonFileArtifactStore;
