import { stat } from 'fs/promises';
import { HealthCheckResponse } from '../types';
import { env } from '../config';
import { JsonFileArtifactStore } from '../data';
import { isRedisAvailable } from '../redis';

export interface ReadinessReport {
  ready: boolean;
  checks: Record<string, boolean>;
  /** Reported for visibility; never affects readiness */
  optional: Record<string, boolean>;
}

const directoryExists = async (dir: string): Promise<boolean> => {
  try {
    return (await stat(dir)).isDirectory();
  } catch {
    return false;
  }
};

/**
 * Health check service
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;

  constructor() {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
  }

  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
    };
  }

  /**
   * Ready when the dataset directory and the model artifact are in place.
   * Redis is optional.
   */
  async checkReadiness(): Promise<ReadinessReport> {
    const checks: Record<string, boolean> = {
      server: true,
      dataset: await directoryExists(env.DATA_DIR),
      model: await new JsonFileArtifactStore(env.MODEL_PATH).exists(),
    };

    const ready = Object.values(checks).every((check) => check);

    return { ready, checks, optional: { redis: isRedisAvailable() } };
  }
}

// Singleton instance
export const healthService = new HealthService();

export default healthService;
