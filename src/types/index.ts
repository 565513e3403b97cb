// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  HOST: string;
  API_PREFIX: string;
  CORS_ORIGIN: string[];
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;
  RUN_RATE_LIMIT_MAX_REQUESTS: number;
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'http' | 'debug';
  DATA_DIR: string;
  MODEL_PATH: string;
  REPORTS_DIR: string;
  MIN_CONFIDENCE: number;
  SPLIT_SEED: number;
  SYNTHETIC_SEED: number;
  TEST_SIZE: number;
  SYNTHETIC_CORRUPTION: boolean;
  // Redis (OPTIONAL - app works without Redis)
  REDIS_HOST: string;
  REDIS_PORT: number;
  REDIS_ENABLED: boolean;
  RUN_STATE_TTL_SECONDS: number;
  WORKER_CONCURRENCY: number;
  AP_CONTACT_EMAIL: string;
  AP_CONTACT_PHONE: string;
  COMPANY_NAME: string;
}

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  timestamp: string;
}

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
}
