export { healthService, HealthService, type ReadinessReport } from './health.service';
export { reconciliationService } from './reconciliation.service';
export * from './reconciliation.service';
export { scoringService } from './scoring.service';
export * from './scoring.service';
export { trainingService } from './training.service';
export * from './training.service';
