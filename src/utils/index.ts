export { default as logger, Logging } from './logger';
export { sendSuccess, sendError } from './response';
export { asyncHandler } from './asyncHandler';
export { AppError } from './AppError';
export {
  ConfigurationError,
  DataNotFoundError,
  ToolNotPermittedError,
  ToolArgumentError,
  ToolExecutionError,
  InsufficientTrainingDataError,
} from './errors';
export { SeededRandom } from './random';
