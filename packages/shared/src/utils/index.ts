export { generateId } from './id.js';
export { monotonicNow, isoNow } from './clock.js';
export { cosineSimilarity, rankByScore } from './vector.js';
export {
  SemantixError,
  ConfigurationError,
  ConfigError,
  BackendUnavailableError,
  BackendError,
  ReservedKeywordCollisionError,
  NotFoundError,
  AttributeResolutionError,
} from './errors.js';
