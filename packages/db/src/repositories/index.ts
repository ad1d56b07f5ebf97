export { createDecisionRepository, type DecisionRepository, type DecisionListOptions } from "./decision.repository.js";
export { createCacheRepository, type CacheRepository } from "./cache.repository.js";
export { createStrategyRepository, type StrategyRepository } from "./strategy.repository.js";
