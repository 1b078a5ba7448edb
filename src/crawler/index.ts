export { Frontier } from './frontier.js';
export {
  QueueCrawlEngine,
  type CrawlEngine,
  type PageHandler,
  type VisitRequest,
  type QueueCrawlEngineOptions,
} from './engine.js';
export {
  CrawlOrchestrator,
  type CrawlOrchestratorOptions,
  type ScopeDecision,
} from './orchestrator.js';
