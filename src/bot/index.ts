export { BotRunner } from './runner';
export type { BotRunnerDeps } from './runner';
export { Deduplicator, InMemoryDedupStore, dedupKey } from './deduplicator';
export type { DedupStore, DedupFields } from './deduplicator';
export { planExecution, resolveStopLoss, validateRiskConfig } from './execution-planner';
export { MessageBatcher } from './message-batcher';
export { MessageListener } from './message-listener';
export { TradeExecutor, buildSuperOrder } from './trade-executor';
export type * from './types';
