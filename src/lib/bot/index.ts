export { FundingHedgeBot } from './funding-hedge-bot';
export type { FundingHedgeBotDeps, FundingHedgeBotStats } from './funding-hedge-bot';
export { OpportunityRanker, RankerSession } from './opportunity-ranker';
export { HedgeExecutor } from './hedge-executor';
export { PositionMonitor } from './position-monitor';
export { HedgeJournal } from './hedge-journal';
export { AlertManager } from './alerts';
export { ConsoleLogger } from './logger';
export { createSignalHandler } from './shutdown';
export type { Logger, LogLevel } from './logger';
export { computeOrderSizes } from './hedge-sizer';
export { isNearSettlement, secondsUntilSettlement } from './settlement-gate';
export {
  DEFAULT_HEDGE_CONFIG,
  hedgeConfigSchema,
  parseRuntimeOptions,
} from './config';
export type { RuntimeOptions } from './config';
