// Entry point: route model, traversal engine and discovery helpers.
export * from './tokens';
export { SimulatedChain, defaultCallers } from './sim/chain';
export type { FlashloanData, SimulatedChainOptions } from './sim/chain';
export { loadConfig, resetConfig, getConfigSummary } from './config';
export type { Config, Chain } from './config';
export { metrics, createMetrics, Metrics } from './modules/metrics';
export { default as logger } from './modules/logger';
