export * from './core/index.js';
export * from './errors.js';
export { summarize, type PosteriorSummary } from './analysis/summary.js';
export * from './problems/index.js';
export { createLogger, setLogLevel, type Logger } from './logger.js';
