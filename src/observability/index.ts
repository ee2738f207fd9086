/**
 * Observability module exports
 */

export type { LogLevel, LogFormat, LoggingConfig, Logger, LogSink } from './logging.js';
export {
  ConsoleLogger,
  NoopLogger,
  LOG_LEVELS,
  LOG_FORMATS,
  createDefaultLoggingConfig,
  logError,
} from './logging.js';

export type { MetricsCollector, MetricName, MetricLabels, LabelKey } from './metrics.js';
export {
  InMemoryMetricsCollector,
  NoopMetricsCollector,
  MetricNames,
  CircuitStateValue,
  LABEL_KEYS,
  seriesKey,
} from './metrics.js';

export { attachLoggingHooks, attachMetricsHooks } from './hooks.js';
