/**
 * Bridges from resilience hooks to logging and metrics
 */

import type { CallGate } from '../resilience/gate.js';
import type { CircuitState } from '../resilience/types.js';
import type { Logger } from './logging.js';
import { CircuitStateValue, MetricNames, type MetricLabels, type MetricsCollector } from './metrics.js';

/**
 * Logs quota refusals, circuit transitions and retries of a gate
 */
export function attachLoggingHooks(gate: CallGate, logger: Logger, gateName: string): void {
  gate.getRateLimiter().addHook({
    onRateLimited(window: string, waitMs: number): void {
      logger.warn('Rate limit reached', { gate: gateName, window, waitMs });
    },
  });

  gate.getCircuitBreaker().addHook({
    onStateChange(from: CircuitState, to: CircuitState): void {
      const context = { gate: gateName, from, to };
      if (to === 'open') {
        logger.warn('Circuit breaker opened', context);
      } else if (to === 'closed') {
        logger.info('Circuit breaker closed', context);
      } else {
        logger.info('Circuit breaker probing', context);
      }
    },
  });

  gate.getRetryExecutor().addHook({
    onRetry(attempt: number, error: unknown, delayMs: number): void {
      logger.warn('Retrying after failure', {
        gate: gateName,
        attempt,
        delayMs,
        error: error instanceof Error ? error.message : String(error),
      });
    },
  });
}

/**
 * Records quota refusals, circuit state and retries of a gate as metrics
 */
export function attachMetricsHooks(
  gate: CallGate,
  metrics: MetricsCollector,
  gateName: string,
): void {
  const labels: MetricLabels = { gate: gateName };

  metrics.gauge(
    MetricNames.CIRCUIT_BREAKER_STATE,
    CircuitStateValue[gate.getCircuitBreaker().getState()],
    labels,
  );

  gate.getRateLimiter().addHook({
    onRateLimited(window: string): void {
      metrics.increment(MetricNames.QUOTA_REJECTIONS, { ...labels, window });
    },
  });

  gate.getCircuitBreaker().addHook({
    onStateChange(_from: CircuitState, to: CircuitState): void {
      metrics.gauge(MetricNames.CIRCUIT_BREAKER_STATE, CircuitStateValue[to], labels);
    },
  });

  gate.getRetryExecutor().addHook({
    onRetry(): void {
      metrics.increment(MetricNames.RETRY_ATTEMPTS, labels);
    },
  });
}
