import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';
import { loadConfig } from '../config';

/**
 * Metrics configuration
 */
export interface MetricsConfig {
  /** Enable default Node.js metrics collection */
  collectDefault: boolean;
  /** Prefix for all metrics */
  prefix: string;
}

const DEFAULT_CONFIG: MetricsConfig = {
  collectDefault: false,
  prefix: 'swap_router_',
};

export type SwapDirection = 'buy' | 'sell';
export type SwapOutcome = 'ok' | 'infeasible' | 'no_route';
export type HopKind = 'uniswap' | 'weth';

/**
 * Metrics collector for buy/sell route traversal.
 * Each instance owns its registry so several instances can coexist in one process.
 */
export class Metrics {
  private config: MetricsConfig;
  public readonly registry: Registry;

  public readonly swapAttemptsTotal: Counter<'direction'>;
  public readonly swapOutcomesTotal: Counter<'direction' | 'result'>;
  public readonly swapHopsTotal: Counter<'kind' | 'result'>;
  public readonly swapRouteLength: Histogram<'direction'>;

  constructor(config: Partial<MetricsConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.registry = new Registry();

    this.swapAttemptsTotal = new Counter({
      name: `${this.config.prefix}swap_attempts_total`,
      help: 'Total number of buy/sell traversals started',
      labelNames: ['direction'],
      registers: [this.registry],
    });

    this.swapOutcomesTotal = new Counter({
      name: `${this.config.prefix}swap_outcomes_total`,
      help: 'Buy/sell traversals by outcome',
      labelNames: ['direction', 'result'],
      registers: [this.registry],
    });

    this.swapHopsTotal = new Counter({
      name: `${this.config.prefix}swap_hops_total`,
      help: 'Single-hop transforms executed, by hop kind and result',
      labelNames: ['kind', 'result'],
      registers: [this.registry],
    });

    this.swapRouteLength = new Histogram({
      name: `${this.config.prefix}swap_route_length`,
      help: 'Number of hops in the selected route',
      labelNames: ['direction'],
      buckets: [1, 2, 3, 4, 6, 8],
      registers: [this.registry],
    });

    if (this.config.collectDefault) {
      collectDefaultMetrics({ register: this.registry, prefix: this.config.prefix });
    }
  }

  recordAttempt(direction: SwapDirection, routeLength: number): void {
    this.swapAttemptsTotal.inc({ direction });
    if (routeLength > 0) {
      this.swapRouteLength.observe({ direction }, routeLength);
    }
  }

  recordOutcome(direction: SwapDirection, result: SwapOutcome): void {
    this.swapOutcomesTotal.inc({ direction, result });
  }

  recordHop(kind: HopKind, ok: boolean): void {
    this.swapHopsTotal.inc({ kind, result: ok ? 'ok' : 'failed' });
  }

  /**
   * Get metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  clearMetrics(): void {
    this.registry.resetMetrics();
  }
}

/**
 * Default metrics instance
 */
export const metrics = new Metrics({ prefix: loadConfig().METRICS_PREFIX });

export function createMetrics(config: Partial<MetricsConfig> = {}): Metrics {
  return new Metrics(config);
}
