import { alertTemplates } from '../alerts/alertTemplates.js';
import type { Notifier } from '../alerts/interface.js';
import { KeyedMutex } from '../core/keyedMutex.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import type { Decision, Signal, Tick } from '../core/types.js';
import type { Strategy } from '../strategies/interface.js';
import type { StrategyRegistry } from '../strategies/registry.js';

export interface DecisionServiceOptions {
  /** Send a notification for every BUY/SELL signal. */
  notifyOnSignal?: boolean;
}

export const holdSignal = (symbol: string, note = 'no-op'): Signal => ({
  action: 'HOLD',
  symbol,
  size: 0,
  note
});

export const toSignal = (decision: Decision): Signal => ({
  action: decision.action,
  symbol: decision.symbol,
  size: decision.size,
  note: decision.note
});

/**
 * Bridges one inbound tick to the strategy bound to its symbol and always
 * answers with a Signal. Ticks for the same strategy are applied one at a
 * time in arrival order; different strategies do not wait on each other.
 */
export class DecisionService {
  private readonly locks = new KeyedMutex();

  constructor(
    private readonly registry: StrategyRegistry,
    private readonly notifier: Notifier,
    private readonly logger: Logger,
    private readonly metrics: Metrics,
    private readonly options: DecisionServiceOptions = {}
  ) {}

  async onTick(tick: Tick): Promise<Signal> {
    this.metrics.increment('ticks_total');

    const strategy = this.registry.resolve(tick.symbol);
    if (!strategy) {
      this.metrics.increment('ticks_unrouted');
      this.metrics.increment('signals_hold');
      this.logger.debug('no strategy for symbol', { symbol: tick.symbol });
      return holdSignal(tick.symbol);
    }

    const signal = await this.locks.runExclusive(strategy.symbol, () => this.evaluate(strategy, tick));

    if (signal.action === 'HOLD') {
      this.metrics.increment('signals_hold');
      return signal;
    }

    this.metrics.increment(signal.action === 'BUY' ? 'signals_buy' : 'signals_sell');
    this.logger.info('signal emitted', {
      strategy: strategy.name,
      action: signal.action,
      symbol: signal.symbol,
      size: signal.size,
      price: tick.price
    });
    if (this.options.notifyOnSignal ?? true) {
      this.notifier.send(alertTemplates.signalEmitted(signal));
    }
    return signal;
  }

  private evaluate(strategy: Strategy, tick: Tick): Signal {
    let decision: Decision | null;
    try {
      decision = strategy.onTick(tick);
    } catch (err) {
      this.metrics.increment('strategy_errors');
      this.logger.error('strategy failed on tick', {
        strategy: strategy.name,
        symbol: tick.symbol,
        price: tick.price,
        err: String(err)
      });
      return holdSignal(tick.symbol, 'strategy error');
    }
    return decision ? toSignal(decision) : holdSignal(tick.symbol);
  }
}
