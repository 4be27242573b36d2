import { ConfigError } from '../core/errors.js';
import type { Strategy } from './interface.js';
import { createStrategy, type StrategyDefinition } from './selector.js';

/**
 * Symbol → strategy lookup. Each instance is constructed once at startup and
 * lives for the rest of the process.
 */
export class StrategyRegistry {
  private readonly bySymbol = new Map<string, Strategy>();

  static fromDefinitions(definitions: readonly StrategyDefinition[]): StrategyRegistry {
    const registry = new StrategyRegistry();
    for (const definition of definitions) {
      registry.register(createStrategy(definition));
    }
    return registry;
  }

  register(strategy: Strategy): void {
    if (this.bySymbol.has(strategy.symbol)) {
      throw new ConfigError(`duplicate strategy for symbol ${strategy.symbol}`, {
        symbol: strategy.symbol,
        strategy: strategy.name
      });
    }
    this.bySymbol.set(strategy.symbol, strategy);
  }

  /**
   * An empty symbol routes to the sole strategy when exactly one is hosted,
   * otherwise it routes nowhere.
   */
  resolve(symbol: string): Strategy | undefined {
    if (symbol === '') {
      if (this.bySymbol.size !== 1) return undefined;
      const [only] = this.bySymbol.values();
      return only;
    }
    return this.bySymbol.get(symbol);
  }

  symbols(): string[] {
    return [...this.bySymbol.keys()];
  }

  get size(): number {
    return this.bySymbol.size;
  }
}
