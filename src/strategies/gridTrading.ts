import { ConfigError } from '../core/errors.js';
import type { Decision, DecisionAction, Tick } from '../core/types.js';
import { mustBeNonEmpty, mustBePositive, mustBeRatio } from '../core/validation.js';
import type { Strategy } from './interface.js';

export const DEFAULT_MIN_STEP_RATIO = 0.002;

export interface GridConfig {
  symbol: string;
  lower: number;
  upper: number;
  size: number;
  /** Fraction price must move away from a band before the same trigger re-arms. */
  minStepRatio?: number;
}

export type GridLastAction = DecisionAction | 'NONE';

export interface GridSnapshot {
  symbol: string;
  lower: number;
  upper: number;
  size: number;
  minStepRatio: number;
  lastAction: GridLastAction;
}

export class GridTradingStrategy implements Strategy {
  readonly name: string;
  readonly symbol: string;

  private readonly lower: number;
  private readonly upper: number;
  private readonly size: number;
  private readonly minStepRatio: number;
  private lastAction: GridLastAction = 'NONE';

  constructor(config: GridConfig) {
    mustBeNonEmpty(config.symbol, 'symbol');
    mustBePositive(config.lower, 'lower');
    mustBePositive(config.upper, 'upper');
    mustBePositive(config.size, 'size');
    const minStepRatio = config.minStepRatio ?? DEFAULT_MIN_STEP_RATIO;
    mustBeRatio(minStepRatio, 'minStepRatio');
    // Equal or inverted bands would let both triggers fire on one tick.
    if (config.lower >= config.upper) {
      throw new ConfigError('grid lower bound must be below upper bound', {
        symbol: config.symbol,
        lower: config.lower,
        upper: config.upper
      });
    }

    this.symbol = config.symbol;
    this.name = `grid_${config.symbol}`;
    this.lower = config.lower;
    this.upper = config.upper;
    this.size = config.size;
    this.minStepRatio = minStepRatio;
  }

  onTick(tick: Tick): Decision | null {
    const { symbol, price } = tick;
    if (symbol !== '' && symbol !== this.symbol) return null;
    if (!Number.isFinite(price) || price <= 0) return null;

    // Re-arm before triggering: one tick may reset and fire the opposite side.
    if (this.lastAction === 'BUY' && price > this.lower * (1 + this.minStepRatio)) {
      this.lastAction = 'NONE';
    }
    if (this.lastAction === 'SELL' && price < this.upper * (1 - this.minStepRatio)) {
      this.lastAction = 'NONE';
    }

    if (price <= this.lower && this.lastAction !== 'BUY') {
      this.lastAction = 'BUY';
      return this.decide('BUY', `grid buy ${price.toFixed(2)}`);
    }

    if (price >= this.upper && this.lastAction !== 'SELL') {
      this.lastAction = 'SELL';
      return this.decide('SELL', `grid sell ${price.toFixed(2)}`);
    }

    return null;
  }

  snapshot(): GridSnapshot {
    return {
      symbol: this.symbol,
      lower: this.lower,
      upper: this.upper,
      size: this.size,
      minStepRatio: this.minStepRatio,
      lastAction: this.lastAction
    };
  }

  private decide(action: DecisionAction, note: string): Decision {
    return { action, symbol: this.symbol, size: this.size, note };
  }
}
