import { describe, expect, it } from 'vitest';
import { ConfigError } from '../../src/core/errors.js';
import { DEFAULT_MIN_STEP_RATIO, GridTradingStrategy } from '../../src/strategies/gridTrading.js';
import { makeTick } from '../helpers.js';

const createGrid = (overrides: Partial<ConstructorParameters<typeof GridTradingStrategy>[0]> = {}) =>
  new GridTradingStrategy({ symbol: 'BTCUSDT', lower: 100, upper: 200, size: 0.5, ...overrides });

const tick = (price: number, symbol = 'BTCUSDT') => makeTick({ symbol, price });

describe('grid trading strategy', () => {
  it('buys below the lower band, holds inside, sells above the upper band', () => {
    const grid = createGrid();

    expect(grid.onTick(tick(95))).toEqual({
      action: 'BUY',
      symbol: 'BTCUSDT',
      size: 0.5,
      note: 'grid buy 95.00'
    });
    expect(grid.onTick(tick(95))).toBeNull();
    expect(grid.onTick(tick(150))).toBeNull();
    expect(grid.onTick(tick(205))).toEqual({
      action: 'SELL',
      symbol: 'BTCUSDT',
      size: 0.5,
      note: 'grid sell 205.00'
    });
  });

  it('treats the bands as inclusive', () => {
    const grid = createGrid();
    expect(grid.onTick(tick(100))?.action).toBe('BUY');
    expect(grid.onTick(tick(200))?.action).toBe('SELL');
  });

  it('re-arms BUY once price clears lower * (1 + minStepRatio)', () => {
    const grid = createGrid();
    expect(grid.onTick(tick(95))?.action).toBe('BUY');

    expect(grid.onTick(tick(100.5))).toBeNull();
    expect(grid.snapshot().lastAction).toBe('NONE');

    expect(grid.onTick(tick(95))?.action).toBe('BUY');
  });

  it('does not re-emit BUY while price stays inside the hysteresis band', () => {
    const grid = createGrid();
    expect(grid.onTick(tick(95))?.action).toBe('BUY');

    expect(grid.onTick(tick(100.1))).toBeNull();
    expect(grid.onTick(tick(99))).toBeNull();
    expect(grid.onTick(tick(95))).toBeNull();
    expect(grid.snapshot().lastAction).toBe('BUY');
  });

  it('re-arms SELL once price drops below upper * (1 - minStepRatio)', () => {
    const grid = createGrid();
    expect(grid.onTick(tick(205))?.action).toBe('SELL');

    expect(grid.onTick(tick(199.7))).toBeNull();
    expect(grid.onTick(tick(210))).toBeNull();
    expect(grid.snapshot().lastAction).toBe('SELL');

    expect(grid.onTick(tick(199.5))).toBeNull();
    expect(grid.snapshot().lastAction).toBe('NONE');
    expect(grid.onTick(tick(205))?.action).toBe('SELL');
  });

  it('resets and fires the opposite trigger within one tick', () => {
    const grid = createGrid();
    expect(grid.onTick(tick(95))?.action).toBe('BUY');
    expect(grid.onTick(tick(250))?.action).toBe('SELL');
    expect(grid.onTick(tick(50))?.action).toBe('BUY');
    expect(grid.snapshot().lastAction).toBe('BUY');
  });

  it('ignores ticks for other symbols without touching state', () => {
    const grid = createGrid();
    expect(grid.onTick(tick(95, 'ETHUSDT'))).toBeNull();
    expect(grid.snapshot().lastAction).toBe('NONE');

    expect(grid.onTick(tick(95))?.action).toBe('BUY');
    // 150 would re-arm BUY for the bound symbol.
    expect(grid.onTick(tick(150, 'ETHUSDT'))).toBeNull();
    expect(grid.snapshot().lastAction).toBe('BUY');
  });

  it('accepts an empty symbol as the bound symbol', () => {
    const grid = createGrid();
    expect(grid.onTick(tick(95, ''))).toEqual({
      action: 'BUY',
      symbol: 'BTCUSDT',
      size: 0.5,
      note: 'grid buy 95.00'
    });
  });

  it('returns no decision for non-positive prices and keeps state', () => {
    const grid = createGrid();
    expect(grid.onTick(tick(0))).toBeNull();
    expect(grid.onTick(tick(-5))).toBeNull();
    expect(grid.snapshot().lastAction).toBe('NONE');

    grid.onTick(tick(95));
    expect(grid.onTick(tick(-1))).toBeNull();
    expect(grid.snapshot().lastAction).toBe('BUY');
  });

  it('rejects non-finite prices', () => {
    const grid = createGrid();
    expect(grid.onTick(tick(Number.NaN))).toBeNull();
    expect(grid.onTick(tick(Number.POSITIVE_INFINITY))).toBeNull();
    expect(grid.onTick(tick(Number.NEGATIVE_INFINITY))).toBeNull();
    expect(grid.snapshot().lastAction).toBe('NONE');
  });

  it('ignores indicators', () => {
    const grid = createGrid();
    expect(grid.onTick(makeTick({ price: 95, indicators: { rsi: 12, ema: 101 } }))?.action).toBe('BUY');
  });

  it('honours a custom minStepRatio', () => {
    const grid = createGrid({ minStepRatio: 0 });
    grid.onTick(tick(95));
    expect(grid.onTick(tick(100.01))).toBeNull();
    expect(grid.snapshot().lastAction).toBe('NONE');
  });

  it('exposes its configuration', () => {
    const grid = createGrid();
    expect(grid.name).toBe('grid_BTCUSDT');
    expect(grid.symbol).toBe('BTCUSDT');
    expect(grid.snapshot()).toEqual({
      symbol: 'BTCUSDT',
      lower: 100,
      upper: 200,
      size: 0.5,
      minStepRatio: DEFAULT_MIN_STEP_RATIO,
      lastAction: 'NONE'
    });
  });

  describe('construction', () => {
    it('rejects equal bands', () => {
      expect(() => createGrid({ lower: 150, upper: 150 })).toThrow(ConfigError);
    });

    it('rejects inverted bands', () => {
      expect(() => createGrid({ lower: 200, upper: 100 })).toThrow('grid lower bound must be below upper bound');
    });

    it('rejects a non-positive lower band', () => {
      expect(() => createGrid({ lower: 0 })).toThrow('lower must be a positive number');
      expect(() => createGrid({ lower: -5 })).toThrow(ConfigError);
    });

    it('rejects a non-positive size', () => {
      expect(() => createGrid({ size: 0 })).toThrow('size must be a positive number');
    });

    it('rejects a minStepRatio outside [0, 1)', () => {
      expect(() => createGrid({ minStepRatio: 1 })).toThrow('minStepRatio must be in [0, 1)');
      expect(() => createGrid({ minStepRatio: -0.1 })).toThrow(ConfigError);
    });

    it('rejects an empty symbol', () => {
      expect(() => createGrid({ symbol: ' ' })).toThrow('symbol must not be empty');
    });
  });
});
