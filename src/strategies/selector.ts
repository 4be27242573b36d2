import type { Strategy } from './interface.js';
import { GridTradingStrategy, type GridConfig } from './gridTrading.js';

export interface GridStrategyDefinition extends GridConfig {
  kind: 'grid';
}

export type StrategyDefinition = GridStrategyDefinition;

export function createStrategy(definition: StrategyDefinition): Strategy {
  switch (definition.kind) {
    case 'grid':
      return new GridTradingStrategy(definition);
  }
}
