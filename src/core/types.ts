export type DecisionAction = 'BUY' | 'SELL';
export type SignalAction = DecisionAction | 'HOLD';

export interface Tick {
  symbol: string;
  price: number;
  indicators: Record<string, number>;
}

/** Strategy output. HOLD is expressed by returning no decision at all. */
export interface Decision {
  action: DecisionAction;
  symbol: string;
  size: number;
  note: string;
}

export interface Signal {
  action: SignalAction;
  symbol: string;
  size: number;
  note: string;
}
