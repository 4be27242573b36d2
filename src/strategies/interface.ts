import type { Decision, Tick } from '../core/types.js';

export interface Strategy {
  readonly name: string;
  /** Symbol this instance is bound to; ticks for other symbols are ignored. */
  readonly symbol: string;
  /**
   * Evaluate one tick. `null` means no action this tick, never an error.
   * Not required to be safe under concurrent calls; callers serialize.
   */
  onTick(tick: Tick): Decision | null;
}
