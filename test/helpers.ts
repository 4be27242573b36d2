/**
 * Shared test helpers: mock factories.
 */

import type { Tick } from '../src/core/types.js';
import type { Logger } from '../src/core/logger.js';
import type { Metrics } from '../src/core/metrics.js';
import type { Notifier } from '../src/alerts/interface.js';

// ── Mock Logger ─────────────────────────────────────────────────────

export type LogCall = { level: string; message: string; context?: Record<string, unknown> };

export const createMockLogger = (calls: LogCall[] = []): Logger & { calls: LogCall[] } => {
  const record = (level: string) => (message: string, context?: Record<string, unknown>) => {
    calls.push({ level, message, context });
  };
  return {
    calls,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    child: () => createMockLogger(calls),
  };
};

// ── Mock Metrics ────────────────────────────────────────────────────

export const createMockMetrics = (): Metrics & { counters: Map<string, number> } => {
  const counters = new Map<string, number>();
  return {
    counters,
    increment(name: string, value = 1) { counters.set(name, (counters.get(name) ?? 0) + value); },
    gauge() {},
  };
};

// ── Mock Notifier ───────────────────────────────────────────────────

export const createMockNotifier = (): Notifier & { messages: string[] } => {
  const messages: string[] = [];
  return {
    messages,
    send(message: string) { messages.push(message); },
    async flush() {},
  };
};

// ── Tick Factory ────────────────────────────────────────────────────

export function makeTick(overrides: Partial<Tick> = {}): Tick {
  return {
    symbol: 'BTCUSDT',
    price: 150,
    indicators: {},
    ...overrides,
  };
}
