/**
 * Alert templates: plain-text messages for worker events.
 *
 * Telegram receives these verbatim (no parse mode), so they carry no markup.
 */

import type { Signal } from '../core/types.js';

export const alertTemplates = {
  signalEmitted(signal: Signal): string {
    const emoji = signal.action === 'BUY' ? '🟢' : '🔴';
    return `${emoji} ${signal.action} ${signal.size} ${signal.symbol} (${signal.note})`;
  },

  workerStarted(address: string, symbols: string[]): string {
    return `🚀 Signal worker started on ${address}\nSymbols: ${symbols.join(', ')}`;
  },

  workerStopped(reason: string): string {
    return `🛑 Signal worker stopped\nReason: ${reason}`;
  },
};
