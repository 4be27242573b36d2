import axios, { type AxiosInstance } from 'axios';
import { createHttpClient, postJson } from '../core/http.js';
import type { Logger } from '../core/logger.js';
import type { Notifier, NotifierConfig } from './interface.js';

const TELEGRAM_API = 'https://api.telegram.org';
const SEND_TIMEOUT_MS = 5000;

interface TelegramMessage {
  chat_id: string;
  text: string;
}

export class TelegramNotifier implements Notifier {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly token: string,
    private readonly chatId: string,
    private readonly logger: Logger,
    private readonly client: AxiosInstance = createHttpClient(TELEGRAM_API, SEND_TIMEOUT_MS)
  ) {}

  send(message: string): void {
    const delivery = this.deliver(message);
    this.inFlight.add(delivery);
    void delivery.finally(() => this.inFlight.delete(delivery));
  }

  async flush(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }

  private async deliver(text: string): Promise<void> {
    try {
      await postJson<TelegramMessage, unknown>(this.client, `/bot${this.token}/sendMessage`, {
        chat_id: this.chatId,
        text
      });
    } catch (err) {
      // Never log the token: axios errors carry the request URL.
      this.logger.warn('telegram delivery failed', {
        status: axios.isAxiosError(err) ? err.response?.status : undefined,
        err: axios.isAxiosError(err) ? err.code ?? err.name : String(err)
      });
    }
  }
}

export class DisabledNotifier implements Notifier {
  send(_message: string): void {}

  async flush(): Promise<void> {}
}

export const createNotifier = (config: NotifierConfig, logger: Logger): Notifier => {
  if (!config.enabled) return new DisabledNotifier();
  if (!config.botToken || !config.chatId) {
    logger.warn('telegram alerts enabled without bot token or chat id; alerts disabled');
    return new DisabledNotifier();
  }
  return new TelegramNotifier(config.botToken, config.chatId, logger);
};
