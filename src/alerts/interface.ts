/** Best-effort outbound message channel. `send` must never throw or block the caller. */
export interface Notifier {
  send(message: string): void;
  /** Resolves once every message sent so far has been attempted. */
  flush(): Promise<void>;
}

export interface NotifierConfig {
  enabled: boolean;
  botToken?: string;
  chatId?: string;
}
