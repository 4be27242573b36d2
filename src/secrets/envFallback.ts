import { SECRET_IDS } from './ids.js';
import type { SecretsProvider } from './provider.js';

const fallbackMap: Record<string, string> = {
  [SECRET_IDS.telegramToken]: 'TELEGRAM_BOT_TOKEN',
  [SECRET_IDS.licenseToken]: 'LICENSE_TOKEN'
};

// Both are optional: without them alerts and the license gate stay off.
const optionalSecrets = new Set<string>([SECRET_IDS.telegramToken, SECRET_IDS.licenseToken]);

export class EnvFallbackSecretsProvider implements SecretsProvider {
  constructor(private readonly env: NodeJS.ProcessEnv) {}

  async getSecret(secretId: string, fallbackEnvName?: string): Promise<string> {
    const envKey = fallbackEnvName ?? fallbackMap[secretId];
    const value = envKey ? this.env[envKey] : undefined;

    if (!value) {
      if (optionalSecrets.has(secretId)) {
        return '';
      }
      throw new Error(`Missing secret in env fallback for ${secretId} (env var: ${envKey})`);
    }

    return value.trim();
  }
}
