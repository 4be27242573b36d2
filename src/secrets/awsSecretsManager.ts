import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import type { SecretsProvider } from './provider.js';

export type FetchSecretString = (secretId: string) => Promise<string | undefined>;

const fetchFromSecretsManager = (region: string): FetchSecretString => {
  const client = new SecretsManagerClient({ region });
  return async (secretId) => {
    const response = await client.send(new GetSecretValueCommand({ SecretId: secretId }));
    return response.SecretString;
  };
};

export class AwsSecretsManagerProvider implements SecretsProvider {
  constructor(
    region: string,
    private readonly env: NodeJS.ProcessEnv,
    private readonly fetchSecretString: FetchSecretString = fetchFromSecretsManager(region)
  ) {}

  async getSecret(secretId: string, fallbackEnvName?: string): Promise<string> {
    try {
      const secretString = await this.fetchSecretString(secretId);
      if (!secretString) {
        throw new Error(`Secret ${secretId} is empty`);
      }
      return unwrapSecret(secretString);
    } catch (err) {
      const fallback = fallbackEnvName ? this.env[fallbackEnvName] : undefined;
      if (fallback) {
        return fallback.trim();
      }
      throw err;
    }
  }
}

/** Secrets are stored either raw or as `{"value": "..."}`. */
const unwrapSecret = (secretString: string): string => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(secretString);
  } catch {
    return secretString;
  }
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'value' in parsed &&
    typeof parsed.value === 'string' &&
    parsed.value.length > 0
  ) {
    return parsed.value;
  }
  return secretString;
};
