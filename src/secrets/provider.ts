import type { AppConfig } from '../config/types.js';
import { AwsSecretsManagerProvider } from './awsSecretsManager.js';
import { EnvFallbackSecretsProvider } from './envFallback.js';

export { SECRET_IDS } from './ids.js';

export interface SecretsProvider {
  /** Resolve a secret; optional secrets that are absent resolve to ''. */
  getSecret(secretId: string, fallbackEnvName?: string): Promise<string>;
}

export const buildSecretsProvider = (
  config: AppConfig,
  env: NodeJS.ProcessEnv = process.env
): SecretsProvider => {
  if (config.secrets.provider === 'aws') {
    return new AwsSecretsManagerProvider(config.secrets.awsRegion, env);
  }
  return new EnvFallbackSecretsProvider(env);
};
