import { alertTemplates } from './alerts/alertTemplates.js';
import { createNotifier } from './alerts/telegram.js';
import { loadConfig, loadDotenv } from './config/load.js';
import { AppError } from './core/errors.js';
import { JsonLogger } from './core/logger.js';
import { InMemoryMetrics } from './core/metrics.js';
import { LicenseGate } from './license/licenseGate.js';
import { buildSecretsProvider, SECRET_IDS } from './secrets/provider.js';
import { DecisionService } from './services/decisionService.js';
import { StrategyRegistry } from './strategies/registry.js';
import { WorkerServer } from './transport/grpcServer.js';

const main = async (): Promise<void> => {
  loadDotenv();
  const config = loadConfig();
  const logger = new JsonLogger(config.logLevel, { service: 'signal-worker' });
  const metrics = new InMemoryMetrics();
  const secrets = buildSecretsProvider(config);

  const registry = StrategyRegistry.fromDefinitions(config.strategies);
  logger.info('strategies registered', { symbols: registry.symbols() });
  metrics.gauge('strategies_registered', registry.size);

  const telegramToken = config.alerts.telegram.enabled
    ? await secrets.getSecret(SECRET_IDS.telegramToken, 'TELEGRAM_BOT_TOKEN')
    : undefined;
  const notifier = createNotifier(
    {
      enabled: config.alerts.telegram.enabled,
      botToken: telegramToken,
      chatId: config.alerts.telegram.chatId
    },
    logger.child({ component: 'alerts' })
  );

  let licenseToken: string | undefined;
  if (config.license.required) {
    licenseToken = await secrets.getSecret(SECRET_IDS.licenseToken, 'LICENSE_TOKEN');
    if (!licenseToken) {
      throw new AppError('LICENSE_REQUIRED is set but no license token is available', 'LICENSE_MISSING');
    }
  }
  const gate = new LicenseGate({ token: licenseToken, expiresAt: config.license.expiresAt });
  if (!gate.enabled) {
    logger.warn('license gate disabled; calls are not authorized');
  }
  const remainingMs = gate.remainingMs();
  if (remainingMs !== undefined) {
    metrics.gauge('license_remaining_ms', remainingMs);
    logger.info('license expiry', { expiresAt: config.license.expiresAt, remainingMs });
  }

  const service = new DecisionService(registry, notifier, logger.child({ component: 'decisions' }), metrics, {
    notifyOnSignal: config.alerts.notifyOnSignal
  });
  const server = new WorkerServer(
    { service, gate, logger: logger.child({ component: 'grpc' }), metrics },
    { maxConcurrentCalls: config.server.maxConcurrentCalls }
  );

  await server.listen(config.server.host, config.server.port);
  notifier.send(alertTemplates.workerStarted(server.address ?? '', registry.symbols()));

  let stopping = false;
  const shutdown = async (reason: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info('shutting down', { reason, ...metrics.snapshot() });
    notifier.send(alertTemplates.workerStopped(reason));
    await server.stop();
    await notifier.flush();
    logger.info('stopped');
  };

  process.once('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.once('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
};

main().catch((err: unknown) => {
  const logger = new JsonLogger('error', { service: 'signal-worker' });
  logger.error('fatal startup error', {
    err: err instanceof Error ? err.message : String(err),
    code: err instanceof AppError ? err.code : undefined,
    details: err instanceof AppError ? err.details : undefined
  });
  process.exitCode = 1;
});
