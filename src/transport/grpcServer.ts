import * as grpc from '@grpc/grpc-js';
import { AppError, AuthorizationError, InvalidRequestError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Metrics } from '../core/metrics.js';
import type { Tick } from '../core/types.js';
import type { LicenseGate } from '../license/licenseGate.js';
import type { DecisionService } from '../services/decisionService.js';
import { loadStrategyService } from './proto.js';
import { parseTickRequest, type SignalResponse } from './wire.js';

export interface WorkerServerDeps {
  service: DecisionService;
  gate: LicenseGate;
  logger: Logger;
  metrics: Metrics;
}

export interface WorkerServerOptions {
  /** Concurrent in-flight calls allowed per client connection. */
  maxConcurrentCalls: number;
  protoPath?: string;
}

const readAuthorization = (metadata: grpc.Metadata): string | undefined => {
  const [value] = metadata.get('authorization');
  if (value === undefined) return undefined;
  return typeof value === 'string' ? value : value.toString('utf8');
};

export const toStatus = (err: unknown): Partial<grpc.StatusObject> => {
  if (err instanceof AuthorizationError) {
    return {
      code: err.reason === 'expired' ? grpc.status.PERMISSION_DENIED : grpc.status.UNAUTHENTICATED,
      details: err.message
    };
  }
  if (err instanceof InvalidRequestError) {
    return { code: grpc.status.INVALID_ARGUMENT, details: err.message };
  }
  if (err instanceof AppError) {
    return { code: grpc.status.INTERNAL, details: err.message };
  }
  return { code: grpc.status.INTERNAL, details: 'internal error' };
};

export const formatAddress = (host: string, port: number): string =>
  host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;

export interface OnTickCall {
  request: unknown;
  metadata: grpc.Metadata;
  peer: string;
}

export type OnTickOutcome = { signal: SignalResponse } | { status: Partial<grpc.StatusObject> };

/**
 * License gate and request validation run before the core is reached; a
 * rejected call never touches strategy state.
 */
export const handleOnTick = async (deps: WorkerServerDeps, call: OnTickCall): Promise<OnTickOutcome> => {
  const { service, gate, logger, metrics } = deps;

  let tick: Tick;
  try {
    gate.authorize(readAuthorization(call.metadata));
    tick = parseTickRequest(call.request);
  } catch (err) {
    const status = toStatus(err);
    metrics.increment('calls_rejected');
    logger.warn('OnTick rejected', { code: status.code, details: status.details, peer: call.peer });
    return { status };
  }

  try {
    return { signal: await service.onTick(tick) };
  } catch (err) {
    metrics.increment('calls_failed');
    logger.error('OnTick failed', { symbol: tick.symbol, err: String(err) });
    return { status: toStatus(err) };
  }
};

export const createOnTickHandler = (
  deps: WorkerServerDeps
): grpc.handleUnaryCall<unknown, SignalResponse> => {
  return (call, callback) => {
    void handleOnTick(deps, { request: call.request, metadata: call.metadata, peer: call.getPeer() }).then(
      (outcome) => {
        if ('signal' in outcome) {
          callback(null, outcome.signal);
        } else {
          callback(outcome.status);
        }
      }
    );
  };
};

export class WorkerServer {
  private readonly server: grpc.Server;
  private boundAddress: string | undefined;

  constructor(
    private readonly deps: WorkerServerDeps,
    options: WorkerServerOptions
  ) {
    this.server = new grpc.Server({
      'grpc.max_concurrent_streams': options.maxConcurrentCalls
    });
    this.server.addService(loadStrategyService(options.protoPath), {
      OnTick: createOnTickHandler(deps)
    });
  }

  /** Binds and starts serving; resolves with the bound port. */
  listen(host: string, port: number): Promise<number> {
    const address = formatAddress(host, port);
    return new Promise((resolve, reject) => {
      this.server.bindAsync(address, grpc.ServerCredentials.createInsecure(), (err, boundPort) => {
        if (err) {
          reject(new AppError(`failed to bind ${address}: ${err.message}`, 'BIND_FAILED', { address }));
          return;
        }
        this.boundAddress = formatAddress(host, boundPort);
        this.deps.logger.info('signal worker listening', { address: this.boundAddress });
        resolve(boundPort);
      });
    });
  }

  get address(): string | undefined {
    return this.boundAddress;
  }

  /** Drains in-flight calls, forcing shutdown after `graceMs`. */
  stop(graceMs = 5000): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.deps.logger.warn('graceful shutdown timed out; forcing', { graceMs });
        this.server.forceShutdown();
        resolve();
      }, graceMs);
      timer.unref();

      this.server.tryShutdown((err) => {
        clearTimeout(timer);
        if (err) {
          this.deps.logger.warn('graceful shutdown failed; forcing', { err: err.message });
          this.server.forceShutdown();
        }
        resolve();
      });
    });
  }
}
