import * as grpc from '@grpc/grpc-js';
import type { Signal, Tick } from '../core/types.js';
import { loadStrategyService } from './proto.js';
import { parseSignalResponse, type TickRequest } from './wire.js';

export interface OnTickOptions {
  timeoutMs?: number;
  /** License token sent as `authorization: Bearer <token>`. */
  token?: string;
}

const DEFAULT_TIMEOUT_MS = 2000;

/** Caller side of StrategyService, as an execution engine would use it. */
export class WorkerClient {
  private readonly client: grpc.Client;
  private readonly onTickMethod: grpc.MethodDefinition<TickRequest, unknown>;

  constructor(address: string, protoPath?: string) {
    const service = loadStrategyService(protoPath);
    const method = service['OnTick'];
    if (!method) {
      throw new Error('OnTick missing from StrategyService definition');
    }
    this.onTickMethod = method;
    this.client = new grpc.Client(address, grpc.credentials.createInsecure());
  }

  onTick(tick: Tick, options: OnTickOptions = {}): Promise<Signal> {
    const metadata = new grpc.Metadata();
    if (options.token) {
      metadata.set('authorization', `Bearer ${options.token}`);
    }
    const deadline = Date.now() + (options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    const request: TickRequest = {
      symbol: tick.symbol,
      price: tick.price,
      indicators: tick.indicators
    };

    return new Promise((resolve, reject) => {
      this.client.makeUnaryRequest(
        this.onTickMethod.path,
        this.onTickMethod.requestSerialize,
        this.onTickMethod.responseDeserialize,
        request,
        metadata,
        { deadline },
        (err, response) => {
          if (err) {
            reject(err);
            return;
          }
          try {
            resolve(parseSignalResponse(response));
          } catch (parseErr) {
            reject(parseErr);
          }
        }
      );
    });
  }

  close(): void {
    this.client.close();
  }
}
