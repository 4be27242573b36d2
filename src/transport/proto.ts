import { fileURLToPath } from 'node:url';
import type { ServiceDefinition } from '@grpc/grpc-js';
import * as protoLoader from '@grpc/proto-loader';
import { AppError } from '../core/errors.js';

export const PROTO_PATH = fileURLToPath(new URL('../../proto/strategy.proto', import.meta.url));
export const STRATEGY_SERVICE = 'strategy.StrategyService';

const loaderOptions: protoLoader.Options = {
  keepCase: true,
  defaults: true,
  oneofs: true
};

/** Loads the StrategyService definition from the .proto at run time. */
export const loadStrategyService = (protoPath: string = PROTO_PATH): ServiceDefinition => {
  const definition = protoLoader.loadSync(protoPath, loaderOptions);
  const service = definition[STRATEGY_SERVICE];
  // Message and enum definitions carry a `format`; services do not.
  if (service === undefined || 'format' in service) {
    throw new AppError(`${STRATEGY_SERVICE} not found in ${protoPath}`, 'PROTO_INVALID', { protoPath });
  }
  return service;
};
