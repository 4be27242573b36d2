#!/usr/bin/env tsx
/**
 * Send one tick to a running signal worker and print the returned signal.
 *
 *   tsx scripts/send-tick.ts <symbol> <price> [name=value ...]
 *
 * WORKER_ADDRESS (default localhost:50051) and LICENSE_TOKEN are read from env.
 */
import { WorkerClient } from '../src/transport/grpcClient.js';

const parseIndicators = (pairs: string[]): Record<string, number> => {
  const indicators: Record<string, number> = {};
  for (const pair of pairs) {
    const [name, raw] = pair.split('=');
    const value = Number(raw);
    if (!name || raw === undefined || !Number.isFinite(value)) {
      throw new Error(`bad indicator "${pair}", expected name=number`);
    }
    indicators[name] = value;
  }
  return indicators;
};

async function main() {
  const [symbol, priceArg, ...rest] = process.argv.slice(2);
  if (!symbol || priceArg === undefined) {
    console.error('usage: send-tick <symbol> <price> [name=value ...]');
    process.exitCode = 2;
    return;
  }

  const client = new WorkerClient(process.env.WORKER_ADDRESS ?? 'localhost:50051');
  try {
    const signal = await client.onTick(
      { symbol, price: Number(priceArg), indicators: parseIndicators(rest) },
      { token: process.env.LICENSE_TOKEN }
    );
    console.log(JSON.stringify(signal, null, 2));
  } finally {
    client.close();
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
