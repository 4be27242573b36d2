import { z } from 'zod';

const parseBoolean = (v: unknown, fallback: boolean): boolean => {
  if (typeof v !== 'string' || v.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(v.toLowerCase());
};

export const gridDefinitionSchema = z
  .object({
    kind: z.literal('grid').default('grid'),
    symbol: z.string().trim().min(1),
    lower: z.number().finite().positive(),
    upper: z.number().finite().positive(),
    size: z.number().finite().positive(),
    minStepRatio: z.number().finite().min(0).lt(1).default(0.002)
  })
  .refine((g) => g.lower < g.upper, {
    message: 'lower must be below upper',
    path: ['lower']
  });

export const strategiesSchema = z
  .array(gridDefinitionSchema)
  .min(1)
  .refine((defs) => new Set(defs.map((d) => d.symbol)).size === defs.length, {
    message: 'duplicate strategy symbol'
  });

const jsonString = z.string().transform((raw, ctx): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be valid JSON' });
    return z.NEVER;
  }
});

// Only read when GRID_STRATEGIES is absent.
const singleGridSchema = z.object({
  GRID_SYMBOL: z.string().default('BTCUSDT'),
  GRID_LOWER: z.coerce.number().default(100),
  GRID_UPPER: z.coerce.number().default(200),
  GRID_SIZE: z.coerce.number().default(0.001),
  GRID_MIN_STEP_RATIO: z.coerce.number().default(0.002)
});

const rawSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  GRPC_HOST: z.string().default('0.0.0.0'),
  GRPC_PORT: z.coerce.number().int().min(1).max(65535).default(50051),
  WORKER_MAX_CONCURRENT_CALLS: z.coerce.number().int().positive().default(2),

  // JSON array of grid definitions; replaces the single GRID_* strategy when set.
  GRID_STRATEGIES: jsonString.optional(),

  ALERT_TELEGRAM_ENABLED: z.string().optional(),
  TELEGRAM_CHAT_ID: z.string().optional(),
  ALERT_NOTIFY_ON_SIGNAL: z.string().optional(),

  LICENSE_REQUIRED: z.string().optional(),
  LICENSE_EXPIRES_AT: z.string().datetime({ offset: true }).optional(),

  SECRETS_PROVIDER: z.enum(['env', 'aws']).default('env'),
  AWS_REGION: z.string().default('us-east-1')
});

const singleGridDefinition = (env: unknown, ctx: z.RefinementCtx): unknown[] | undefined => {
  const parsed = singleGridSchema.safeParse(env);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message, path: issue.path });
    }
    return undefined;
  }
  const grid = parsed.data;
  return [
    {
      kind: 'grid',
      symbol: grid.GRID_SYMBOL,
      lower: grid.GRID_LOWER,
      upper: grid.GRID_UPPER,
      size: grid.GRID_SIZE,
      minStepRatio: grid.GRID_MIN_STEP_RATIO
    }
  ];
};

// passthrough keeps the GRID_* variables for singleGridDefinition.
export const configSchema = rawSchema.passthrough().transform((raw, ctx) => {
  const candidate = raw.GRID_STRATEGIES ?? singleGridDefinition(raw, ctx);
  if (candidate === undefined) return z.NEVER;
  const strategies = strategiesSchema.safeParse(candidate);
  if (!strategies.success) {
    for (const issue of strategies.error.issues) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: issue.message,
        path: ['strategies', ...issue.path]
      });
    }
    return z.NEVER;
  }

  return {
    nodeEnv: raw.NODE_ENV,
    logLevel: raw.LOG_LEVEL,

    server: {
      host: raw.GRPC_HOST,
      port: raw.GRPC_PORT,
      maxConcurrentCalls: raw.WORKER_MAX_CONCURRENT_CALLS
    },

    strategies: strategies.data,

    alerts: {
      telegram: {
        enabled: parseBoolean(raw.ALERT_TELEGRAM_ENABLED, false),
        chatId: raw.TELEGRAM_CHAT_ID
      },
      notifyOnSignal: parseBoolean(raw.ALERT_NOTIFY_ON_SIGNAL, true)
    },

    license: {
      required: parseBoolean(raw.LICENSE_REQUIRED, false),
      expiresAt: raw.LICENSE_EXPIRES_AT ? Date.parse(raw.LICENSE_EXPIRES_AT) : undefined
    },

    secrets: {
      provider: raw.SECRETS_PROVIDER,
      awsRegion: raw.AWS_REGION
    }
  };
});
