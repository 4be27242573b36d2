import type { z } from 'zod';
import type { configSchema, gridDefinitionSchema } from './schema.js';

export type AppConfig = z.infer<typeof configSchema>;
export type GridDefinitionConfig = z.infer<typeof gridDefinitionSchema>;
