import { z } from 'zod';

/**
 * Configuration schema with validation
 */
export const configSchema = z
  .object({
    // Server
    port: z.number().int().positive().default(8080),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

    // Storage
    storageDriver: z.enum(['memory', 'postgres']).default('memory'),
    databaseUrl: z.string().url().optional(),
    databasePoolMax: z.number().int().positive().default(10),

    // WebSocket
    wsHeartbeatInterval: z.number().int().positive().default(30000), // 30s
    wsMaxConnections: z.number().int().positive().default(10000),
    wsOutboundQueueLimit: z.number().int().positive().default(1000),
    wsHighWaterMark: z.number().int().positive().default(1024 * 1024), // 1 MiB
  })
  .refine((c) => c.storageDriver !== 'postgres' || c.databaseUrl !== undefined, {
    message: 'DATABASE_URL is required when STORAGE_DRIVER=postgres',
    path: ['databaseUrl'],
  });

export type Config = z.infer<typeof configSchema>;

function intFromEnv(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

/**
 * Load and validate configuration from environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    port: intFromEnv(env.PORT),
    host: env.HOST || undefined,
    nodeEnv: env.NODE_ENV || undefined,

    storageDriver: env.STORAGE_DRIVER || undefined,
    databaseUrl: env.DATABASE_URL || undefined,
    databasePoolMax: intFromEnv(env.DB_POOL_MAX),

    wsHeartbeatInterval: intFromEnv(env.WS_HEARTBEAT_INTERVAL),
    wsMaxConnections: intFromEnv(env.WS_MAX_CONNECTIONS),
    wsOutboundQueueLimit: intFromEnv(env.WS_OUTBOUND_QUEUE_LIMIT),
    wsHighWaterMark: intFromEnv(env.WS_HIGH_WATER_MARK),
  };

  return configSchema.parse(raw);
}
