import { z } from 'zod';
import { assertTableSize } from './engine/UnoGame';
import { ConfigurationError } from './errors';

const ConfigSchema = z.object({
  maxConnections: z.coerce.number().int().min(1).default(1),
  connectTimeout: z.coerce.number().positive().default(60), // seconds
  nameTimeout: z.coerce.number().positive().default(60), // seconds
  aiPlayers: z.coerce.number().int().min(0).default(5),
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(0).max(65535).default(5555),
  statusPort: z.coerce.number().int().min(0).max(65535).default(8080),
  aiDelayMs: z.coerce.number().int().min(0).default(1000),
});

export type ServerConfig = z.infer<typeof ConfigSchema>;

function fromEnv(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = ConfigSchema.safeParse({
    maxConnections: fromEnv(env.MAX_CONNECTIONS),
    connectTimeout: fromEnv(env.CONNECT_TIMEOUT),
    nameTimeout: fromEnv(env.NAME_TIMEOUT),
    aiPlayers: fromEnv(env.AI_PLAYERS),
    host: fromEnv(env.HOST),
    port: fromEnv(env.PORT),
    statusPort: fromEnv(env.STATUS_PORT),
    aiDelayMs: fromEnv(env.AI_DELAY_MS),
  });
  if (!parsed.success) {
    const detail = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${detail}`);
  }
  // At least one human will sit down, so the computer players alone must leave room.
  assertTableSize(parsed.data.aiPlayers, 1);
  return parsed.data;
}
