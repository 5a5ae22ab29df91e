import { z } from 'zod';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().max(65535).default(9191),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_SEARCH_STATS: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
});

export interface ServiceConfig {
  port: number;
  host: string;
  logSearchStats: boolean;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ServiceConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  return {
    port: parsed.data.PORT,
    host: parsed.data.HOST,
    logSearchStats: parsed.data.LOG_SEARCH_STATS,
  };
}

export function describeEndpoint(config: Pick<ServiceConfig, 'host' | 'port'>): string {
  return `${config.host}:${config.port}`;
}

export function describeListenError(err: NodeJS.ErrnoException, config: Pick<ServiceConfig, 'host' | 'port'>): string {
  const endpoint = describeEndpoint(config);
  switch (err.code) {
    case 'EADDRINUSE':
      return `Move advisor cannot bind ${endpoint}: address already in use. Set PORT or HOST to a free address.`;
    case 'EADDRNOTAVAIL':
      return `Move advisor cannot bind ${endpoint}: HOST is not an address of this machine.`;
    case 'EACCES':
      return `Move advisor cannot bind ${endpoint}: permission denied. Pick a PORT above 1023.`;
    default:
      return `Move advisor failed on ${endpoint}: ${err.message}`;
  }
}
