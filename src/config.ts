import { ConfigError } from './errors';

export interface AppConfig {
  relayHost: string;
  relayPort: number;
  /** null disables the HTTP health server */
  httpPort: number | null;
}

export const DEFAULT_RELAY_HOST = '127.0.0.1';
export const DEFAULT_RELAY_PORT = 8888;

function parsePort(name: string, raw: string): number {
  const port = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || port > 65535) {
    throw new ConfigError(`${name} must be an integer between 0 and 65535, got "${raw}"`);
  }
  return port;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const httpPort = env.HTTP_PORT?.trim();
  return {
    relayHost: env.RELAY_HOST?.trim() || DEFAULT_RELAY_HOST,
    relayPort: env.RELAY_PORT ? parsePort('RELAY_PORT', env.RELAY_PORT) : DEFAULT_RELAY_PORT,
    httpPort: httpPort ? parsePort('HTTP_PORT', httpPort) : null,
  };
}
