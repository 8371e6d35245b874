export const DEFAULT_PORT = 8080;

export interface ServerConfig {
  port: number;
  debug: boolean;
}

function readPositiveIntEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (!raw) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return undefined;
  return parsed;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: readPositiveIntEnv(env, "SMARTCALC_PORT") ?? DEFAULT_PORT,
    debug: env["SMARTCALC_DEBUG"] !== "0",
  };
}
