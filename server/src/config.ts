export type ServerConfig = {
  port: number;
  /** Origins allowed by CORS (the web client's dev server by default). */
  corsOrigins: string[];
  /** Log one line per request. */
  requestLog: boolean;
};

export const DEFAULT_PORT = 8000;
export const DEFAULT_CORS_ORIGINS: readonly string[] = ["http://localhost:3000"];

function parsePort(raw: string | undefined): number {
  if (raw == null || raw.trim() === "") return DEFAULT_PORT;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) throw new Error(`Invalid PORT: ${raw}`);
  return port;
}

function parseOrigins(raw: string | undefined): string[] {
  const origins = (raw ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  return origins.length > 0 ? origins : [...DEFAULT_CORS_ORIGINS];
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: parsePort(env.PORT),
    corsOrigins: parseOrigins(env.CHESS_CORS_ORIGINS),
    requestLog: env.CHESS_REQUEST_LOG !== "0",
  };
}
