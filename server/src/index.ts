import { startChessServer } from "./app.ts";
import { loadServerConfig } from "./config.ts";

async function main(): Promise<void> {
  const config = loadServerConfig();
  const { url } = await startChessServer(config);
  // eslint-disable-next-line no-console
  console.log(`[chess-server] listening on ${url}`);
  // eslint-disable-next-line no-console
  console.log(`[chess-server] cors origins: ${config.corsOrigins.join(", ")}`);
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error("[chess-server] failed to start", err);
  process.exitCode = 1;
});
