import express from "express";
import cors from "cors";
import { createServer, type Server } from "node:http";

import { ChessGame } from "../../src/game/chessGame.ts";
import {
  serializeWireGameState,
  serializeWireHistory,
  serializeWireMoveRecord,
} from "../../src/shared/wireState.ts";
import {
  parseMoveRequestBody,
  type ChessError,
  type GetStateResponse,
  type HealthResponse,
  type HistoryResponse,
  type MoveResponse,
  type RestartResponse,
} from "../../src/shared/chessProtocol.ts";
import { DEFAULT_CORS_ORIGINS, DEFAULT_PORT, type ServerConfig } from "./config.ts";

type AppOpts = {
  /** Injected for tests; otherwise one fresh game per app. */
  game?: ChessGame;
  corsOrigins?: string[];
  requestLog?: boolean;
};

export function createChessApp(opts: AppOpts = {}): {
  app: express.Express;
  game: ChessGame;
} {
  const game = opts.game ?? new ChessGame();
  const requestLog = opts.requestLog ?? true;

  const app = express();
  app.use(cors({ origin: opts.corsOrigins ?? [...DEFAULT_CORS_ORIGINS], credentials: true }));
  app.use(express.json({ limit: "16kb" }));

  if (requestLog) {
    app.use((req, _res, next) => {
      // eslint-disable-next-line no-console
      console.log(`[chess-server] ${req.method} ${req.path}`);
      next();
    });
  }

  app.get("/", (_req, res) => {
    const response: HealthResponse = { message: "Healthy" };
    res.json(response);
  });

  app.get("/state", (_req, res) => {
    const response: GetStateResponse = serializeWireGameState(game.getState());
    res.json(response);
  });

  app.post("/move", (req, res) => {
    const body: unknown = req.body;
    const parsed = parseMoveRequestBody(body);
    if (!parsed.ok) {
      const response: ChessError = { error: parsed.error };
      res.status(422).json(response);
      return;
    }

    const { from, to, promotion } = parsed.body;
    const result = game.applyMove(from, to, promotion);
    if (!result.ok) {
      // eslint-disable-next-line no-console
      console.error("[chess-server] move rejected", `${from}-${to}`, result.error.message);
      const response: MoveResponse = { error: result.error.message, code: result.error.kind };
      res.status(400).json(response);
      return;
    }

    const response: MoveResponse = {
      state: serializeWireGameState(game.getState()),
      last_move: serializeWireMoveRecord(result.record),
    };
    res.json(response);
  });

  app.get("/history", (_req, res) => {
    const response: HistoryResponse = { history: serializeWireHistory(game.getHistory()) };
    res.json(response);
  });

  app.post("/restart", (_req, res) => {
    game.restart();
    const response: RestartResponse = {
      state: serializeWireGameState(game.getState()),
      history: serializeWireHistory(game.getHistory()),
    };
    res.json(response);
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof SyntaxError) {
      const response: ChessError = { error: "Malformed JSON body" };
      res.status(400).json(response);
      return;
    }
    // eslint-disable-next-line no-console
    console.error("[chess-server] unhandled error", err);
    const response: ChessError = { error: "Internal server error" };
    res.status(500).json(response);
  });

  return { app, game };
}

export async function startChessServer(
  args: Partial<ServerConfig> & { game?: ChessGame } = {}
): Promise<{
  app: express.Express;
  server: Server;
  url: string;
  game: ChessGame;
}> {
  const { app, game } = createChessApp({
    game: args.game,
    corsOrigins: args.corsOrigins,
    requestLog: args.requestLog,
  });

  const port = args.port ?? DEFAULT_PORT;
  const server = createServer(app);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      resolve();
    });
    server.listen(port);
  });

  const address = server.address();
  const actualPort = typeof address === "object" && address !== null ? address.port : port;
  return { app, server, url: `http://localhost:${actualPort}`, game };
}
