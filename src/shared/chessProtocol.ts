import type { MoveErrorKind } from "../game/moveTypes.ts";
import type { WireGameState, WireMoveRecord } from "./wireState.ts";

export type ChessError = {
  error: string;
  /** Set when the engine rejected a move. */
  code?: MoveErrorKind;
};

export type HealthResponse = {
  message: string;
};

export type GetStateResponse = WireGameState;

export type MoveRequestBody = {
  from: string;
  to: string;
  /** Promotion piece when a pawn reaches the last rank: q, r, b or n. */
  promotion?: string;
};

export type MoveResponse =
  | {
      state: WireGameState;
      last_move: WireMoveRecord;
    }
  | ChessError;

export type HistoryResponse = {
  history: WireMoveRecord[];
};

export type RestartResponse = {
  state: WireGameState;
  history: WireMoveRecord[];
};

export type ParseMoveRequestResult = { ok: true; body: MoveRequestBody } | { ok: false; error: string };

function isRecord(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw);
}

/** Shape check for POST /move. Move legality is left to the engine. */
export function parseMoveRequestBody(raw: unknown): ParseMoveRequestResult {
  if (!isRecord(raw)) return { ok: false, error: "Request body must be a JSON object" };

  const { from, to, promotion } = raw;
  if (typeof from !== "string") return { ok: false, error: "Field 'from' must be a string" };
  if (typeof to !== "string") return { ok: false, error: "Field 'to' must be a string" };
  if (promotion != null && typeof promotion !== "string") {
    return { ok: false, error: "Field 'promotion' must be a string when present" };
  }

  return {
    ok: true,
    body: {
      from,
      to,
      ...(typeof promotion === "string" ? { promotion } : {}),
    },
  };
}
