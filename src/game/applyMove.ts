import { opponentOf } from "../types.ts";
import type { GameState } from "./state.ts";
import { moveFailed, type MoveRecord, type MoveResult, type PromotionCode } from "./moveTypes.ts";
import { algebraicToIndex, indexToAlgebraic, normalizeSquare } from "./coords.ts";
import { pieceAt, setPiece } from "./board.ts";
import { validatePieceMove } from "./pieceRules.ts";
import { DEFAULT_PROMOTION, isPromotionRow, parsePromotionCode, promotedPiece } from "./promote.ts";

export interface MoveRequest {
  from: string;
  to: string;
  /** q, r, b or n (any case). Omit to auto-queen. */
  promotion?: string;
}

/**
 * Validate and apply one half-move to `state` in place.
 *
 * Checks run in a fixed order and the first failure is returned; nothing is written to
 * the board, the log or the turn until every check has passed.
 */
export function applyMove(state: GameState, request: MoveRequest): MoveResult {
  if (state.gameStatus !== "in_progress") {
    return moveFailed({ kind: "GameNotInProgress", message: "Game is not in progress." });
  }

  if (normalizeSquare(request.from) === normalizeSquare(request.to)) {
    return moveFailed({ kind: "SameSquare", message: "from and to squares must be different." });
  }

  const fromParsed = algebraicToIndex(request.from);
  if (!fromParsed.ok) return moveFailed(fromParsed.error);
  const toParsed = algebraicToIndex(request.to);
  if (!toParsed.ok) return moveFailed(toParsed.error);

  const from = fromParsed.index;
  const to = toParsed.index;
  const fromSquare = indexToAlgebraic(from);
  const toSquare = indexToAlgebraic(to);

  const piece = pieceAt(state.board, from);
  if (!piece) {
    return moveFailed({ kind: "EmptySource", message: `No piece at ${fromSquare}.`, square: fromSquare });
  }
  if (piece.color !== state.currentTurn) {
    return moveFailed({
      kind: "WrongTurn",
      message: `It is ${state.currentTurn}'s turn.`,
      currentTurn: state.currentTurn,
    });
  }

  const target = pieceAt(state.board, to);
  if (target && target.color === piece.color) {
    return moveFailed({ kind: "FriendlyCapture", message: "Cannot capture your own piece." });
  }
  const capture = target !== null;

  const ruleError = validatePieceMove({
    board: state.board,
    piece,
    from,
    to,
    capture,
    promotionRequested: request.promotion !== undefined,
  });
  if (ruleError) return moveFailed(ruleError);

  let promotion: PromotionCode | null = null;
  if (piece.type === "pawn" && isPromotionRow(to.row)) {
    promotion = request.promotion === undefined ? DEFAULT_PROMOTION : parsePromotionCode(request.promotion);
    if (!promotion) {
      return moveFailed({ kind: "InvalidPromotion", message: "Invalid promotion piece. Use one of: q, r, b, n." });
    }
  }

  setPiece(state.board, from, null);
  setPiece(state.board, to, promotion ? promotedPiece(piece.color, promotion) : piece);

  const record: MoveRecord = {
    moveNumber: state.history.nextMoveNumber(),
    color: piece.color,
    from: fromSquare,
    to: toSquare,
    capture,
    promotion,
    piece: { type: piece.type, color: piece.color },
  };
  state.history.push(record);
  state.currentTurn = opponentOf(state.currentTurn);

  return { ok: true, record };
}
