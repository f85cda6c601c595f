import type { Color, GameStatus, PieceType } from "../types.ts";
import type { MoveRecord, PromotionCode } from "../game/moveTypes.ts";
import type { GameStateView } from "../game/chessGame.ts";

export type WirePiece = {
  type: PieceType;
  color: Color;
};

export type WireBoardSquare = {
  /** Lowercase algebraic square, e.g. "e2". */
  position: string;
  piece: WirePiece;
};

export type WireGameState = {
  /** Occupied squares only. */
  board: WireBoardSquare[];
  current_turn: Color;
  game_status: GameStatus;
};

export type WireMoveRecord = {
  moveNumber: number;
  color: Color;
  from: string;
  to: string;
  capture: boolean;
  /** Present only when the move promoted a pawn. */
  promotion?: PromotionCode;
  piece: WirePiece;
};

export function serializeWireGameState(state: GameStateView): WireGameState {
  return {
    board: state.board.map(({ position, piece }) => ({
      position,
      piece: { type: piece.type, color: piece.color },
    })),
    current_turn: state.currentTurn,
    game_status: state.gameStatus,
  };
}

export function serializeWireMoveRecord(record: MoveRecord): WireMoveRecord {
  return {
    moveNumber: record.moveNumber,
    color: record.color,
    from: record.from,
    to: record.to,
    capture: record.capture,
    ...(record.promotion ? { promotion: record.promotion } : {}),
    piece: { type: record.piece.type, color: record.piece.color },
  };
}

export function serializeWireHistory(history: MoveRecord[]): WireMoveRecord[] {
  return history.map(serializeWireMoveRecord);
}
