import type { Color, Piece, PieceType } from "../types.ts";
import type { BoardIndex } from "./coords.ts";
import type { IllegalPieceMoveError, IllegalPieceMoveReason, MoveError } from "./moveTypes.ts";
import { pieceAt, type Board } from "./board.ts";
import { isPromotionRow } from "./promote.ts";

export interface PieceMoveContext {
  board: Board;
  piece: Piece;
  from: BoardIndex;
  to: BoardIndex;
  /** True when the destination holds an enemy piece. */
  capture: boolean;
  /** True when the caller supplied a promotion code, valid or not. */
  promotionRequested: boolean;
}

function illegal(piece: PieceType, reason: IllegalPieceMoveReason, message: string): IllegalPieceMoveError {
  return { kind: "IllegalPieceMove", piece, reason, message };
}

function pawnDir(color: Color): number {
  // White moves toward row 0 (rank 8).
  return color === "white" ? -1 : 1;
}

function pawnStartRow(color: Color): number {
  return color === "white" ? 6 : 1;
}

function isDiagonal(dr: number, dc: number): boolean {
  return Math.abs(dr) === Math.abs(dc) && dr !== 0;
}

function isStraight(dr: number, dc: number): boolean {
  return (dr === 0) !== (dc === 0);
}

/**
 * Every cell strictly between `from` and `to` along a single straight or diagonal line
 * must be empty. Callers only pass lines that the piece pattern already accepted.
 */
export function requireClearPath(board: Board, piece: PieceType, from: BoardIndex, to: BoardIndex): MoveError | null {
  const stepR = Math.sign(to.row - from.row);
  const stepC = Math.sign(to.col - from.col);

  let row = from.row + stepR;
  let col = from.col + stepC;
  while (row !== to.row || col !== to.col) {
    if (pieceAt(board, { row, col })) return illegal(piece, "blocked_path", "Path is blocked.");
    row += stepR;
    col += stepC;
  }
  return null;
}

function validatePawnMove(ctx: PieceMoveContext, dr: number, dc: number): MoveError | null {
  const { board, piece, from, to, capture } = ctx;
  const dir = pawnDir(piece.color);

  if (ctx.promotionRequested && !isPromotionRow(to.row)) {
    return { kind: "PromotionNotAllowed", message: "Promotion is only allowed when pawn reaches last rank." };
  }

  if (capture) {
    if (dr !== dir || Math.abs(dc) !== 1) return illegal("pawn", "illegal_pawn_capture", "Illegal pawn capture.");
    return null;
  }

  if (dc !== 0) {
    return illegal("pawn", "illegal_pawn_move", "Illegal pawn move (pawns move straight unless capturing).");
  }

  if (dr === dir) {
    if (pieceAt(board, to)) return illegal("pawn", "pawn_blocked", "Pawn move blocked.");
    return null;
  }

  if (from.row === pawnStartRow(piece.color) && dr === 2 * dir) {
    if (pieceAt(board, { row: from.row + dir, col: from.col })) return illegal("pawn", "pawn_blocked", "Pawn move blocked.");
    if (pieceAt(board, to)) return illegal("pawn", "pawn_blocked", "Pawn move blocked.");
    return null;
  }

  return illegal("pawn", "illegal_pawn_move", "Illegal pawn move.");
}

/** Per-piece movement rules (no check, castling or en passant). Returns null when legal. */
export function validatePieceMove(ctx: PieceMoveContext): MoveError | null {
  const { board, piece, from, to } = ctx;
  const dr = to.row - from.row;
  const dc = to.col - from.col;
  const adr = Math.abs(dr);
  const adc = Math.abs(dc);

  switch (piece.type) {
    case "pawn":
      return validatePawnMove(ctx, dr, dc);

    case "knight":
      if (!((adr === 1 && adc === 2) || (adr === 2 && adc === 1))) {
        return illegal("knight", "illegal_pattern", "Illegal knight move.");
      }
      return null;

    case "bishop":
      if (!isDiagonal(dr, dc)) return illegal("bishop", "illegal_pattern", "Illegal bishop move.");
      return requireClearPath(board, "bishop", from, to);

    case "rook":
      if (!isStraight(dr, dc)) return illegal("rook", "illegal_pattern", "Illegal rook move.");
      return requireClearPath(board, "rook", from, to);

    case "queen":
      if (!isDiagonal(dr, dc) && !isStraight(dr, dc)) return illegal("queen", "illegal_pattern", "Illegal queen move.");
      return requireClearPath(board, "queen", from, to);

    case "king":
      if (Math.max(adr, adc) !== 1) return illegal("king", "illegal_pattern", "Illegal king move.");
      return null;
  }
}
