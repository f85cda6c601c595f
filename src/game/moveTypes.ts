import type { Color, Piece, PieceType } from "../types.ts";
import type { Square } from "./coords.ts";

export type PromotionCode = "q" | "r" | "b" | "n";

export interface MoveRecord {
  /** Full-move number: 1 for the first white move and the black reply, 2 for the next pair, ... */
  readonly moveNumber: number;
  readonly color: Color;
  readonly from: Square;
  readonly to: Square;
  readonly capture: boolean;
  readonly promotion: PromotionCode | null;
  /** The mover as it stood on the source square, before any promotion. */
  readonly piece: Piece;
}

export type IllegalPieceMoveReason =
  | "illegal_pattern"
  | "blocked_path"
  | "illegal_pawn_move"
  | "illegal_pawn_capture"
  | "pawn_blocked";

export interface GameNotInProgressError {
  kind: "GameNotInProgress";
  message: string;
}

export interface SameSquareError {
  kind: "SameSquare";
  message: string;
}

export interface InvalidSquareError {
  kind: "InvalidSquare";
  message: string;
  square: string;
}

export interface EmptySourceError {
  kind: "EmptySource";
  message: string;
  square: Square;
}

export interface WrongTurnError {
  kind: "WrongTurn";
  message: string;
  currentTurn: Color;
}

export interface FriendlyCaptureError {
  kind: "FriendlyCapture";
  message: string;
}

export interface IllegalPieceMoveError {
  kind: "IllegalPieceMove";
  message: string;
  piece: PieceType;
  reason: IllegalPieceMoveReason;
}

export interface InvalidPromotionError {
  kind: "InvalidPromotion";
  message: string;
}

export interface PromotionNotAllowedError {
  kind: "PromotionNotAllowed";
  message: string;
}

export type MoveError =
  | GameNotInProgressError
  | SameSquareError
  | InvalidSquareError
  | EmptySourceError
  | WrongTurnError
  | FriendlyCaptureError
  | IllegalPieceMoveError
  | InvalidPromotionError
  | PromotionNotAllowedError;

export type MoveErrorKind = MoveError["kind"];

export type MoveResult = { ok: true; record: MoveRecord } | { ok: false; error: MoveError };

export function moveFailed(error: MoveError): { ok: false; error: MoveError } {
  return { ok: false, error };
}
