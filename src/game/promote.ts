import type { Color, Piece, PieceType } from "../types.ts";
import type { PromotionCode } from "./moveTypes.ts";

export const DEFAULT_PROMOTION: PromotionCode = "q";

const PROMOTION_PIECES: Record<PromotionCode, PieceType> = {
  q: "queen",
  r: "rook",
  b: "bishop",
  n: "knight",
};

function isPromotionCode(code: string): code is PromotionCode {
  return code === "q" || code === "r" || code === "b" || code === "n";
}

/** Case-insensitive; returns null for anything outside q, r, b, n. */
export function parsePromotionCode(raw: string): PromotionCode | null {
  const code = raw.toLowerCase();
  return isPromotionCode(code) ? code : null;
}

/** Row 0 (rank 8) or row 7 (rank 1). */
export function isPromotionRow(row: number): boolean {
  return row === 0 || row === 7;
}

export function promotedPiece(color: Color, code: PromotionCode): Piece {
  return { type: PROMOTION_PIECES[code], color };
}
