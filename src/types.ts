export type Color = "white" | "black";
export type PieceType = "pawn" | "rook" | "knight" | "bishop" | "queen" | "king";
export type GameStatus = "in_progress";

export interface Piece {
  readonly type: PieceType;
  readonly color: Color;
}

export function opponentOf(color: Color): Color {
  return color === "white" ? "black" : "white";
}
