import type { Color, PieceType } from "../types.ts";
import { BOARD_SIZE } from "./coords.ts";
import { clearBoard, createEmptyBoard, setPiece, type Board } from "./board.ts";

export const BACK_RANK: readonly PieceType[] = ["rook", "knight", "bishop", "queen", "king", "bishop", "knight", "rook"];

function backRankRow(color: Color): number {
  return color === "white" ? 7 : 0;
}

function pawnRow(color: Color): number {
  return color === "white" ? 6 : 1;
}

/** Reset the board in place to the standard 32-piece layout. */
export function populateInitialPosition(board: Board): void {
  clearBoard(board);

  for (const color of ["black", "white"] as const) {
    BACK_RANK.forEach((type, col) => {
      setPiece(board, { row: backRankRow(color), col }, { type, color });
    });
    for (let col = 0; col < BOARD_SIZE; col++) {
      setPiece(board, { row: pawnRow(color), col }, { type: "pawn", color });
    }
  }
}

export function createInitialBoard(): Board {
  const board = createEmptyBoard();
  populateInitialPosition(board);
  return board;
}
