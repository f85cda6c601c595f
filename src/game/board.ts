import type { Piece } from "../types.ts";
import { BOARD_SIZE, inBounds, indexToAlgebraic, type BoardIndex, type Square } from "./coords.ts";

export type Cell = Piece | null;
export type Board = Cell[][];

export interface OccupiedSquare {
  position: Square;
  piece: Piece;
}

export function createEmptyBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () => new Array<Cell>(BOARD_SIZE).fill(null));
}

export function pieceAt(board: Board, { row, col }: BoardIndex): Piece | null {
  if (!inBounds(row, col)) return null;
  return board[row][col];
}

export function setPiece(board: Board, { row, col }: BoardIndex, piece: Cell): void {
  if (!inBounds(row, col)) throw new RangeError(`Index out of bounds: (${row}, ${col})`);
  board[row][col] = piece;
}

export function clearBoard(board: Board): void {
  for (const rank of board) rank.fill(null);
}

/**
 * Sparse listing of the occupied cells, row-major from a8 to h1.
 * Pieces are copied so callers cannot reach into the live board.
 */
export function listOccupiedSquares(board: Board): OccupiedSquare[] {
  const out: OccupiedSquare[] = [];
  for (let row = 0; row < BOARD_SIZE; row++) {
    for (let col = 0; col < BOARD_SIZE; col++) {
      const piece = board[row][col];
      if (!piece) continue;
      out.push({ position: indexToAlgebraic({ row, col }), piece: { type: piece.type, color: piece.color } });
    }
  }
  return out;
}

export function countPieces(board: Board): number {
  let n = 0;
  for (const rank of board) {
    for (const cell of rank) {
      if (cell) n++;
    }
  }
  return n;
}
