import type { InvalidSquareError } from "./moveTypes.ts";

/** Lowercase algebraic square such as "e2". */
export type Square = string;

export interface BoardIndex {
  row: number;
  col: number;
}

export const BOARD_SIZE = 8;

const FILES = "abcdefgh";

export type SquareParseResult = { ok: true; index: BoardIndex } | { ok: false; error: InvalidSquareError };

function invalidSquare(square: string, message: string): SquareParseResult {
  return { ok: false, error: { kind: "InvalidSquare", message, square } };
}

export function inBounds(row: number, col: number): boolean {
  return Number.isInteger(row) && Number.isInteger(col) && row >= 0 && row < BOARD_SIZE && col >= 0 && col < BOARD_SIZE;
}

/**
 * Parse an algebraic square ("e2", case-insensitive) into grid indices.
 * Row 0 is rank 8 (black's back rank); column 0 is file a.
 */
export function algebraicToIndex(square: string): SquareParseResult {
  if (square.length !== 2) return invalidSquare(square, "Square must be in algebraic form like 'e2'.");

  const file = square[0].toLowerCase();
  const rank = square[1];

  if (file < "a" || file > "h") return invalidSquare(square, "File must be between a and h.");
  if (rank < "1" || rank > "8") return invalidSquare(square, "Rank must be between 1 and 8.");

  return {
    ok: true,
    index: {
      row: BOARD_SIZE - Number(rank),
      col: file.charCodeAt(0) - "a".charCodeAt(0),
    },
  };
}

export function indexToAlgebraic({ row, col }: BoardIndex): Square {
  if (!inBounds(row, col)) throw new RangeError(`Index out of bounds: (${row}, ${col})`);
  return `${FILES[col]}${BOARD_SIZE - row}`;
}

/** Case-insensitive key used to compare raw square input before it is parsed. */
export function normalizeSquare(square: string): string {
  return square.toLowerCase();
}
