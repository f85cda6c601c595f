import type { Color, GameStatus, Piece } from "../types.ts";
import { algebraicToIndex, type Square } from "./coords.ts";
import { createEmptyBoard, setPiece, type Board } from "./board.ts";
import { createInitialBoard, populateInitialPosition } from "./initialPosition.ts";
import { HistoryManager } from "./historyManager.ts";

export interface GameState {
  board: Board;
  currentTurn: Color;
  gameStatus: GameStatus;
  history: HistoryManager;
}

export function createInitialGameState(): GameState {
  return {
    board: createInitialBoard(),
    currentTurn: "white",
    gameStatus: "in_progress",
    history: new HistoryManager(),
  };
}

/** Re-initialize in place: standard layout, white to move, empty log. */
export function resetGameState(state: GameState): void {
  populateInitialPosition(state.board);
  state.currentTurn = "white";
  state.gameStatus = "in_progress";
  state.history.clear();
}

/**
 * Build a state from an explicit placement, e.g. for composed positions.
 * Throws on a malformed square.
 */
export function createGameStateFromPlacement(
  placement: Record<Square, Piece>,
  currentTurn: Color = "white"
): GameState {
  const board: Board = createEmptyBoard();
  for (const [square, piece] of Object.entries(placement)) {
    const parsed = algebraicToIndex(square);
    if (!parsed.ok) throw new Error(`createGameStateFromPlacement: ${parsed.error.message} (${square})`);
    setPiece(board, parsed.index, { type: piece.type, color: piece.color });
  }
  return { board, currentTurn, gameStatus: "in_progress", history: new HistoryManager() };
}
