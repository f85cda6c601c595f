import type { Color, GameStatus } from "../types.ts";
import type { MoveRecord, MoveResult } from "./moveTypes.ts";
import { listOccupiedSquares, type OccupiedSquare } from "./board.ts";
import { applyMove } from "./applyMove.ts";
import { createInitialGameState, resetGameState, type GameState } from "./state.ts";

export interface GameStateView {
  board: OccupiedSquare[];
  currentTurn: Color;
  gameStatus: GameStatus;
}

/**
 * Owner of a single game. The server creates one instance and shares it across requests;
 * tests construct their own.
 *
 * Every method is synchronous, so a move is validated and applied without any other
 * caller observing a partial update.
 */
export class ChessGame {
  private readonly state: GameState;

  constructor(state: GameState = createInitialGameState()) {
    this.state = state;
  }

  getState(): GameStateView {
    return {
      board: listOccupiedSquares(this.state.board),
      currentTurn: this.state.currentTurn,
      gameStatus: this.state.gameStatus,
    };
  }

  applyMove(from: string, to: string, promotion?: string): MoveResult {
    return applyMove(this.state, { from, to, promotion });
  }

  getHistory(): MoveRecord[] {
    return this.state.history.getHistory();
  }

  restart(): void {
    resetGameState(this.state);
  }
}
