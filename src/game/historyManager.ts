import type { MoveRecord } from "./moveTypes.ts";

/**
 * Chronological, append-only move log.
 * Entries are never edited once pushed; only `clear()` (on restart) removes them.
 */
export class HistoryManager {
  private records: MoveRecord[] = [];

  /**
   * Record a move that has just been applied.
   */
  push(record: MoveRecord): void {
    this.records.push(this.cloneRecord(record));
  }

  /**
   * Get all recorded moves, oldest first.
   */
  getHistory(): MoveRecord[] {
    return this.records.map((r) => this.cloneRecord(r));
  }

  /**
   * Get the most recent move, or null when nothing has been played.
   */
  getLast(): MoveRecord | null {
    const last = this.records[this.records.length - 1];
    return last ? this.cloneRecord(last) : null;
  }

  /**
   * Number of half-moves played so far.
   */
  size(): number {
    return this.records.length;
  }

  /**
   * Full-move number the next recorded move will carry.
   */
  nextMoveNumber(): number {
    return Math.floor(this.records.length / 2) + 1;
  }

  clear(): void {
    this.records = [];
  }

  private cloneRecord(record: MoveRecord): MoveRecord {
    return { ...record, piece: { ...record.piece } };
  }
}
