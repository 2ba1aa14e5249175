import { createHash } from 'node:crypto';
import { boardsEqual, cloneBoard } from '../model/board.model';
import type { Board, ReadonlyBoard } from '../model/board.model';

/**
 * How the detector turns a board into a history entry and compares entries.
 * `capture` must return a value that later mutation of the board cannot change.
 */
export interface StateComparator<K> {
  readonly id: string;
  capture(board: ReadonlyBoard): K;
  equals(a: K, b: K): boolean;
}

export type CycleStrategy = 'exact' | 'hash';

export interface CycleDetectorOptions {
  historyLimit: number;
  strategy: CycleStrategy;
}

export interface CycleCheck {
  detected: boolean;
  loopLength: number | null;
}

export const DEFAULT_CYCLE_DETECTOR_OPTIONS: CycleDetectorOptions = {
  historyLimit: 100,
  strategy: 'exact'
};

const MAX_HISTORY_LIMIT = 10_000;

export const exactComparator: StateComparator<Board> = {
  id: 'exact',
  capture: board => cloneBoard(board),
  equals: (a, b) => boardsEqual(a, b)
};

// SHA-1 of the packed cells. Distinct boards can collide; use exact for correctness.
export const hashComparator: StateComparator<string> = {
  id: 'hash',
  capture: board => fingerprintBoard(board),
  equals: (a, b) => a === b
};

export function fingerprintBoard(board: ReadonlyBoard) {
  const hash = createHash('sha1');
  hash.update(`${board.length}x${board.length ? board[0].length : 0}:`);
  for (const row of board) {
    hash.update(Uint8Array.from(row));
  }
  return hash.digest('hex');
}

export function normalizeCycleDetectorOptions(options?: Partial<CycleDetectorOptions>): CycleDetectorOptions {
  const input = options || {};
  return {
    historyLimit: clampInt(input.historyLimit, 1, MAX_HISTORY_LIMIT, DEFAULT_CYCLE_DETECTOR_OPTIONS.historyLimit),
    strategy: input.strategy === 'hash' ? 'hash' : 'exact'
  };
}

export class CycleDetector<K = unknown> {
  private history: K[] = [];
  readonly limit: number;

  constructor(
    private readonly comparator: StateComparator<K>,
    historyLimit: number = DEFAULT_CYCLE_DETECTOR_OPTIONS.historyLimit
  ) {
    this.limit = clampInt(historyLimit, 1, MAX_HISTORY_LIMIT, DEFAULT_CYCLE_DETECTOR_OPTIONS.historyLimit);
  }

  get size() {
    return this.history.length;
  }

  get strategy() {
    return this.comparator.id;
  }

  /**
   * Looks the board up in the window. On a hit the loop length is the number
   * of entries from the match to the end of the window and nothing is stored;
   * on a miss the board is appended and the oldest entry dropped past the limit.
   */
  observe(board: ReadonlyBoard): CycleCheck {
    const state = this.comparator.capture(board);
    const matchIndex = this.history.findIndex(entry => this.comparator.equals(entry, state));
    if (matchIndex >= 0) {
      return { detected: true, loopLength: this.history.length - matchIndex };
    }

    this.history.push(state);
    if (this.history.length > this.limit) {
      this.history.shift();
    }
    return { detected: false, loopLength: null };
  }

  reset() {
    this.history = [];
  }
}

export function createCycleDetector(options?: Partial<CycleDetectorOptions>): CycleDetector<Board> | CycleDetector<string> {
  const normalized = normalizeCycleDetectorOptions(options);
  return normalized.strategy === 'hash'
    ? new CycleDetector(hashComparator, normalized.historyLimit)
    : new CycleDetector(exactComparator, normalized.historyLimit);
}

export function classifyLoop(loopLength: number | null) {
  if (loopLength === 1) return 'Still Life';
  if (loopLength !== null && loopLength > 1) return `Oscillator (Period ${loopLength})`;
  return 'Unclassified';
}

function clampInt(value: unknown, min: number, max: number, fallback: number) {
  const num = Math.floor(Number(value));
  if (!Number.isFinite(num)) return fallback;
  return Math.max(min, Math.min(max, num));
}
