import { validateDimensions } from './board.model';
import type { Board, BoardDimensions, CellState } from './board.model';
import { InvalidInputError } from './errors';

/** Uniform source in [0, 1). */
export type RandomSource = () => number;

export const MAX_SEED = 1_000_000;

// createRng keeps 32 bits of state; larger seeds would alias smaller ones.
export const SEED_LIMIT = 2 ** 32;

export function createRng(seedInput: number): RandomSource {
  let seed = seedInput >>> 0;
  return () => {
    seed += 0x6d2b79f5;
    let t = seed;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function drawSeed(random: RandomSource = Math.random) {
  return Math.min(MAX_SEED - 1, Math.max(0, Math.floor(random() * MAX_SEED)));
}

export function validateSeed(seed: number) {
  if (!Number.isSafeInteger(seed) || seed < 0 || seed >= SEED_LIMIT) {
    throw new InvalidInputError('Seed must be an integer from 0 to 4294967295.', { seed });
  }
  return seed;
}

export function randomBoard(dimensions: BoardDimensions, rng: RandomSource): Board {
  const { rows, cols } = validateDimensions(dimensions);
  const board: Board = [];
  for (let r = 0; r < rows; r++) {
    const row: CellState[] = [];
    for (let c = 0; c < cols; c++) {
      row.push(rng() < 0.5 ? 1 : 0);
    }
    board.push(row);
  }
  return board;
}
