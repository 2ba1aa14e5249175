import { createEmptyBoard, validateDimensions } from './board.model';
import type { Board, BoardDimensions, CellState } from './board.model';
import { InvalidInputError } from './errors';
import { randomBoard } from './random';
import type { RandomSource } from './random';

export type PresetName = 'block' | 'blinker' | 'glider' | 'random';

const PATTERNS: Record<Exclude<PresetName, 'random'>, CellState[][]> = {
  block: [
    [1, 1],
    [1, 1]
  ],
  blinker: [
    [0, 1, 0],
    [0, 1, 0],
    [0, 1, 0]
  ],
  glider: [
    [0, 1, 0],
    [0, 0, 1],
    [1, 1, 1]
  ]
};

export const PRESET_NAMES: readonly PresetName[] = ['block', 'blinker', 'glider', 'random'];

export function isPresetName(value: unknown): value is PresetName {
  return typeof value === 'string' && (PRESET_NAMES as readonly string[]).includes(value);
}

export function presetBoard(preset: string, dimensions: BoardDimensions, rng: RandomSource): Board {
  if (!isPresetName(preset)) {
    throw new InvalidInputError(`Preset '${preset}' is not defined.`, { preset, available: PRESET_NAMES });
  }
  if (preset === 'random') {
    return randomBoard(dimensions, rng);
  }
  return placePattern(PATTERNS[preset], dimensions);
}

/** Centres `pattern` on an empty board, rounding the offset down. */
export function placePattern(pattern: ReadonlyArray<ReadonlyArray<CellState>>, dimensions: BoardDimensions): Board {
  const { rows, cols } = validateDimensions(dimensions);
  const height = pattern.length;
  const width = height ? pattern[0].length : 0;
  if (height > rows || width > cols) {
    throw new InvalidInputError('Pattern does not fit on the board.', {
      pattern: { rows: height, cols: width },
      board: { rows, cols }
    });
  }

  const board = createEmptyBoard({ rows, cols });
  const startRow = Math.floor((rows - height) / 2);
  const startCol = Math.floor((cols - width) / 2);
  pattern.forEach((row, r) => {
    row.forEach((cell, c) => {
      board[startRow + r][startCol + c] = cell;
    });
  });
  return board;
}
