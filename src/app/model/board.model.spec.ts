import {
  advance,
  boardsEqual,
  cloneBoard,
  countAlive,
  countNeighbors,
  createEmptyBoard,
  nextGeneration,
  normalizeBoard
} from './board.model';
import type { Board } from './board.model';
import { InvalidInputError } from './errors';
import { placePattern } from './presets';

function shift<T>(grid: T[][], dr: number, dc: number): T[][] {
  const rows = grid.length;
  const cols = grid[0].length;
  return grid.map((_, r) =>
    grid[r].map((__, c) => grid[(r - dr + rows) % rows][(c - dc + cols) % cols])
  );
}

describe('Board neighbor counting', () => {
  it('counts the eight surrounding cells of an interior cell', () => {
    const board: Board = [
      [1, 1, 1, 0, 0],
      [1, 0, 1, 0, 0],
      [1, 1, 1, 0, 0],
      [0, 0, 0, 0, 0],
      [0, 0, 0, 0, 0]
    ];

    const counts = countNeighbors(board);

    expect(counts[1][1]).toBe(8);
    expect(counts[0][0]).toBe(2);
    expect(counts[3][3]).toBe(1);
  });

  it('wraps corners onto the opposite edges', () => {
    const board = createEmptyBoard({ rows: 4, cols: 4 });
    board[0][0] = 1;

    const counts = countNeighbors(board);

    expect(counts[3][3]).toBe(1);
    expect(counts[3][0]).toBe(1);
    expect(counts[0][3]).toBe(1);
    expect(counts[1][1]).toBe(1);
    expect(counts[2][2]).toBe(0);
    expect(counts[0][0]).toBe(0);
  });

  it('is consistent under toroidal shifts', () => {
    const board: Board = [
      [0, 1, 0, 0, 1],
      [1, 1, 0, 0, 0],
      [0, 0, 0, 1, 0],
      [1, 0, 1, 0, 1]
    ];

    const shiftedCounts = countNeighbors(shift(board, 1, 2));

    expect(shiftedCounts).toEqual(shift(countNeighbors(board), 1, 2));
  });

  it('counts a lone cell on a 1x1 board as its own neighbour in every direction', () => {
    expect(countNeighbors([[1]])).toEqual([[8]]);
    expect(countNeighbors([[0]])).toEqual([[0]]);
  });
});

describe('Board transition rule', () => {
  it('applies survival and birth', () => {
    const board: Board = [[1, 0, 1]];
    const counts = [[2, 3, 4]];

    expect(nextGeneration(board, counts)).toEqual([[1, 1, 0]]);
  });

  it('keeps a block fixed', () => {
    const block = placePattern([[1, 1], [1, 1]], { rows: 4, cols: 4 });

    expect(advance(block)).toEqual(block);
  });

  it('flips a blinker with period two', () => {
    const vertical = placePattern([[0, 1, 0], [0, 1, 0], [0, 1, 0]], { rows: 5, cols: 5 });
    const horizontal = placePattern([[0, 0, 0], [1, 1, 1], [0, 0, 0]], { rows: 5, cols: 5 });

    expect(advance(vertical)).toEqual(horizontal);
    expect(advance(advance(vertical))).toEqual(vertical);
  });

  it('gives identical results when applied twice to the same board', () => {
    const board: Board = [
      [0, 1, 1, 0],
      [1, 0, 0, 1],
      [0, 1, 1, 1],
      [0, 0, 1, 0]
    ];
    const before = cloneBoard(board);

    expect(advance(board)).toEqual(advance(board));
    expect(board).toEqual(before);
  });
});

describe('Board helpers', () => {
  it('normalizes boolean input to 0/1', () => {
    expect(normalizeBoard([[true, false], [0, 1]], { rows: 2, cols: 2 })).toEqual([[1, 0], [0, 1]]);
  });

  it('rejects boards of the wrong shape', () => {
    expect(() => normalizeBoard([[1, 0]], { rows: 2, cols: 2 })).toThrowError(InvalidInputError);
    expect(() => normalizeBoard([[1, 0], [1]], { rows: 2, cols: 2 })).toThrowError('Initial board row 1 must have 2 columns.');
  });

  it('rejects values outside 0 and 1', () => {
    expect(() => normalizeBoard([[1, 2]], { rows: 1, cols: 2 })).toThrowError('Cell (0,1) must be 0 or 1.');
  });

  it('rejects non-positive dimensions', () => {
    expect(() => createEmptyBoard({ rows: 0, cols: 3 })).toThrowError(InvalidInputError);
    expect(() => createEmptyBoard({ rows: 2.5, cols: 3 })).toThrowError(InvalidInputError);
  });

  it('compares and counts cells', () => {
    const a: Board = [[1, 0], [1, 1]];
    const b = cloneBoard(a);

    expect(boardsEqual(a, b)).toBe(true);
    b[0][1] = 1;
    expect(boardsEqual(a, b)).toBe(false);
    expect(countAlive(a)).toBe(3);
  });
});
