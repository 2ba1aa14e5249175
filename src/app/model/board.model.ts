import { InvalidInputError } from './errors';

export type CellState = 0 | 1;

// The board is a dense row-major grid; row r, column c is board[r][c].
export type Board = CellState[][];
export type ReadonlyBoard = ReadonlyArray<ReadonlyArray<CellState>>;

export type BoardInput = ReadonlyArray<ReadonlyArray<number | boolean>>;

export interface BoardDimensions {
  rows: number;
  cols: number;
}

export function validateDimensions(dimensions: BoardDimensions): BoardDimensions {
  const rows = Number(dimensions?.rows);
  const cols = Number(dimensions?.cols);
  if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
    throw new InvalidInputError('Board dimensions must be positive integers.', {
      rows: dimensions?.rows,
      cols: dimensions?.cols
    });
  }
  return { rows, cols };
}

export function createEmptyBoard(dimensions: BoardDimensions): Board {
  const { rows, cols } = validateDimensions(dimensions);
  return Array.from({ length: rows }, () => new Array<CellState>(cols).fill(0));
}

export function cloneBoard(board: ReadonlyBoard): Board {
  return board.map(row => row.slice());
}

export function boardDimensions(board: ReadonlyBoard): BoardDimensions {
  return { rows: board.length, cols: board.length ? board[0].length : 0 };
}

/**
 * Copies caller-supplied cells into a board of 0/1 values.
 * Booleans are accepted; any other value, a ragged row or a shape that
 * differs from `dimensions` is rejected.
 */
export function normalizeBoard(input: BoardInput, dimensions: BoardDimensions): Board {
  const { rows, cols } = validateDimensions(dimensions);
  if (!isList(input) || input.length !== rows) {
    throw new InvalidInputError(`Initial board must have ${rows} rows.`, {
      expected: { rows, cols },
      actualRows: isList(input) ? input.length : null
    });
  }

  return input.map((row, r) => {
    if (!isList(row) || row.length !== cols) {
      throw new InvalidInputError(`Initial board row ${r} must have ${cols} columns.`, {
        row: r,
        expected: cols,
        actual: isList(row) ? row.length : null
      });
    }
    return row.map((value, c) => toCellState(value, r, c));
  });
}

function isList(value: unknown): boolean {
  return Array.isArray(value);
}

function toCellState(value: unknown, row: number, col: number): CellState {
  if (value === 1 || value === true) return 1;
  if (value === 0 || value === false) return 0;
  throw new InvalidInputError(`Cell (${row},${col}) must be 0 or 1.`, { row, col, value });
}

export function countAlive(board: ReadonlyBoard) {
  let alive = 0;
  for (const row of board) {
    for (const cell of row) {
      alive += cell;
    }
  }
  return alive;
}

export function boardsEqual(a: ReadonlyBoard, b: ReadonlyBoard) {
  if (a.length !== b.length) return false;
  for (let r = 0; r < a.length; r++) {
    const rowA = a[r];
    const rowB = b[r];
    if (rowA.length !== rowB.length) return false;
    for (let c = 0; c < rowA.length; c++) {
      if (rowA[c] !== rowB[c]) return false;
    }
  }
  return true;
}

/**
 * Live-neighbour count for every cell with wrap-around edges.
 * Each of the eight offsets is taken modulo the board size, so on a board
 * with a single row or column a wrapped cell is counted once per offset.
 */
export function countNeighbors(board: ReadonlyBoard): number[][] {
  const { rows, cols } = boardDimensions(board);
  const counts: number[][] = [];
  for (let r = 0; r < rows; r++) {
    const up = board[(r - 1 + rows) % rows];
    const here = board[r];
    const down = board[(r + 1) % rows];
    const countRow = new Array<number>(cols);
    for (let c = 0; c < cols; c++) {
      const left = (c - 1 + cols) % cols;
      const right = (c + 1) % cols;
      countRow[c] =
        up[left] + up[c] + up[right] +
        here[left] + here[right] +
        down[left] + down[c] + down[right];
    }
    counts.push(countRow);
  }
  return counts;
}

// Conway's rule: survive on 2 or 3, birth on exactly 3.
export function nextGeneration(board: ReadonlyBoard, counts: ReadonlyArray<ReadonlyArray<number>>): Board {
  return board.map((row, r) =>
    row.map((cell, c): CellState => {
      const count = counts[r][c];
      return count === 3 || (count === 2 && cell === 1) ? 1 : 0;
    })
  );
}

export function advance(board: ReadonlyBoard): Board {
  return nextGeneration(board, countNeighbors(board));
}
