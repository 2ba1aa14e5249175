import { Injectable } from '@angular/core';
import { createEmptyBoard, validateDimensions } from '../model/board.model';
import type { Board, BoardDimensions } from '../model/board.model';
import { InvalidInputError } from '../model/errors';

export interface Cell {
  x: number;
  y: number;
}

export interface ParsedShape {
  name: string;
  description: string;
  cells: Cell[];
  width: number;
  height: number;
}

interface Bounds {
  minX: number;
  minY: number;
  width: number;
  height: number;
}

@Injectable({ providedIn: 'root' })
export class BoardImportService {
  parse(input: string, fallbackName = 'Imported Shape'): ParsedShape {
    const raw = String(input || '').trim();
    if (!raw) {
      throw new InvalidInputError('Shape text is empty.');
    }

    const parsedRle = this.tryParseRle(raw, fallbackName);
    if (parsedRle) return parsedRle;

    const parsedCoords = this.tryParseCoordinateList(raw, fallbackName);
    if (parsedCoords) return parsedCoords;

    throw new InvalidInputError('Unsupported shape format. Use RLE text or one x,y pair per line.');
  }

  /** Places the shape's bounding box in the middle of an empty board. */
  toBoard(shape: ParsedShape, dimensions: BoardDimensions): Board {
    const { rows, cols } = validateDimensions(dimensions);
    const bounds = computeBounds(shape.cells);
    const width = Math.max(shape.width, bounds.width);
    const height = Math.max(shape.height, bounds.height);
    if (width > cols || height > rows) {
      throw new InvalidInputError(`Shape '${shape.name}' does not fit on the board.`, {
        shape: { rows: height, cols: width },
        board: { rows, cols }
      });
    }

    const board = createEmptyBoard({ rows, cols });
    const offsetX = Math.floor((cols - width) / 2) - bounds.minX;
    const offsetY = Math.floor((rows - height) / 2) - bounds.minY;
    for (const cell of shape.cells) {
      board[cell.y + offsetY][cell.x + offsetX] = 1;
    }
    return board;
  }

  private tryParseRle(raw: string, fallbackName: string): ParsedShape | null {
    const lines = splitLines(raw);
    const comments = lines.filter((line) => line.startsWith('#'));
    const dataLines = lines.filter((line) => line && !line.startsWith('#'));

    const header = dataLines.find((line) => /^x\s*=/.test(line));
    if (!header) return null;

    const body = dataLines.filter((line) => line !== header).join('');
    if (!body.includes('!')) {
      throw new InvalidInputError('Invalid RLE: missing ! terminator.');
    }

    const headerMatch = header.match(/x\s*=\s*(\d+)\s*,\s*y\s*=\s*(\d+)/i);
    const width = headerMatch ? Number(headerMatch[1]) : 0;
    const height = headerMatch ? Number(headerMatch[2]) : 0;

    let x = 0;
    let y = 0;
    let run = '';
    const cells: Cell[] = [];
    for (const ch of body) {
      if (/\d/.test(ch)) {
        run += ch;
        continue;
      }
      if (ch === '!') break;
      if (ch !== 'o' && ch !== 'b' && ch !== '$') continue;

      const count = run ? Number(run) : 1;
      run = '';
      if (ch === 'o') {
        for (let i = 0; i < count; i++) {
          cells.push({ x: x + i, y });
        }
        x += count;
      } else if (ch === 'b') {
        x += count;
      } else {
        y += count;
        x = 0;
      }
    }

    const nameLine = comments.find((line) => /^#N\s+/i.test(line));
    const description = comments
      .filter((line) => /^#C\s+/i.test(line))
      .map((line) => line.replace(/^#C\s+/i, '').trim())
      .filter(Boolean)
      .join(' ');
    const name = nameLine ? nameLine.replace(/^#N\s+/i, '').trim() : '';
    const unique = dedupeCells(cells);
    const bounds = computeBounds(unique);

    return {
      name: name || fallbackName,
      description,
      cells: unique,
      width: width || bounds.width,
      height: height || bounds.height
    };
  }

  private tryParseCoordinateList(raw: string, fallbackName: string): ParsedShape | null {
    const cells: Cell[] = [];
    for (const line of splitLines(raw)) {
      if (!line || line.startsWith('#')) continue;
      const match = line.match(/^(-?\d+)\s*[, ]\s*(-?\d+)$/);
      if (!match) return null;
      cells.push({ x: Number(match[1]), y: Number(match[2]) });
    }
    if (!cells.length) return null;

    const unique = dedupeCells(cells);
    const bounds = computeBounds(unique);
    return {
      name: fallbackName,
      description: '',
      cells: unique,
      width: bounds.width,
      height: bounds.height
    };
  }
}

function splitLines(raw: string) {
  return raw
    .replace(/\r\n/g, '\n')
    .split('\n')
    .map((line) => line.trim());
}

function dedupeCells(cells: Cell[]) {
  const seen = new Set<string>();
  const out: Cell[] = [];
  for (const cell of cells) {
    const key = `${cell.x},${cell.y}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(cell);
  }
  return out;
}

function computeBounds(cells: Cell[]): Bounds {
  if (!cells.length) return { minX: 0, minY: 0, width: 0, height: 0 };
  let minX = Infinity;
  let maxX = -Infinity;
  let minY = Infinity;
  let maxY = -Infinity;
  for (const cell of cells) {
    minX = Math.min(minX, cell.x);
    maxX = Math.max(maxX, cell.x);
    minY = Math.min(minY, cell.y);
    maxY = Math.max(maxY, cell.y);
  }
  return {
    minX,
    minY,
    width: maxX - minX + 1,
    height: maxY - minY + 1
  };
}
