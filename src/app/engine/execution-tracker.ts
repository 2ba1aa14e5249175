import { cloneBoard, countAlive, validateDimensions } from '../model/board.model';
import type { Board, BoardDimensions, ReadonlyBoard } from '../model/board.model';
import { InvalidStateError } from '../model/errors';
import { drawSeed, validateSeed } from '../model/random';
import type { RandomSource } from '../model/random';
import { describeHost } from '../services/host-info';
import type { HostInfo } from '../services/host-info';
import { classifyLoop } from './cycle-detector';

export interface ExecutionRecord extends HostInfo {
  dimensions: BoardDimensions;
  steps: number;
  stepCount: number;
  seed: number;
  timestamp: string;
  executionTimeMs: number;
  aliveCellsStats: number[];
  maxAliveCells: number;
  minAliveCells: number;
  loopDetected: boolean;
  loopLength: number | null;
  finalized: boolean;
}

export interface ExecutionTrackerInit {
  dimensions: BoardDimensions;
  maxSteps: number;
  initialBoard: ReadonlyBoard;
  seed?: number;
  random?: RandomSource;
  host?: HostInfo;
  clock?: () => number;
  startedAt?: Date;
}

export interface ExecutionOutcome {
  stepCount: number;
  loopDetected?: boolean;
  loopLength?: number | null;
}

export interface ExecutionSummary {
  'Dimensions': string;
  'Steps Executed': string;
  'Execution Time': string;
  'Max Alive Cells': number;
  'Min Alive Cells': number;
  'Loop Detected': 'Yes' | 'No';
  'Loop Length': number | 'N/A';
  'Pattern': string;
  'Seed': number;
}

export class ExecutionTracker {
  readonly dimensions: BoardDimensions;
  readonly maxSteps: number;
  readonly seed: number;
  readonly startedAt: Date;

  private readonly initial: Board;
  private readonly host: HostInfo;
  private readonly clock: () => number;
  private readonly startedAtMs: number;
  private readonly totalCells: number;

  private stepCount = 0;
  private executionTimeMs = 0;
  private aliveCellsStats: number[] = [];
  private maxAliveCells = 0;
  private minAliveCells: number;
  private loopDetected = false;
  private loopLength: number | null = null;
  private finalized = false;

  constructor(init: ExecutionTrackerInit) {
    this.dimensions = validateDimensions(init.dimensions);
    this.maxSteps = init.maxSteps;
    this.seed = init.seed !== undefined ? validateSeed(init.seed) : drawSeed(init.random);
    this.initial = cloneBoard(init.initialBoard);
    this.host = init.host ?? describeHost();
    this.clock = init.clock ?? (() => performance.now());
    this.startedAt = init.startedAt ?? new Date();
    this.startedAtMs = this.clock();
    this.totalCells = this.dimensions.rows * this.dimensions.cols;
    // Any real step can only lower this.
    this.minAliveCells = this.totalCells;
  }

  get initialBoard(): Board {
    return cloneBoard(this.initial);
  }

  get isFinalized() {
    return this.finalized;
  }

  update(board: ReadonlyBoard) {
    if (this.finalized) {
      throw new InvalidStateError('Cannot record a step on a finalized execution.');
    }
    const alive = countAlive(board);
    this.stepCount++;
    this.aliveCellsStats.push((alive / this.totalCells) * 100);
    this.maxAliveCells = Math.max(this.maxAliveCells, alive);
    this.minAliveCells = Math.min(this.minAliveCells, alive);
  }

  finalize(outcome: ExecutionOutcome) {
    if (this.finalized) {
      throw new InvalidStateError('Execution has already been finalized.');
    }
    this.finalized = true;
    this.stepCount = outcome.stepCount;
    this.executionTimeMs = Math.max(0, this.clock() - this.startedAtMs);
    this.loopDetected = !!outcome.loopDetected;
    this.loopLength = this.loopDetected ? outcome.loopLength ?? null : null;
  }

  snapshot(): ExecutionRecord {
    return {
      dimensions: { ...this.dimensions },
      steps: this.maxSteps,
      stepCount: this.stepCount,
      seed: this.seed,
      timestamp: this.startedAt.toISOString(),
      executionTimeMs: this.finalized ? this.executionTimeMs : Math.max(0, this.clock() - this.startedAtMs),
      aliveCellsStats: this.aliveCellsStats.slice(),
      maxAliveCells: this.maxAliveCells,
      minAliveCells: this.minAliveCells,
      loopDetected: this.loopDetected,
      loopLength: this.loopLength,
      finalized: this.finalized,
      ...this.host
    };
  }
}

export function summarizeExecution(record: ExecutionRecord): ExecutionSummary {
  return {
    'Dimensions': `${record.dimensions.rows} x ${record.dimensions.cols}`,
    'Steps Executed': `${record.stepCount}/${record.steps}`,
    'Execution Time': `${(record.executionTimeMs / 1000).toFixed(2)} seconds`,
    'Max Alive Cells': record.maxAliveCells,
    'Min Alive Cells': record.minAliveCells,
    'Loop Detected': record.loopDetected ? 'Yes' : 'No',
    'Loop Length': record.loopDetected && record.loopLength !== null ? record.loopLength : 'N/A',
    'Pattern': record.loopDetected ? classifyLoop(record.loopLength) : 'Unclassified',
    'Seed': record.seed
  };
}
