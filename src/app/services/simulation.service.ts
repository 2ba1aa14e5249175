import { Injectable, OnDestroy } from '@angular/core';
import { BehaviorSubject } from 'rxjs';
import { SimulationEngine } from '../engine/simulation-engine';
import type { SimulationEngineOptions } from '../engine/simulation-engine';
import { summarizeExecution } from '../engine/execution-tracker';
import type { ExecutionRecord, ExecutionSummary } from '../engine/execution-tracker';
import { cloneBoard } from '../model/board.model';
import type { Board } from '../model/board.model';
import { presetBoard } from '../model/presets';
import { createRng, drawSeed } from '../model/random';
import { BoardImportService } from './board-import.service';
import { DitheringService, imageToBoard } from './dithering.service';
import type { DitheringResult, FilterOptions, ImageInput, ImageToBoardOptions } from './dithering.service';

export interface SimulationRequest extends Omit<SimulationEngineOptions, 'dimensions' | 'maxSteps'> {
  rows?: number;
  cols?: number;
  steps?: number;
}

export interface PresetRequest extends Omit<SimulationRequest, 'initialBoard'> {
  preset: string;
}

export interface ImageSeedRequest extends Omit<SimulationRequest, 'initialBoard' | 'rows' | 'cols'>, Partial<ImageToBoardOptions> {}

export interface SimulationOutcome {
  record: ExecutionRecord;
  board: Board;
  summary: ExecutionSummary;
}

export const DEFAULT_SIMULATION_REQUEST = {
  rows: 10,
  cols: 10,
  steps: 0
};

@Injectable({ providedIn: 'root' })
export class SimulationService implements OnDestroy {
  private lastRecordSubject = new BehaviorSubject<ExecutionRecord | null>(null);
  readonly lastRecord$ = this.lastRecordSubject.asObservable();

  constructor(
    private readonly dithering: DitheringService,
    private readonly importer: BoardImportService
  ) {}

  createEngine(request: SimulationRequest = {}): SimulationEngine {
    return this.guard('createEngine', () => this.buildEngine(request));
  }

  run(request: SimulationRequest = {}): SimulationOutcome {
    const engine = this.createEngine(request);
    return this.complete(engine);
  }

  runPreset(request: PresetRequest): SimulationOutcome {
    const engine = this.guard('runPreset', () => {
      const { preset, ...rest } = request;
      const seed = rest.seed ?? drawSeed(rest.random);
      const rows = rest.rows ?? DEFAULT_SIMULATION_REQUEST.rows;
      const cols = rest.cols ?? DEFAULT_SIMULATION_REQUEST.cols;
      const initialBoard = presetBoard(preset, { rows, cols }, createRng(seed));
      return this.buildEngine({ ...rest, seed, initialBoard });
    });
    return this.complete(engine);
  }

  /** Board size follows the processed image; one cell per pixel. */
  createEngineFromImage(result: DitheringResult, request: ImageSeedRequest = {}): SimulationEngine {
    return this.guard('createEngineFromImage', () => {
      const { aliveWhen, ...rest } = request;
      const initialBoard = imageToBoard(result.processed, { aliveWhen });
      return this.buildEngine({
        ...rest,
        rows: result.processed.height,
        cols: result.processed.width,
        initialBoard
      });
    });
  }

  /** Binarizes the image with Floyd–Steinberg before seeding the board. */
  async createEngineFromImageFile(
    input: ImageInput,
    filter: Partial<Omit<FilterOptions, 'ditheringAlgorithm'>> = {},
    request: ImageSeedRequest = {}
  ): Promise<SimulationEngine> {
    const result = await this.dithering.applyFilter(input, { ...filter, ditheringAlgorithm: 'floyd_steinberg' });
    return this.createEngineFromImage(result, request);
  }

  createEngineFromText(text: string, request: Omit<SimulationRequest, 'initialBoard'> = {}): SimulationEngine {
    return this.guard('createEngineFromText', () => {
      const rows = request.rows ?? DEFAULT_SIMULATION_REQUEST.rows;
      const cols = request.cols ?? DEFAULT_SIMULATION_REQUEST.cols;
      const shape = this.importer.parse(text);
      const initialBoard = this.importer.toBoard(shape, { rows, cols });
      return this.buildEngine({ ...request, rows, cols, initialBoard });
    });
  }

  ngOnDestroy(): void {
    this.lastRecordSubject.complete();
  }

  private buildEngine(request: SimulationRequest) {
    const { rows, cols, steps, ...engineOptions } = request;
    return new SimulationEngine({
      ...engineOptions,
      dimensions: {
        rows: rows ?? DEFAULT_SIMULATION_REQUEST.rows,
        cols: cols ?? DEFAULT_SIMULATION_REQUEST.cols
      },
      maxSteps: steps ?? DEFAULT_SIMULATION_REQUEST.steps
    });
  }

  private complete(engine: SimulationEngine): SimulationOutcome {
    const record = this.guard('run', () => engine.run());
    this.lastRecordSubject.next(record);
    return {
      record,
      board: cloneBoard(engine.board),
      summary: summarizeExecution(record)
    };
  }

  private guard<T>(operation: string, action: () => T): T {
    try {
      return action();
    } catch (error) {
      console.error(`[SimulationService] ${operation} failed`, error);
      throw error;
    }
  }
}
