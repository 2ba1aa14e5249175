import { Subject } from 'rxjs';
import type { Observable } from 'rxjs';
import { advance, countAlive, normalizeBoard, validateDimensions } from '../model/board.model';
import type { Board, BoardDimensions, BoardInput, ReadonlyBoard } from '../model/board.model';
import { InvalidInputError, InvalidStateError } from '../model/errors';
import { createRng, drawSeed, randomBoard, validateSeed } from '../model/random';
import type { RandomSource } from '../model/random';
import type { HostInfo } from '../services/host-info';
import { createCycleDetector } from './cycle-detector';
import type { CycleCheck, CycleDetectorOptions } from './cycle-detector';
import { ExecutionTracker } from './execution-tracker';
import type { ExecutionRecord } from './execution-tracker';

export type EnginePhase = 'created' | 'running' | 'finalized';

export interface SimulationEngineOptions {
  dimensions: BoardDimensions;
  maxSteps: number;
  initialBoard?: BoardInput;
  seed?: number;
  /** Only used to draw a seed when none is given. */
  random?: RandomSource;
  /** `false` turns `run()` into a plain stepper that always uses the full budget. */
  cycleDetection?: Partial<CycleDetectorOptions> | false;
  verbose?: boolean;
  clock?: () => number;
  host?: HostInfo;
}

export type SimulationEvent =
  | { type: 'step'; step: number; aliveCells: number }
  | { type: 'loop-detected'; step: number; loopLength: number }
  | { type: 'finalized'; record: ExecutionRecord };

export class SimulationEngine {
  readonly dimensions: BoardDimensions;
  readonly maxSteps: number;
  readonly seed: number;

  private current: Board;
  private readonly tracker: ExecutionTracker;
  private readonly detector: ReturnType<typeof createCycleDetector> | null;
  private readonly verbose: boolean;
  private stepCount = 0;
  private enginePhase: EnginePhase = 'created';

  private eventsSubject = new Subject<SimulationEvent>();
  readonly events$: Observable<SimulationEvent> = this.eventsSubject.asObservable();

  constructor(options: SimulationEngineOptions) {
    this.dimensions = validateDimensions(options.dimensions);
    this.maxSteps = validateMaxSteps(options.maxSteps);
    this.seed = options.seed !== undefined ? validateSeed(options.seed) : drawSeed(options.random);
    this.current = options.initialBoard
      ? normalizeBoard(options.initialBoard, this.dimensions)
      : randomBoard(this.dimensions, createRng(this.seed));
    this.tracker = new ExecutionTracker({
      dimensions: this.dimensions,
      maxSteps: this.maxSteps,
      initialBoard: this.current,
      seed: this.seed,
      host: options.host,
      clock: options.clock
    });
    this.detector = options.cycleDetection === false ? null : createCycleDetector(options.cycleDetection);
    this.verbose = !!options.verbose;

    this.log('Initialized', {
      dimensions: this.dimensions,
      maxSteps: this.maxSteps,
      seed: this.seed,
      seedSource: options.seed !== undefined ? 'user-defined' : 'random',
      initialState: options.initialBoard ? 'user-defined' : 'default-random'
    });
  }

  get board(): ReadonlyBoard {
    return this.current;
  }

  get initialBoard(): Board {
    return this.tracker.initialBoard;
  }

  get phase(): EnginePhase {
    return this.enginePhase;
  }

  get stepsExecuted() {
    return this.stepCount;
  }

  /**
   * Advances one generation. Cycle checking is left to `run()` or the caller.
   * Throws once `maxSteps` generations have been executed.
   */
  step() {
    this.assertNotFinalized('step');
    if (this.stepCount >= this.maxSteps) {
      throw new InvalidStateError(`Cannot step: all ${this.maxSteps} steps have been executed.`);
    }
    this.enginePhase = 'running';
    this.current = advance(this.current);
    this.stepCount++;
    this.tracker.update(this.current);

    const aliveCells = countAlive(this.current);
    this.eventsSubject.next({ type: 'step', step: this.stepCount, aliveCells });
    this.log(`Step ${this.stepCount}`, { aliveCells });
  }

  /**
   * Steps until the budget is spent or, with cycle detection on, the board
   * repeats a state still in the history window. Finalizes exactly once.
   */
  run(): ExecutionRecord {
    this.assertNotFinalized('run');
    this.log('Simulation started', { maxSteps: this.maxSteps, cycleDetection: this.detector?.strategy ?? 'off' });

    let loop: CycleCheck = { detected: false, loopLength: null };
    while (this.stepCount < this.maxSteps) {
      this.step();
      if (!this.detector) continue;
      loop = this.detector.observe(this.current);
      if (loop.detected && loop.loopLength !== null) {
        this.eventsSubject.next({ type: 'loop-detected', step: this.stepCount, loopLength: loop.loopLength });
        this.log('Loop detected', { step: this.stepCount, loopLength: loop.loopLength });
        break;
      }
    }

    return this.finish(loop);
  }

  /** Closes the record for callers driving `step()` themselves. */
  finalize(): ExecutionRecord {
    this.assertNotFinalized('finalize');
    return this.finish({ detected: false, loopLength: null });
  }

  stats(): ExecutionRecord {
    return this.tracker.snapshot();
  }

  private finish(loop: CycleCheck) {
    this.tracker.finalize({
      stepCount: this.stepCount,
      loopDetected: loop.detected,
      loopLength: loop.loopLength
    });
    this.enginePhase = 'finalized';

    const record = this.tracker.snapshot();
    this.log('Simulation ended', {
      stepCount: record.stepCount,
      executionTimeMs: record.executionTimeMs,
      loopDetected: record.loopDetected
    });
    this.eventsSubject.next({ type: 'finalized', record });
    this.eventsSubject.complete();
    return record;
  }

  private assertNotFinalized(operation: string) {
    if (this.enginePhase === 'finalized') {
      throw new InvalidStateError(`Cannot ${operation}: the simulation has already been finalized.`);
    }
  }

  private log(event: string, detail: Record<string, unknown> = {}) {
    if (!this.verbose) return;
    console.info(`[Simulation] ${event}`, {
      ts: new Date().toISOString(),
      ...detail
    });
  }
}

function validateMaxSteps(maxSteps: number) {
  if (!Number.isSafeInteger(maxSteps) || maxSteps < 0) {
    throw new InvalidInputError('Max steps must be a non-negative integer.', { maxSteps });
  }
  return maxSteps;
}
