import { InvalidStateError } from '../model/errors';
import type { HostInfo } from '../services/host-info';
import { ExecutionTracker, summarizeExecution } from './execution-tracker';

const TEST_HOST: HostInfo = {
  processor: 'Test CPU',
  architecture: 'x64',
  system: 'Linux',
  processorName: 'x86_64'
};

function createTracker(ticks: number[] = [0, 0]) {
  const clock = () => ticks.shift() ?? 0;
  return new ExecutionTracker({
    dimensions: { rows: 2, cols: 2 },
    maxSteps: 5,
    initialBoard: [[1, 0], [0, 1]],
    seed: 321,
    host: TEST_HOST,
    clock,
    startedAt: new Date('2026-01-02T03:04:05.000Z')
  });
}

describe('ExecutionTracker', () => {
  it('starts with min at the total cell count and no steps', () => {
    const record = createTracker().snapshot();

    expect(record).toEqual({
      dimensions: { rows: 2, cols: 2 },
      steps: 5,
      stepCount: 0,
      seed: 321,
      timestamp: '2026-01-02T03:04:05.000Z',
      executionTimeMs: 0,
      aliveCellsStats: [],
      maxAliveCells: 0,
      minAliveCells: 4,
      loopDetected: false,
      loopLength: null,
      finalized: false,
      processor: 'Test CPU',
      architecture: 'x64',
      system: 'Linux',
      processorName: 'x86_64'
    });
  });

  it('records alive percentages and extrema per step', () => {
    const tracker = createTracker();
    tracker.update([[1, 0], [0, 0]]);
    tracker.update([[1, 1], [1, 0]]);

    const record = tracker.snapshot();
    expect(record.aliveCellsStats).toEqual([25, 75]);
    expect(record.maxAliveCells).toBe(3);
    expect(record.minAliveCells).toBe(1);
    expect(record.stepCount).toBe(2);
  });

  it('reports elapsed time before finalize', () => {
    const tracker = createTracker([100, 130]);
    tracker.update([[1, 0], [0, 0]]);

    expect(tracker.snapshot().executionTimeMs).toBe(30);
  });

  it('finalizes once with elapsed time and loop info', () => {
    const tracker = createTracker([100, 350]);
    tracker.update([[0, 0], [0, 0]]);
    tracker.finalize({ stepCount: 1, loopDetected: true, loopLength: 2 });

    const record = tracker.snapshot();
    expect(record.finalized).toBe(true);
    expect(record.executionTimeMs).toBe(250);
    expect(record.loopDetected).toBe(true);
    expect(record.loopLength).toBe(2);
    expect(() => tracker.finalize({ stepCount: 1 })).toThrowError(InvalidStateError);
    expect(() => tracker.update([[0, 0], [0, 0]])).toThrowError(InvalidStateError);
  });

  it('drops the loop length when no loop was detected', () => {
    const tracker = createTracker();
    tracker.finalize({ stepCount: 0, loopDetected: false, loopLength: 4 });

    expect(tracker.snapshot().loopLength).toBeNull();
  });

  it('keeps a private copy of the initial board', () => {
    const board: (0 | 1)[][] = [[1, 1], [0, 0]];
    const tracker = new ExecutionTracker({
      dimensions: { rows: 2, cols: 2 },
      maxSteps: 1,
      initialBoard: board,
      seed: 1,
      host: TEST_HOST
    });
    board[0][0] = 0;

    expect(tracker.initialBoard).toEqual([[1, 1], [0, 0]]);
  });

  it('draws a seed from the supplied source when none is given', () => {
    const tracker = new ExecutionTracker({
      dimensions: { rows: 1, cols: 1 },
      maxSteps: 0,
      initialBoard: [[0]],
      random: () => 0.25,
      host: TEST_HOST
    });

    expect(tracker.seed).toBe(250000);
  });

  it('returns independent snapshots', () => {
    const tracker = createTracker();
    tracker.update([[1, 0], [0, 0]]);
    const first = tracker.snapshot();
    first.aliveCellsStats.push(99);

    expect(tracker.snapshot().aliveCellsStats).toEqual([25]);
  });
});

describe('summarizeExecution', () => {
  it('formats a record for display', () => {
    const tracker = createTracker([0, 1234]);
    tracker.update([[1, 1], [1, 1]]);
    tracker.finalize({ stepCount: 1, loopDetected: true, loopLength: 1 });

    expect(summarizeExecution(tracker.snapshot())).toEqual({
      'Dimensions': '2 x 2',
      'Steps Executed': '1/5',
      'Execution Time': '1.23 seconds',
      'Max Alive Cells': 4,
      'Min Alive Cells': 4,
      'Loop Detected': 'Yes',
      'Loop Length': 1,
      'Pattern': 'Still Life',
      'Seed': 321
    });
  });
});
