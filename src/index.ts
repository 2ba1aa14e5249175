export * from './app/model/board.model';
export * from './app/model/errors';
export * from './app/model/presets';
export * from './app/model/random';
export * from './app/engine/cycle-detector';
export * from './app/engine/execution-tracker';
export * from './app/engine/simulation-engine';
export * from './app/services/board-import.service';
export * from './app/services/dithering.service';
export * from './app/services/host-info';
export * from './app/services/simulation.service';
