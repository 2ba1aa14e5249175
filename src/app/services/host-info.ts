import os from 'node:os';

/** Descriptive fields only; nothing in a run depends on them. */
export interface HostInfo {
  processor: string;
  architecture: string;
  system: string;
  processorName: string;
}

export function describeHost(): HostInfo {
  const cpus = os.cpus();
  return {
    processor: cpus.length ? cpus[0].model.trim() || 'Unknown Processor' : 'Unknown Processor',
    architecture: os.arch(),
    system: os.type(),
    processorName: os.machine()
  };
}
