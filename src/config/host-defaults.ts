import os from 'os';
import v8 from 'v8';

/**
 * Defaults that depend on the machine, computed once at startup and handed to
 * the section specifications as providers.
 */
export interface HostDefaults {
  readonly threads: () => number;
  readonly concurrentWrites: () => number;
  readonly maxCommandSize: () => number;
}

export function halfTheCores(cpuCount: number = os.cpus().length): number {
  return Math.max(1, Math.floor(cpuCount / 2));
}

/**
 * 1/205 of the heap limit: the largest share of the heap a single command
 * has been seen to use without running out of memory.
 */
export function defaultMaxCommandSize(heapLimit: number = v8.getHeapStatistics().heap_size_limit): number {
  return Math.floor(heapLimit / 205);
}

export function fixedHostDefaults(cpuCount: number, heapLimit: number): HostDefaults {
  const half = halfTheCores(cpuCount);
  const maxCommandSize = defaultMaxCommandSize(heapLimit);
  return {
    threads: () => half,
    concurrentWrites: () => Math.min(half, 4),
    maxCommandSize: () => maxCommandSize,
  };
}

export function detectHostDefaults(): HostDefaults {
  return fixedHostDefaults(os.cpus().length, v8.getHeapStatistics().heap_size_limit);
}
