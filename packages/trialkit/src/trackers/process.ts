import type { ResultValue } from '../types.js';
import { Tracker } from './tracker.js';

const MB = 1024 * 1024;

function toMb(bytes: number): number {
  return Math.round((bytes / MB) * 100) / 100;
}

/** Samples the memory footprint of the running process. */
export class ProcessTracker extends Tracker {
  constructor(objectName = 'process') {
    super(objectName, 'memory', ['heap_used_mb', 'rss_mb']);
  }

  protected getCurrentValues(): ResultValue[] {
    const usage = process.memoryUsage();
    return [toMb(usage.heapUsed), toMb(usage.rss)];
  }
}

/** Tracker whose values come from a plain function. */
export class FunctionTracker extends Tracker {
  private readonly sample: () => ResultValue[];

  constructor(
    objectName: string,
    measurementDescriptor: string,
    customHeader: readonly string[],
    sample: () => ResultValue[],
  ) {
    super(objectName, measurementDescriptor, customHeader);
    this.sample = sample;
  }

  protected getCurrentValues(): ResultValue[] {
    return this.sample();
  }
}
