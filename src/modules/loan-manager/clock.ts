import { Clock } from './types';

export class SystemClock implements Clock {
  now(): bigint {
    return BigInt(Math.floor(Date.now() / 1000));
  }
}

/**
 * Clock that only moves when told to
 */
export class ManualClock implements Clock {
  constructor(private current: bigint) {}

  now(): bigint {
    return this.current;
  }

  set(timestamp: bigint): void {
    this.current = timestamp;
  }

  advance(seconds: bigint): void {
    this.current += seconds;
  }
}
