/**
 * Source of "now" for the study service. The scheduling core never reads
 * the wall clock; the service asks its clock once per operation.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * A clock that stays at `start` until moved, for tests and replays.
 */
export class FixedClock implements Clock {
  private current: number;

  constructor(start: Date) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  set(date: Date): void {
    this.current = date.getTime();
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function fixedClock(start: Date): FixedClock {
  return new FixedClock(start);
}
