import type {Clock} from '../clock';

export const T0 = Date.UTC(2024, 0, 1, 12, 0, 0);

/** Clock that only moves when told to. */
export class ManualClock implements Clock {
  private time: number;

  constructor(start = T0) {
    this.time = start;
  }

  now() {
    return this.time;
  }

  advance(ms: number) {
    this.time += ms;
  }
}
