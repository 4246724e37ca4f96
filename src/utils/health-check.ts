/**
 * Last-success stamp a subsystem publishes for the deadlock watchdog.
 * The clock is injectable so tests can age it.
 */
export class Heartbeat {
  private last: number;

  constructor(private readonly clock: () => number = Date.now) {
    this.last = clock();
  }

  touch(): void {
    this.last = this.clock();
  }

  get lastSuccessTs(): number {
    return this.last;
  }

  ageMs(now = this.clock()): number {
    return now - this.last;
  }
}
