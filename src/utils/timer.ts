export class StepTimer {
  private start: bigint = 0n;

  begin(): void {
    this.start = process.hrtime.bigint();
  }

  /** Whole milliseconds since the last `begin()`. */
  elapsedMs(): number {
    return Number((process.hrtime.bigint() - this.start) / 1_000_000n);
  }
}
