/**
 * Simulation rate and step timing.
 *
 * The rate is in steps per second, clamped to [0, max]; 0 pauses. The clock
 * is handed a monotonic timestamp each frame and allows at most one step per
 * frame: a late frame does not run extra steps to catch up.
 */
export class StepClock {
  readonly maxStepsPerSecond: number;

  private _stepsPerSecond: number;
  private lastStepTime: number;

  /**
   * @param startTime Timestamp (ms) the first interval is measured from.
   */
  constructor(maxStepsPerSecond: number, startTime: number, initialStepsPerSecond = 0) {
    this.maxStepsPerSecond = maxStepsPerSecond;
    this.lastStepTime = startTime;
    this._stepsPerSecond = 0;
    this.setRate(initialStepsPerSecond);
  }

  get stepsPerSecond(): number {
    return this._stepsPerSecond;
  }

  get paused(): boolean {
    return this._stepsPerSecond <= 0;
  }

  /** Set the rate, clamped to [0, max]. */
  setRate(stepsPerSecond: number): void {
    if (Number.isNaN(stepsPerSecond)) return;
    this._stepsPerSecond = Math.min(Math.max(stepsPerSecond, 0), this.maxStepsPerSecond);
  }

  /** Change the rate by `delta` steps per second, clamped. */
  adjustRate(delta: number): void {
    if (delta === 0) return;
    this.setRate(this._stepsPerSecond + delta);
  }

  /**
   * Whether a step is due at `now`. When it is, the step is recorded as taken
   * at `now`. While paused the last step time stays put.
   */
  tick(now: number): boolean {
    if (this.paused) return false;
    const msPerStep = 1000 / this._stepsPerSecond;
    if (now - this.lastStepTime >= msPerStep) {
      this.lastStepTime = now;
      return true;
    }
    return false;
  }
}
