// ts/src/game-loop.ts

export type HookPhase = 'preTick' | 'postTick' | 'frameEnd';
export type HookFn = (now: number) => void;
/** Receives the frame timestamp (ms, monotonic) from requestAnimationFrame. */
export type TickFn = (now: number) => void;

export class GameLoop {
  private readonly tickFn: TickFn;
  private readonly hooks: Record<HookPhase, HookFn[]> = {
    preTick: [],
    postTick: [],
    frameEnd: [],
  };

  private _running = false;
  private rafId = 0;
  private lastTime = -1;
  private _fps = 0;
  private frameCount = 0;
  private fpsAccum = 0;

  constructor(tickFn: TickFn) {
    this.tickFn = tickFn;
  }

  get running(): boolean {
    return this._running;
  }

  /** Frames per second, measured over the last full second. */
  get fps(): number {
    return this._fps;
  }

  start(): void {
    if (this._running) return;
    this._running = true;
    this.lastTime = -1;
    this.frameCount = 0;
    this.fpsAccum = 0;
    this._fps = 0;
    this.rafId = requestAnimationFrame((t) => this.frame(t));
  }

  stop(): void {
    if (!this._running) return;
    this._running = false;
    cancelAnimationFrame(this.rafId);
  }

  addHook(phase: HookPhase, fn: HookFn): void {
    this.hooks[phase].push(fn);
  }

  removeHook(phase: HookPhase, fn: HookFn): void {
    const arr = this.hooks[phase];
    const idx = arr.indexOf(fn);
    if (idx !== -1) arr.splice(idx, 1);
  }

  private frame(now: number): void {
    if (!this._running) return;

    if (this.lastTime >= 0) {
      this.frameCount++;
      this.fpsAccum += now - this.lastTime;
      if (this.fpsAccum >= 1000) {
        this._fps = Math.round((this.frameCount * 1000) / this.fpsAccum);
        this.frameCount = 0;
        this.fpsAccum = 0;
      }
    }
    this.lastTime = now;

    for (const fn of this.hooks.preTick) fn(now);
    this.tickFn(now);
    for (const fn of this.hooks.postTick) fn(now);
    for (const fn of this.hooks.frameEnd) fn(now);

    this.rafId = requestAnimationFrame((t) => this.frame(t));
  }
}
