import type { Renderer } from './renderer';
import { createRenderer } from './renderer';
import type { CellsConfig, CellsStats, ResolvedConfig } from './types';
import { validateConfig, windowSize } from './types';
import { GameLoop } from './game-loop';
import type { HookFn, HookPhase } from './game-loop';
import { InputManager } from './input-manager';
import { Simulation } from './simulation';

/** Print the startup report to the console. */
export function logStartup(config: ResolvedConfig): void {
  const win = windowSize(config);
  console.group('Cells — Startup');
  console.log('Grid:', `${config.width}x${config.height}`);
  console.log('Window:', `${win.width}x${win.height}`);
  console.log('Render scale:', config.renderScale);
  console.log('Max steps/s:', config.maxStepsPerSecond);
  console.log('Initial steps/s:', config.initialStepsPerSecond);
  console.groupEnd();
}

/**
 * Top-level facade. Owns the simulation, renderer, input manager and game
 * loop, and runs the per-frame cycle: sample input, advance the simulation,
 * draw when the live list changed, reset input accumulators.
 *
 * Construct via `Cells.create(config)` in the browser, or
 * `Cells.fromParts(config, renderer, input, startTime)` for testing.
 */
export class Cells {
  private readonly renderer: Renderer;
  private readonly input: InputManager;
  private readonly loop: GameLoop;
  private readonly _simulation: Simulation;

  private destroyed = false;

  private constructor(
    config: ResolvedConfig,
    renderer: Renderer,
    input: InputManager,
    startTime: number,
  ) {
    this.renderer = renderer;
    this.input = input;
    this._simulation = new Simulation(config, startTime);
    this.loop = new GameLoop((now) => this.tick(now));
  }

  /** Build a Cells instance from pre-constructed dependencies. */
  static fromParts(
    config: ResolvedConfig,
    renderer: Renderer,
    input: InputManager,
    startTime: number,
  ): Cells {
    return new Cells(config, renderer, input, startTime);
  }

  /**
   * Validate config, size the canvas, attach input to it and return a
   * ready-to-start instance.
   */
  static create(userConfig: CellsConfig): Cells {
    const config = validateConfig(userConfig);
    const canvas = config.canvas;
    if (!canvas) {
      throw new Error('canvas is required');
    }
    const renderer = createRenderer(canvas, config.width, config.height, config.renderScale);
    const input = new InputManager();
    input.attach(canvas);
    logStartup(config);
    return new Cells(config, renderer, input, performance.now());
  }

  get simulation(): Simulation {
    return this._simulation;
  }

  get running(): boolean {
    return this.loop.running;
  }

  /** Live statistics snapshot. */
  get stats(): CellsStats {
    return {
      fps: this.loop.fps,
      generation: this._simulation.grid.generation,
      liveCount: this._simulation.grid.liveCount,
      stepsPerSecond: this._simulation.clock.stepsPerSecond,
    };
  }

  start(): void {
    this.checkDestroyed();
    this.loop.start();
  }

  stop(): void {
    this.loop.stop();
  }

  /** Register a per-frame hook. */
  addHook(phase: HookPhase, fn: HookFn): void {
    this.checkDestroyed();
    this.loop.addHook(phase, fn);
  }

  removeHook(phase: HookPhase, fn: HookFn): void {
    this.loop.removeHook(phase, fn);
  }

  /**
   * Run one frame at timestamp `now` (ms). The game loop calls this; hosts
   * with their own frame loop may call it directly instead of `start()`.
   */
  tick(now: number): void {
    this.checkDestroyed();
    const result = this._simulation.frame(this.input.sample(), now);
    if (result.redraw) {
      this.renderer.render(this._simulation.livePoints);
    }
    this.input.resetFrame();
  }

  /** Stop the loop and release input and renderer. Idempotent. */
  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.loop.stop();
    this.input.destroy();
    this.renderer.destroy();
  }

  private checkDestroyed(): void {
    if (this.destroyed) throw new Error('Cells instance has been destroyed');
  }
}
