import { SimulationGrid } from './simulation-grid';
import { PaintEngine } from './paint-engine';
import { StepClock } from './step-clock';
import type { FrameInput, FrameResult, ResolvedConfig } from './types';

/**
 * Simulation context: the grid, the paint engine and the step clock for one
 * field, driven by an external frame loop through `frame()`.
 *
 * Everything here is synchronous and single-threaded. A host that reads
 * `livePoints` from another thread must take a copy between frames.
 */
export class Simulation {
  readonly grid: SimulationGrid;
  readonly paint: PaintEngine;
  readonly clock: StepClock;

  constructor(
    config: Pick<ResolvedConfig, 'width' | 'height' | 'renderScale' | 'maxStepsPerSecond' | 'initialStepsPerSecond'>,
    startTime: number,
  ) {
    this.grid = new SimulationGrid(config.width, config.height);
    this.paint = new PaintEngine(this.grid, config.renderScale);
    this.clock = new StepClock(config.maxStepsPerSecond, startTime, config.initialStepsPerSecond);
  }

  /**
   * Run one frame: apply the wheel to the rate, paint, then step if one is
   * due. Returns whether a step ran and whether the live list needs drawing
   * (the redraw flag is consumed).
   */
  frame(input: FrameInput, now: number): FrameResult {
    this.clock.adjustRate(input.scrollDelta);
    this.paint.processFrame(input.pointerDown, input.pointerX, input.pointerY);

    const stepped = this.clock.tick(now);
    if (stepped) this.grid.step();

    return { stepped, redraw: this.grid.consumeRedraw() };
  }

  get livePoints(): Float32Array {
    return this.grid.livePoints;
  }
}
