/** Default simulation width in cells. */
export const SIM_WIDTH = 480;
/** Default simulation height in cells. */
export const SIM_HEIGHT = 270;
/** Default number of canvas pixels per cell edge. */
export const RENDER_SCALE = 4;
/** Default upper bound of the simulation rate, in steps per second. */
export const MAX_STEPS_PER_SECOND = 20;

/** Configuration for Cells.create(). */
export interface CellsConfig {
  canvas?: HTMLCanvasElement;
  width?: number;
  height?: number;
  renderScale?: number;
  maxStepsPerSecond?: number;
  /** Rate the simulation starts at. Default 0 (paused). */
  initialStepsPerSecond?: number;
}

/** Resolved config with all defaults applied. */
export interface ResolvedConfig {
  canvas?: HTMLCanvasElement;
  width: number;
  height: number;
  renderScale: number;
  maxStepsPerSecond: number;
  initialStepsPerSecond: number;
}

/** Pointer and wheel state sampled once per frame. */
export interface FrameInput {
  pointerDown: boolean;
  /** Window-space pointer position in pixels. */
  pointerX: number;
  pointerY: number;
  /** Wheel units since the previous frame; positive speeds the simulation up. */
  scrollDelta: number;
}

/** Outcome of one Simulation.frame() call. */
export interface FrameResult {
  stepped: boolean;
  /** The live-point list changed and the host should draw it. */
  redraw: boolean;
}

/** Live statistics. */
export interface CellsStats {
  fps: number;
  generation: number;
  liveCount: number;
  stepsPerSecond: number;
}

function isPositiveInt(v: number): boolean {
  return Number.isInteger(v) && v > 0;
}

export function validateConfig(config: CellsConfig = {}): ResolvedConfig {
  const width = config.width ?? SIM_WIDTH;
  const height = config.height ?? SIM_HEIGHT;
  const renderScale = config.renderScale ?? RENDER_SCALE;
  if (!isPositiveInt(width)) {
    throw new Error(`width must be a positive integer, got ${width}`);
  }
  if (!isPositiveInt(height)) {
    throw new Error(`height must be a positive integer, got ${height}`);
  }
  if (!isPositiveInt(renderScale)) {
    throw new Error(`renderScale must be a positive integer, got ${renderScale}`);
  }
  const maxStepsPerSecond = config.maxStepsPerSecond ?? MAX_STEPS_PER_SECOND;
  if (!(maxStepsPerSecond > 0)) {
    throw new Error('maxStepsPerSecond must be > 0');
  }
  const initialStepsPerSecond = config.initialStepsPerSecond ?? 0;
  if (!(initialStepsPerSecond >= 0 && initialStepsPerSecond <= maxStepsPerSecond)) {
    throw new Error(`initialStepsPerSecond must be within [0, ${maxStepsPerSecond}]`);
  }
  return {
    canvas: config.canvas,
    width,
    height,
    renderScale,
    maxStepsPerSecond,
    initialStepsPerSecond,
  };
}

/** Canvas size in pixels for a resolved config. */
export function windowSize(config: ResolvedConfig): { width: number; height: number } {
  return {
    width: config.width * config.renderScale,
    height: config.height * config.renderScale,
  };
}
