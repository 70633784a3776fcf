export { Cells, logStartup } from './cells';
export { Simulation } from './simulation';
export { SimulationGrid } from './simulation-grid';
export { PaintEngine } from './paint-engine';
export { StepClock } from './step-clock';
export { rasterizeLine } from './line-raster';
export type { PlotFn } from './line-raster';
export type {
  CellsConfig,
  ResolvedConfig,
  CellsStats,
  FrameInput,
  FrameResult,
} from './types';
export {
  validateConfig,
  windowSize,
  SIM_WIDTH,
  SIM_HEIGHT,
  RENDER_SCALE,
  MAX_STEPS_PER_SECOND,
} from './types';
export type { HookPhase, HookFn } from './game-loop';
export { GameLoop } from './game-loop';
export { InputManager, wheelUnits, PRIMARY_BUTTON } from './input-manager';
export type { InputTarget } from './input-manager';
export { CanvasRenderer, createRenderer } from './renderer';
export type { Renderer, DrawContext } from './renderer';
