import type { SimulationGrid } from './simulation-grid';
import { rasterizeLine } from './line-raster';

/**
 * Turns a pointer drag, sampled once per frame, into cell activations.
 *
 * The pointer can travel many cells between two frames, so consecutive
 * samples of one stroke are joined with a rasterized line. Painting only
 * ever activates cells.
 */
export class PaintEngine {
  private readonly grid: SimulationGrid;
  private readonly renderScale: number;

  private lastCellX = 0;
  private lastCellY = 0;
  private _painting = false;

  constructor(grid: SimulationGrid, renderScale: number) {
    this.grid = grid;
    this.renderScale = renderScale;
  }

  /** Whether the pointer was painting on the last processed frame. */
  get painting(): boolean {
    return this._painting;
  }

  /** Process one frame of pointer state. Position is in window pixels. */
  processFrame(pointerDown: boolean, pointerX: number, pointerY: number): void {
    if (!pointerDown) {
      this._painting = false;
      return;
    }

    const cellX = Math.trunc(pointerX / this.renderScale);
    const cellY = Math.trunc(pointerY / this.renderScale);

    if (this._painting) {
      this.paintLine(this.lastCellX, this.lastCellY, cellX, cellY);
    } else {
      this.grid.tryActivate(cellX, cellY);
    }

    this.lastCellX = cellX;
    this.lastCellY = cellY;
    this._painting = true;
  }

  /**
   * Activate every cell on the line between two cells. Cells off the grid are
   * skipped without cutting the line short. Returns how many visited cells
   * were on the grid.
   */
  paintLine(x0: number, y0: number, x1: number, y1: number): number {
    let inside = 0;
    rasterizeLine(x0, y0, x1, y1, (x, y) => {
      if (this.grid.tryActivate(x, y)) inside++;
    });
    return inside;
  }
}
