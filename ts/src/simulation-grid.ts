/**
 * SimulationGrid — toroidal Game of Life state, double-buffered.
 *
 * Both generations live in one Uint8Array of 2 * W * H cells (row-major,
 * index = y * W + x). `active` selects the authoritative half; a step writes
 * every cell of the other half and then flips `active`. Nothing is copied.
 *
 * The live-point list is a Float32Array of (x, y) pairs sized for a full grid,
 * so it never reallocates. Painting appends to it; a step rebuilds it.
 */
export class SimulationGrid {
  readonly width: number;
  readonly height: number;

  private readonly cells: Uint8Array;
  private readonly cellCount: number;
  /** 0 or 1: which half of `cells` is the current generation. */
  private active = 0;

  private readonly points: Float32Array;
  private pointCount = 0;
  private _generation = 0;
  // The host draws the empty field on its first frame.
  private _needsRedraw = true;

  constructor(width: number, height: number) {
    this.width = width;
    this.height = height;
    this.cellCount = width * height;
    this.cells = new Uint8Array(this.cellCount * 2);
    this.points = new Float32Array(this.cellCount * 2);
  }

  /** Number of completed steps. */
  get generation(): number {
    return this._generation;
  }

  /** Number of live cells (equals the live-point count). */
  get liveCount(): number {
    return this.pointCount;
  }

  /**
   * Live cell coordinates as interleaved (x, y) pairs.
   *
   * **Aliasing warning:** this is a view into the grid's own buffer. It is
   * invalidated by the next paint or step; `slice()` it to keep a copy.
   */
  get livePoints(): Float32Array {
    return this.points.subarray(0, this.pointCount * 2);
  }

  /** Whether the live-point list changed since the last consumeRedraw(). */
  get needsRedraw(): boolean {
    return this._needsRedraw;
  }

  /** Return the redraw flag and clear it. */
  consumeRedraw(): boolean {
    const redraw = this._needsRedraw;
    this._needsRedraw = false;
    return redraw;
  }

  inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y)
      && x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  /** Whether the cell is alive in the current generation. Out of bounds is dead. */
  isAlive(x: number, y: number): boolean {
    if (!this.inBounds(x, y)) return false;
    return this.cells[this.active * this.cellCount + y * this.width + x] === 1;
  }

  /**
   * Bring a cell to life. Returns whether (x, y) was inside the grid; an
   * already-live cell is left as is and still reports true.
   */
  tryActivate(x: number, y: number): boolean {
    if (!this.inBounds(x, y)) return false;
    const i = this.active * this.cellCount + y * this.width + x;
    if (this.cells[i] === 0) {
      this.cells[i] = 1;
      this.addPoint(x, y);
    }
    return true;
  }

  /** Advance one generation (B3/S23) with wraparound on both axes. */
  step(): void {
    const w = this.width;
    const h = this.height;
    const cells = this.cells;
    const src = this.active * this.cellCount;
    const dst = (this.active ^ 1) * this.cellCount;

    this.pointCount = 0;

    for (let x = 0; x < w; x++) {
      const left = x === 0 ? w - 1 : x - 1;
      const right = x === w - 1 ? 0 : x + 1;
      const columns = [left, x, right];

      for (let y = 0; y < h; y++) {
        const up = y === 0 ? h - 1 : y - 1;
        const down = y === h - 1 ? 0 : y + 1;
        const rowUp = up * w;
        const row = y * w;
        const rowDown = down * w;

        let neighbors = 0;
        for (let c = 0; c < 3 && neighbors <= 3; c++) {
          const nx = columns[c];
          neighbors += cells[src + rowUp + nx] + cells[src + rowDown + nx];
          if (c !== 1) neighbors += cells[src + row + nx];
        }

        const alive = cells[src + row + x] === 1;
        const next = neighbors === 3 || (alive && neighbors === 2);
        cells[dst + row + x] = next ? 1 : 0;
        if (next) this.addPoint(x, y);
      }
    }

    this.active ^= 1;
    this._generation++;
    this._needsRedraw = true;
  }

  private addPoint(x: number, y: number): void {
    const o = this.pointCount * 2;
    this.points[o] = x;
    this.points[o + 1] = y;
    this.pointCount++;
    this._needsRedraw = true;
  }
}
