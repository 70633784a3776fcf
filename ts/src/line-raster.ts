// line-raster.ts — integer Bresenham rasterization over cell coordinates

/** Called once per cell on the line. */
export type PlotFn = (x: number, y: number) => void;

/**
 * Visit every cell on the discrete segment (x0, y0) → (x1, y1), both endpoints
 * included. The path is 8-connected.
 *
 * The shallow branch steps x and the steep branch steps y, each with its
 * endpoints ordered so the stepped axis increases. Visit order therefore
 * follows the stepped axis, not the direction of the input segment.
 */
export function rasterizeLine(x0: number, y0: number, x1: number, y1: number, plot: PlotFn): void {
  const dx = Math.abs(x1 - x0);
  const dy = Math.abs(y1 - y0);

  if (dy <= dx) {
    if (x0 <= x1) rasterizeShallow(x0, y0, x1, y1, dx, dy, plot);
    else rasterizeShallow(x1, y1, x0, y0, dx, dy, plot);
  } else {
    if (y0 <= y1) rasterizeSteep(x0, y0, x1, y1, dx, dy, plot);
    else rasterizeSteep(x1, y1, x0, y0, dx, dy, plot);
  }
}

// Slope in [-1, 1]; requires x0 <= x1.
function rasterizeShallow(
  x0: number, y0: number, x1: number, y1: number,
  dx: number, dy: number, plot: PlotFn,
): void {
  const step = y1 < y0 ? -1 : 1;
  let error = 2 * dy - dx;
  let y = y0;
  for (let x = x0; x <= x1; x++) {
    plot(x, y);
    if (error > 0) {
      y += step;
      error -= 2 * dx;
    }
    error += 2 * dy;
  }
}

// Slope outside [-1, 1]; requires y0 <= y1.
function rasterizeSteep(
  x0: number, y0: number, x1: number, y1: number,
  dx: number, dy: number, plot: PlotFn,
): void {
  const step = x1 < x0 ? -1 : 1;
  let error = 2 * dx - dy;
  let x = x0;
  for (let y = y0; y <= y1; y++) {
    plot(x, y);
    if (error > 0) {
      x += step;
      error -= 2 * dy;
    }
    error += 2 * dx;
  }
}
