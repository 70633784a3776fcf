/**
 * Draws the live-point list onto a 2D canvas: black field, one white
 * `renderScale`-sized square per live cell.
 */

/** The slice of CanvasRenderingContext2D the renderer draws with. */
export type DrawContext = Pick<CanvasRenderingContext2D, 'fillStyle' | 'fillRect'>;

export interface Renderer {
  /** Draw the field. `points` holds interleaved (x, y) cell coordinates. */
  render(points: Float32Array): void;
  destroy(): void;
}

export const BACKGROUND_COLOR = '#000000';
export const CELL_COLOR = '#ffffff';

export class CanvasRenderer implements Renderer {
  private readonly ctx: DrawContext;
  private readonly width: number;
  private readonly height: number;
  private readonly scale: number;

  /**
   * @param width Field width in cells.
   * @param height Field height in cells.
   * @param scale Canvas pixels per cell edge.
   */
  constructor(ctx: DrawContext, width: number, height: number, scale: number) {
    this.ctx = ctx;
    this.width = width;
    this.height = height;
    this.scale = scale;
  }

  render(points: Float32Array): void {
    const ctx = this.ctx;
    const s = this.scale;

    ctx.fillStyle = BACKGROUND_COLOR;
    ctx.fillRect(0, 0, this.width * s, this.height * s);

    ctx.fillStyle = CELL_COLOR;
    for (let i = 0; i + 1 < points.length; i += 2) {
      ctx.fillRect(points[i] * s, points[i + 1] * s, s, s);
    }
  }

  destroy(): void {
    // Nothing held beyond the context, which belongs to the canvas.
  }
}

/** Size the canvas for the field and build a renderer over its 2D context. */
export function createRenderer(
  canvas: HTMLCanvasElement,
  width: number,
  height: number,
  scale: number,
): Renderer {
  canvas.width = width * scale;
  canvas.height = height * scale;
  const ctx = canvas.getContext('2d');
  if (!ctx) {
    throw new Error('Cannot render: 2D canvas context unavailable');
  }
  return new CanvasRenderer(ctx, width, height, scale);
}
