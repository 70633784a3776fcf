/**
 * Manages pointer and wheel input with a polling API.
 *
 * Lives on the main thread; wraps DOM events into a per-frame `FrameInput`.
 * Only the primary button paints.
 */

import type { FrameInput } from './types';

/**
 * Target the manager listens on; normally the simulation canvas. When the
 * target supports pointer capture, a press captures the pointer so the
 * release is seen even if it happens off the target.
 */
export type InputTarget = Pick<HTMLElement, 'addEventListener' | 'removeEventListener'>
  & Partial<Pick<HTMLElement, 'setPointerCapture'>>;

/** DOM button index of the primary (left) button. */
export const PRIMARY_BUTTON = 0;

/**
 * Convert a DOM wheel delta to rate units: one unit per event, positive when
 * scrolling up.
 */
export function wheelUnits(deltaY: number): number {
  if (deltaY < 0) return 1;
  if (deltaY > 0) return -1;
  return 0;
}

export class InputManager {
  private _pointerDown = false;
  private _pointerX = 0;
  private _pointerY = 0;
  private _scrollDelta = 0;

  // DOM attachment state
  private attachedTarget: InputTarget | null = null;
  private readonly boundHandlers = {
    pointermove: (e: PointerEvent) => this.handlePointerMove(e.offsetX, e.offsetY),
    pointerdown: (e: PointerEvent) => this.onDomPointerDown(e),
    pointerup: (e: PointerEvent) => this.handlePointerUp(e.button),
    pointercancel: () => this.handlePointerCancel(),
    wheel: (e: WheelEvent) => {
      e.preventDefault();
      this.handleScroll(wheelUnits(e.deltaY));
    },
  };

  // ── Pointer ───────────────────────────────────────────────────────

  /** Whether the primary button is held down. */
  get pointerDown(): boolean {
    return this._pointerDown;
  }

  /** Pointer X in window pixels, as of the last press or drag. */
  get pointerX(): number {
    return this._pointerX;
  }

  /** Pointer Y in window pixels, as of the last press or drag. */
  get pointerY(): number {
    return this._pointerY;
  }

  /** Record pointer movement. The position is only tracked while painting. */
  handlePointerMove(x: number, y: number): void {
    if (!this._pointerDown) return;
    this._pointerX = x;
    this._pointerY = y;
  }

  /** Record a button press. Other buttons than the primary are ignored. */
  handlePointerDown(button: number, x: number, y: number): void {
    if (button !== PRIMARY_BUTTON) return;
    this._pointerDown = true;
    this._pointerX = x;
    this._pointerY = y;
  }

  /** Record a button release. */
  handlePointerUp(button: number): void {
    if (button !== PRIMARY_BUTTON) return;
    this._pointerDown = false;
  }

  /** The browser took the pointer away (touch cancel, lost focus): end the stroke. */
  handlePointerCancel(): void {
    this._pointerDown = false;
  }

  // ── Scroll ────────────────────────────────────────────────────────

  /** Wheel units accumulated since the last resetFrame(). */
  get scrollDelta(): number {
    return this._scrollDelta;
  }

  /** Record wheel movement in rate units. */
  handleScroll(units: number): void {
    this._scrollDelta += units;
  }

  // ── Frame lifecycle ───────────────────────────────────────────────

  /** Snapshot of the input for this frame. */
  sample(): FrameInput {
    return {
      pointerDown: this._pointerDown,
      pointerX: this._pointerX,
      pointerY: this._pointerY,
      scrollDelta: this._scrollDelta,
    };
  }

  /** Reset per-frame accumulators. Call once per frame, after sample(). */
  resetFrame(): void {
    this._scrollDelta = 0;
  }

  // ── DOM attachment ────────────────────────────────────────────────

  /**
   * Attach DOM listeners to the target. Only one target may be attached at a
   * time; attaching again detaches the previous one.
   */
  attach(target: InputTarget): void {
    if (this.attachedTarget) {
      this.detach();
    }
    this.attachedTarget = target;
    target.addEventListener('pointermove', this.boundHandlers.pointermove);
    target.addEventListener('pointerdown', this.boundHandlers.pointerdown);
    target.addEventListener('pointerup', this.boundHandlers.pointerup);
    target.addEventListener('pointercancel', this.boundHandlers.pointercancel);
    target.addEventListener('wheel', this.boundHandlers.wheel, { passive: false });
  }

  /** Remove all DOM listeners from the attached target. */
  detach(): void {
    const target = this.attachedTarget;
    if (!target) return;
    target.removeEventListener('pointermove', this.boundHandlers.pointermove);
    target.removeEventListener('pointerdown', this.boundHandlers.pointerdown);
    target.removeEventListener('pointerup', this.boundHandlers.pointerup);
    target.removeEventListener('pointercancel', this.boundHandlers.pointercancel);
    target.removeEventListener('wheel', this.boundHandlers.wheel);
    this.attachedTarget = null;
  }

  /** Detach from DOM and clear all state. */
  destroy(): void {
    this.detach();
    this._pointerDown = false;
    this._pointerX = 0;
    this._pointerY = 0;
    this._scrollDelta = 0;
  }

  // ── Internal: DOM event handlers ──────────────────────────────────

  private onDomPointerDown(e: PointerEvent): void {
    this.handlePointerDown(e.button, e.offsetX, e.offsetY);
    if (e.button === PRIMARY_BUTTON) {
      // Keep receiving pointerup/pointermove while the button is held off the target.
      this.attachedTarget?.setPointerCapture?.(e.pointerId);
    }
  }
}
