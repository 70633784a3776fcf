import { describe, it, expect, vi } from 'vitest';
import { InputManager, wheelUnits, PRIMARY_BUTTON } from './input-manager';

function fakeTarget() {
  return { addEventListener: vi.fn(), removeEventListener: vi.fn(), setPointerCapture: vi.fn() };
}

describe('InputManager', () => {
  describe('pointer', () => {
    it('starts up at (0, 0)', () => {
      const im = new InputManager();
      expect(im.pointerDown).toBe(false);
      expect(im.pointerX).toBe(0);
      expect(im.pointerY).toBe(0);
    });

    it('tracks the primary button', () => {
      const im = new InputManager();
      im.handlePointerDown(PRIMARY_BUTTON, 50, 60);
      expect(im.pointerDown).toBe(true);
      expect(im.pointerX).toBe(50);
      expect(im.pointerY).toBe(60);
      im.handlePointerUp(PRIMARY_BUTTON);
      expect(im.pointerDown).toBe(false);
    });

    it('ignores other buttons', () => {
      const im = new InputManager();
      im.handlePointerDown(2, 50, 60);
      expect(im.pointerDown).toBe(false);
      expect(im.pointerX).toBe(0);
      im.handlePointerDown(PRIMARY_BUTTON, 10, 10);
      im.handlePointerUp(1);
      expect(im.pointerDown).toBe(true);
    });

    it('ends the stroke on pointer cancel', () => {
      const im = new InputManager();
      im.handlePointerDown(PRIMARY_BUTTON, 10, 10);
      im.handlePointerCancel();
      expect(im.pointerDown).toBe(false);
      im.handlePointerMove(90, 90);
      expect(im.pointerX).toBe(10);
    });

    it('tracks movement only while the button is down', () => {
      const im = new InputManager();
      im.handlePointerMove(100, 200);
      expect(im.pointerX).toBe(0);
      im.handlePointerDown(PRIMARY_BUTTON, 10, 20);
      im.handlePointerMove(100, 200);
      expect(im.pointerX).toBe(100);
      expect(im.pointerY).toBe(200);
    });
  });

  describe('scroll', () => {
    it('accumulates wheel units until resetFrame', () => {
      const im = new InputManager();
      im.handleScroll(1);
      im.handleScroll(1);
      im.handleScroll(-1);
      expect(im.scrollDelta).toBe(1);
      im.resetFrame();
      expect(im.scrollDelta).toBe(0);
    });

    it('maps wheel deltas to one unit per event', () => {
      expect(wheelUnits(-120)).toBe(1);
      expect(wheelUnits(-3)).toBe(1);
      expect(wheelUnits(100)).toBe(-1);
      expect(wheelUnits(0)).toBe(0);
    });
  });

  describe('sample', () => {
    it('returns a snapshot of the frame input', () => {
      const im = new InputManager();
      im.handlePointerDown(PRIMARY_BUTTON, 12, 34);
      im.handleScroll(-1);
      const input = im.sample();
      expect(input).toEqual({ pointerDown: true, pointerX: 12, pointerY: 34, scrollDelta: -1 });
      im.handlePointerMove(50, 50);
      expect(input.pointerX).toBe(12);
    });
  });

  describe('DOM attachment', () => {
    function handlerFor(target: ReturnType<typeof fakeTarget>, type: string) {
      return target.addEventListener.mock.calls.find((c) => c[0] === type)?.[1];
    }

    it('registers pointer and wheel listeners', () => {
      const im = new InputManager();
      const target = fakeTarget();
      im.attach(target);
      const events = target.addEventListener.mock.calls.map((c) => c[0]);
      expect(events).toEqual(['pointermove', 'pointerdown', 'pointerup', 'pointercancel', 'wheel']);
    });

    it('routes DOM events into state', () => {
      const im = new InputManager();
      const target = fakeTarget();
      im.attach(target);

      handlerFor(target, 'pointerdown')({ button: 0, pointerId: 1, offsetX: 16, offsetY: 24 });
      handlerFor(target, 'pointermove')({ button: 0, offsetX: 20, offsetY: 28 });
      expect(im.sample()).toEqual({ pointerDown: true, pointerX: 20, pointerY: 28, scrollDelta: 0 });

      const preventDefault = vi.fn();
      handlerFor(target, 'wheel')({ deltaY: -100, preventDefault });
      expect(preventDefault).toHaveBeenCalled();
      expect(im.scrollDelta).toBe(1);

      handlerFor(target, 'pointerup')({ button: 0, offsetX: 20, offsetY: 28 });
      expect(im.pointerDown).toBe(false);
    });

    it('captures the pointer on a primary press so an off-target release still arrives', () => {
      const im = new InputManager();
      const target = fakeTarget();
      im.attach(target);
      handlerFor(target, 'pointerdown')({ button: 2, pointerId: 3, offsetX: 0, offsetY: 0 });
      expect(target.setPointerCapture).not.toHaveBeenCalled();
      handlerFor(target, 'pointerdown')({ button: 0, pointerId: 7, offsetX: 4, offsetY: 4 });
      expect(target.setPointerCapture).toHaveBeenCalledWith(7);
    });

    it('ends the stroke when the browser cancels the pointer', () => {
      const im = new InputManager();
      const target = fakeTarget();
      im.attach(target);
      handlerFor(target, 'pointerdown')({ button: 0, pointerId: 1, offsetX: 4, offsetY: 4 });
      handlerFor(target, 'pointercancel')({ pointerId: 1 });
      expect(im.pointerDown).toBe(false);
    });

    it('works with targets that lack pointer capture', () => {
      const im = new InputManager();
      const target = { addEventListener: vi.fn(), removeEventListener: vi.fn() };
      im.attach(target);
      const down = target.addEventListener.mock.calls.find((c) => c[0] === 'pointerdown')?.[1];
      down({ button: 0, pointerId: 1, offsetX: 8, offsetY: 8 });
      expect(im.pointerDown).toBe(true);
    });

    it('detach removes the same listeners', () => {
      const im = new InputManager();
      const target = fakeTarget();
      im.attach(target);
      im.detach();
      const added = target.addEventListener.mock.calls.map((c) => c[1]);
      const removed = target.removeEventListener.mock.calls.map((c) => c[1]);
      expect(removed).toEqual(added);
    });

    it('attaching a second target detaches the first', () => {
      const im = new InputManager();
      const first = fakeTarget();
      const second = fakeTarget();
      im.attach(first);
      im.attach(second);
      expect(first.removeEventListener).toHaveBeenCalledTimes(5);
      expect(second.addEventListener).toHaveBeenCalledTimes(5);
    });

    it('destroy detaches and resets state', () => {
      const im = new InputManager();
      const target = fakeTarget();
      im.attach(target);
      im.handlePointerDown(PRIMARY_BUTTON, 5, 5);
      im.handleScroll(2);
      im.destroy();
      expect(target.removeEventListener).toHaveBeenCalledTimes(5);
      expect(im.sample()).toEqual({ pointerDown: false, pointerX: 0, pointerY: 0, scrollDelta: 0 });
    });
  });
});
