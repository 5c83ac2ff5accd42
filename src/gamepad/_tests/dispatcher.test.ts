import { describe, it, expect, vi } from "vitest";
import fc from "fast-check";
import { ModeDispatcher } from "../dispatcher";
import { SurfaceSubscription } from "../subscription";
import type { Control } from "../../types";

function setup(gain = 5) {
  const sub = new SurfaceSubscription("s");
  const dispatcher = new ModeDispatcher(
    (control: Control) => (sub.hasHandler(control) ? { subscription: sub, mode: sub.modeOf(control) } : null),
    gain
  );
  return { sub, dispatcher };
}

describe("gamepad/ModeDispatcher", () => {
  it("stateChanged buttons deliver only on transitions", () => {
    const { sub, dispatcher } = setup();
    const h = vi.fn();
    sub.onButton("buttonA", h);
    dispatcher.press("buttonA", 1, true);
    dispatcher.press("buttonA", 1, true);
    dispatcher.press("buttonA", 0, false);
    dispatcher.press("buttonA", 0, false);
    expect(h.mock.calls).toEqual([[true], [false]]);
  });

  it("an initial release is not delivered", () => {
    const { sub, dispatcher } = setup();
    const h = vi.fn();
    sub.onButton("buttonB", h);
    dispatcher.press("buttonB", 0, false);
    expect(h).not.toHaveBeenCalled();
  });

  it("debounce is idempotent for any repeated pressed sequence", () => {
    fc.assert(
      fc.property(fc.array(fc.boolean(), { maxLength: 40 }), (seq) => {
        const { sub, dispatcher } = setup();
        const calls: boolean[] = [];
        sub.onButton("buttonY", (p) => calls.push(p));
        for (const p of seq) {
          dispatcher.press("buttonY", p ? 1 : 0, p);
          dispatcher.press("buttonY", p ? 1 : 0, p);
        }
        // Transitions attendues depuis l'état relâché
        const expected: boolean[] = [];
        let last = false;
        for (const p of seq) {
          if (p !== last) expected.push(p);
          last = p;
        }
        expect(calls).toEqual(expected);
      })
    );
  });

  it("analog triggers deliver (pressed, pressure) on pressed transitions only", () => {
    const { sub, dispatcher } = setup();
    const h = vi.fn();
    sub.onTrigger("rightTrigger", h);
    dispatcher.press("rightTrigger", 0.3, true);
    dispatcher.press("rightTrigger", 0.7, true);
    dispatcher.press("rightTrigger", 0, false);
    expect(h.mock.calls).toEqual([
      [true, 0.3],
      [false, 0],
    ]);
  });

  it("dpad stateChanged debounces the whole pad", () => {
    const { sub, dispatcher } = setup();
    const h = vi.fn();
    sub.onDirection("dpad", h);
    dispatcher.axis("dpad", 0, 1);
    dispatcher.axis("dpad", 1, 0);
    dispatcher.axis("dpad", 0, 0);
    expect(h.mock.calls).toEqual([
      [0, 1],
      [0, 0],
    ]);
  });

  it("analog thumbsticks deliver every sample", () => {
    const { sub, dispatcher } = setup();
    const h = vi.fn();
    sub.onDirection("leftThumbstick", h);
    dispatcher.axis("leftThumbstick", 0.1, 0);
    dispatcher.axis("leftThumbstick", 0.1, 0);
    expect(h).toHaveBeenCalledTimes(2);
  });

  it("vendor controls are delivered immediately without debounce", () => {
    const { sub, dispatcher } = setup();
    const paddle = vi.fn();
    const touch = vi.fn();
    sub.onButton("paddleButton1", paddle).onDirection("touchpadPrimary", touch);
    dispatcher.press("paddleButton1", 1, true);
    dispatcher.press("paddleButton1", 1, true);
    dispatcher.axis("touchpadPrimary", 0.2, 0.3);
    expect(paddle).toHaveBeenCalledTimes(2);
    expect(touch).toHaveBeenCalledWith(0.2, 0.3);
  });

  it("continuous modes stage values that tick delivers", () => {
    const { sub, dispatcher } = setup();
    const btn = vi.fn();
    const pad = vi.fn();
    sub.onButton("buttonA", btn).onDirection("dpad", pad);
    sub.setMode("buttonA", "continuous");
    sub.setMode("dpad", "continuous");
    dispatcher.press("buttonA", 1, true);
    dispatcher.axis("dpad", -1, 0);
    expect(btn).not.toHaveBeenCalled();
    expect(dispatcher.tick()).toBe(2);
    expect(btn).toHaveBeenCalledWith(true);
    expect(pad).toHaveBeenCalledWith(-5, 0);
    expect(dispatcher.activeCount).toBe(2);
  });

  it("directional thumbsticks stage scaled axes with the configured gain", () => {
    const { sub, dispatcher } = setup(2);
    const h = vi.fn();
    sub.onDirection("rightThumbstick", h);
    sub.setMode("rightThumbstick", "directional");
    dispatcher.axis("rightThumbstick", 0.5, 0.25);
    dispatcher.tick();
    expect(h).toHaveBeenCalledWith(1, 0.5);
    dispatcher.axis("rightThumbstick", 0, 0);
    expect(dispatcher.tick()).toBe(0);
  });

  it("drops signals with no handler and changes no state", () => {
    const { dispatcher } = setup();
    dispatcher.press("buttonA", 1, true);
    expect(dispatcher.debounceFor("buttonA")).toBe(false);
    expect(dispatcher.stagedFor("buttonA")).toBeUndefined();
  });

  it("tick skips staged slots whose mode is no longer polled", () => {
    const { sub, dispatcher } = setup();
    const h = vi.fn();
    sub.onTrigger("leftShoulder", h);
    sub.setMode("leftShoulder", "continuous");
    dispatcher.press("leftShoulder", 0.5, true);
    sub.setMode("leftShoulder", "analog");
    expect(dispatcher.tick()).toBe(0);
    expect(h).not.toHaveBeenCalled();
  });

  it("reset returns staged values and debounce flags to neutral", () => {
    const { sub, dispatcher } = setup();
    sub.onButton("buttonA", vi.fn()).onTrigger("leftTrigger", vi.fn());
    sub.setMode("leftTrigger", "continuous");
    dispatcher.press("buttonA", 1, true);
    dispatcher.press("leftTrigger", 0.9, true);
    dispatcher.reset();
    expect(dispatcher.debounceFor("buttonA")).toBe(false);
    expect(dispatcher.stagedFor("leftTrigger")).toBeUndefined();
  });
});
