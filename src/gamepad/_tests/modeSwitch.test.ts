import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { SubscriptionRegistry } from "../registry";
import { SimulatedAdapter, SimulatedDevice } from "../../device/simulated";

describe("gamepad/mode switching under the polling loop", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("continuous trigger repeats every tick, analog delivers only transitions", () => {
    const adapter = new SimulatedAdapter();
    const registry = new SubscriptionRegistry(adapter, { pollIntervalMs: 100 });
    const device = adapter.attach(new SimulatedDevice("extended"));
    const onTrigger = vi.fn();
    registry.register("game").onTrigger("leftTrigger", onTrigger);
    registry.setMode("game", "leftTrigger", "continuous");
    registry.appForegrounded();

    device.button("leftTrigger", true, 0.6);
    expect(onTrigger).not.toHaveBeenCalled();
    vi.advanceTimersByTime(300);
    expect(onTrigger.mock.calls).toEqual([
      [true, 0.6],
      [true, 0.6],
      [true, 0.6],
    ]);

    registry.setMode("game", "leftTrigger", "analog");
    vi.advanceTimersByTime(300);
    expect(onTrigger).toHaveBeenCalledTimes(3);

    device.button("leftTrigger", true, 0.7);
    device.button("leftTrigger", true, 0.8);
    device.button("leftTrigger", false, 0);
    expect(onTrigger.mock.calls.slice(3)).toEqual([
      [true, 0.7],
      [false, 0],
    ]);
    registry.shutdown();
  });

  it("a released continuous stick stops repeating", () => {
    const adapter = new SimulatedAdapter();
    const registry = new SubscriptionRegistry(adapter, { pollIntervalMs: 50, directionalGain: 1 });
    const device = adapter.attach(new SimulatedDevice("xbox"));
    const onStick = vi.fn();
    registry.register("camera").onDirection("rightThumbstick", onStick);
    registry.setMode("camera", "rightThumbstick", "directional");
    registry.appForegrounded();

    device.axis("rightThumbstick", 0.5, -0.5);
    vi.advanceTimersByTime(100);
    expect(onStick.mock.calls).toEqual([
      [0.5, -0.5],
      [0.5, -0.5],
    ]);

    device.axis("rightThumbstick", 0, 0);
    vi.advanceTimersByTime(200);
    expect(onStick).toHaveBeenCalledTimes(2);
    registry.shutdown();
  });

  it("polling stops while backgrounded", () => {
    const adapter = new SimulatedAdapter();
    const registry = new SubscriptionRegistry(adapter);
    const device = adapter.attach(new SimulatedDevice("xbox"));
    const onA = vi.fn();
    registry.register("game").onButton("buttonA", onA);
    registry.setMode("game", "buttonA", "continuous");
    registry.appForegrounded();

    device.button("buttonA", true);
    vi.advanceTimersByTime(100);
    expect(onA).toHaveBeenCalledTimes(1);

    registry.appBackgrounded();
    vi.advanceTimersByTime(500);
    expect(onA).toHaveBeenCalledTimes(1);
    registry.shutdown();
  });
});
