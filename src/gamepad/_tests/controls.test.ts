import { describe, it, expect } from "vitest";
import {
  ALL_CONTROLS,
  categoryOf,
  defaultModeFor,
  isControl,
  isModeValidFor,
  isPolledMode,
  MICRO_CONTROLS,
} from "../controls";

describe("gamepad/controls", () => {
  it("lists the 24 controls once each", () => {
    expect(ALL_CONTROLS.length).toBe(24);
    expect(new Set(ALL_CONTROLS).size).toBe(24);
    expect(MICRO_CONTROLS).toEqual(["dpad", "buttonMenu", "buttonA", "buttonX"]);
  });

  it("gives the documented default modes", () => {
    expect(defaultModeFor("buttonA")).toBe("stateChanged");
    expect(defaultModeFor("dpad")).toBe("stateChanged");
    expect(defaultModeFor("leftShoulder")).toBe("analog");
    expect(defaultModeFor("rightThumbstick")).toBe("analog");
    expect(defaultModeFor("paddleButton2")).toBe("immediate");
    expect(defaultModeFor("touchpadPrimary")).toBe("immediate");
  });

  it("validates modes against the control's mode type", () => {
    expect(isModeValidFor("buttonB", "continuous")).toBe(true);
    expect(isModeValidFor("buttonB", "analog")).toBe(false);
    expect(isModeValidFor("rightTrigger", "continuous")).toBe(true);
    expect(isModeValidFor("rightTrigger", "directional")).toBe(false);
    expect(isModeValidFor("leftThumbstick", "directional")).toBe(true);
    expect(isModeValidFor("leftThumbstick", "continuous")).toBe(false);
    expect(isModeValidFor("dpad", "continuous")).toBe(true);
    expect(isModeValidFor("buttonShare", "continuous")).toBe(false);
  });

  it("classifies controls and polled modes", () => {
    expect(categoryOf("leftShoulder")).toBe("trigger");
    expect(categoryOf("buttonShare")).toBe("vendorButton");
    expect(isPolledMode("continuous")).toBe(true);
    expect(isPolledMode("directional")).toBe(true);
    expect(isPolledMode("analog")).toBe(false);
    expect(isControl("buttonA")).toBe(true);
    expect(isControl("buttonZ")).toBe(false);
  });
});
