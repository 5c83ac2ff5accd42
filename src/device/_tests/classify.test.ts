import { describe, it, expect } from "vitest";
import { classifyDevice, DEFAULT_DEVICE_POLICY, isVirtualDevice } from "../classify";
import { SimulatedDevice } from "../simulated";

describe("device/classifyDevice", () => {
  it("derives the style of extended gamepads from their capabilities", () => {
    expect(classifyDevice(new SimulatedDevice("extended"), DEFAULT_DEVICE_POLICY)).toEqual({
      accepted: true,
      style: "extended",
      micro: false,
    });
    expect(classifyDevice(new SimulatedDevice("dualShock"), DEFAULT_DEVICE_POLICY)).toMatchObject({ style: "dualShock" });
    expect(classifyDevice(new SimulatedDevice("dualSense"), DEFAULT_DEVICE_POLICY)).toMatchObject({ style: "dualSense" });
    expect(classifyDevice(new SimulatedDevice("xbox"), DEFAULT_DEVICE_POLICY)).toMatchObject({ style: "xbox" });
  });

  it("accepts remotes only when micro gamepads are supported", () => {
    const policy = { ...DEFAULT_DEVICE_POLICY, supportsMicro: true };
    expect(classifyDevice(new SimulatedDevice("micro"), DEFAULT_DEVICE_POLICY)).toEqual({ accepted: false, reason: "micro" });
    expect(classifyDevice(new SimulatedDevice("micro"), policy)).toEqual({ accepted: true, style: "micro", micro: true });
    expect(classifyDevice(new SimulatedDevice("directional"), policy)).toEqual({
      accepted: true,
      style: "directional",
      micro: true,
    });
  });

  it("rejects virtual controllers by vendor name and product category", () => {
    const device = new SimulatedDevice("virtual");
    expect(isVirtualDevice(device, DEFAULT_DEVICE_POLICY)).toBe(true);
    expect(classifyDevice(device, DEFAULT_DEVICE_POLICY)).toEqual({ accepted: false, reason: "virtual" });
    expect(classifyDevice(device, { ...DEFAULT_DEVICE_POLICY, supportsVirtual: true })).toMatchObject({
      accepted: true,
      style: "extended",
    });
  });

  it("a generic name alone does not make a controller virtual", () => {
    const device = new SimulatedDevice("extended", { vendorName: "Gamepad" });
    expect(isVirtualDevice(device, DEFAULT_DEVICE_POLICY)).toBe(false);
    const custom = { ...DEFAULT_DEVICE_POLICY, virtualVendorName: "Gamepad", virtualProductCategory: "Extended Gamepad" };
    expect(isVirtualDevice(device, custom)).toBe(true);
  });

  it("devices without a profile are unsupported", () => {
    expect(classifyDevice(new SimulatedDevice("unsupported"), DEFAULT_DEVICE_POLICY)).toEqual({
      accepted: false,
      reason: "unsupported",
    });
  });
});
