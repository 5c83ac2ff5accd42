import { describe, it, expect } from "vitest";
import fs from "fs";
import path from "path";
import YAML from "yaml";
import { loadStyleTable, parseStyleTable, pick } from "../styles";
import { DeviceInfo } from "../info";

function rawTable() {
  return YAML.parse(fs.readFileSync(path.resolve(__dirname, "../styles.yaml"), "utf8"));
}

describe("device/styles", () => {
  it("loads every control from styles.yaml", () => {
    const table = loadStyleTable();
    expect(table.controls.size).toBe(24);
    expect(loadStyleTable()).toBe(table);
  });

  it("pick falls back to the default value", () => {
    const value = { default: "xb1-a", byStyle: { dualShock: "ps4-cross" } };
    expect(pick(value, "dualShock")).toBe("ps4-cross");
    expect(pick(value, "micro")).toBe("xb1-a");
    expect(pick(undefined, "xbox")).toBe("");
  });

  it("rejects a table missing a control", () => {
    expect(() => parseStyleTable({ devices: { default: "x" }, controls: {} })).toThrow(
      "styles.yaml: contrôle 'leftShoulder' manquant"
    );
    expect(() => parseStyleTable("nope")).toThrow("styles.yaml invalide");
  });

  it("rejects unknown style keys", () => {
    const raw = rawTable();
    raw.controls.buttonA.icon.gamecube = "gc-a";
    expect(() => parseStyleTable(raw)).toThrow("styles.yaml: style inconnu 'gamecube' (buttonA.icon)");
  });

  it("rejects a missing devices section", () => {
    const raw = rawTable();
    delete raw.devices;
    expect(() => parseStyleTable(raw)).toThrow("styles.yaml: devices doit être un objet");
  });
});

describe("device/DeviceInfo", () => {
  it("uses default icons and titles while unknown", () => {
    const info = new DeviceInfo();
    expect(info.isUnknown).toBe(true);
    expect(info.vendorName).toBe("");
    expect(info.deviceIcon).toBe("extended-controller");
    expect(info.iconFor("buttonA")).toBe("xb1-a");
    expect(info.titleFor("buttonA")).toBe("A Button");
  });

  it("switches icons and titles with the style", () => {
    const info = new DeviceInfo();
    info.populate("DUALSHOCK 4 Wireless Controller", "dualShock");
    expect(info.deviceIcon).toBe("ps4-controller");
    expect(info.iconFor("buttonA")).toBe("ps4-cross");
    expect(info.titleFor("buttonA")).toBe("Cross Button");
    expect(info.iconFor("leftShoulder")).toBe("ps4-l1");
    expect(info.titleFor("touchpadPrimary")).toBe("Touchpad One Finger Swipe");

    info.populate(null, "xbox");
    expect(info.vendorName).toBe("Gamepad");
    expect(info.iconFor("leftShoulder")).toBe("xb1-lb");
    expect(info.titleFor("buttonHome")).toBe("Xbox Button");
    expect(info.titleFor("touchpadButton")).toBe("");
    expect(info.titleFor("paddleButton1")).toBe("Paddle 1");
  });

  it("snapshot survives a reset", () => {
    const info = new DeviceInfo();
    info.populate("Remote", "directional");
    const snap = info.snapshot();
    info.reset();
    expect(info.style).toBe("unknown");
    expect(info.vendorName).toBe("");
    expect(snap.style).toBe("directional");
    expect(snap.vendorName).toBe("Remote");
    expect(snap.titleFor("buttonMenu")).toBe("< Button");
  });
});
