import { describe, it, expect } from "vitest";
import { findCategory, loadHelpSpec, parseHelpSpec, renderHelp } from "../help";
import { helpFilterFor } from "../commands/misc";
import { buildHelpRuntimeContext, suggestFromSpec } from "../helpSupport";
import { levenshtein } from "../levenshtein";
import { parseNumber } from "../runtime";
import { SubscriptionRegistry } from "../../gamepad/registry";
import { SimulatedAdapter } from "../../device/simulated";

describe("cli/help", () => {
  it("loads the bundled help.yaml", () => {
    const spec = loadHelpSpec();
    expect(spec.meta?.program).toBe("padrouter");
    expect(spec.categories.map((c) => c.id)).toEqual(["device", "routing", "basics"]);
  });

  it("rejects a help file without categories and skips unnamed commands", () => {
    expect(() => parseHelpSpec({})).toThrow("help.yaml invalide: attendu { categories: [...] }");
    const spec = parseHelpSpec({ categories: [{ id: "x", commands: [{ name: "go" }, { usage: "none" }] }] });
    expect(spec.categories).toEqual([
      {
        id: "x",
        title: "x",
        commands: [
          {
            id: "go",
            name: "go",
            usage: undefined,
            description: undefined,
            danger: false,
            notes: undefined,
            examples: undefined,
            aliases: undefined,
          },
        ],
      },
    ]);
  });

  it("renders the header and the details of a single command", () => {
    const lines = renderHelp(loadHelpSpec(), {}, { kind: "command", value: "attach" });
    expect(lines.slice(0, 3)).toEqual([
      "padrouter> <commande> [arguments]",
      "<control>: buttonA, leftTrigger, dpad, leftThumbstick…",
      "<preset>: extended, dualShock, dualSense, xbox, micro, directional, virtual, unsupported",
    ]);
    expect(lines.slice(3, 9)).toEqual(["Config: -", "Manette: -", "Surfaces: -", "Log: info", "Version: 0.1.0", ""]);
    expect(lines.slice(9)).toEqual([
      "attach: Branche une manette simulée.",
      "  Usage: attach <preset> [vendor name]",
      "  Ex.: attach xbox",
      "  Ex.: attach dualSense My Pad",
    ]);
  });

  it("finds commands by alias and suggests on unknown names", () => {
    const spec = loadHelpSpec();
    expect(renderHelp(spec, {}, { kind: "command", value: "quit" }).slice(-2)).toEqual([
      "exit: Quitte l'application.",
      "  Alias: quit",
    ]);
    expect(renderHelp(spec, {}, { kind: "command", value: "atach" }).slice(-2)).toEqual([
      "Commande inconnue: atach",
      "Voulez-vous dire: attach, detach",
    ]);
  });

  it("lists one category with aligned names and usages", () => {
    const lines = renderHelp(loadHelpSpec(), { device: "Xbox Wireless Controller (xbox)" }, { kind: "category", value: "device" });
    expect(lines).toContain("Manette: Xbox Wireless Controller (xbox)");
    const start = lines.indexOf("Manette simulée");
    expect(lines.slice(start + 1, start + 3)).toEqual([
      "  attach   Branche une manette simulée.",
      "    attach <preset> [vendor name]",
    ]);
    expect(lines).not.toContain("Routage");
  });

  it("searches names, usages and descriptions", () => {
    const spec = loadHelpSpec();
    const lines = renderHelp(spec, {}, { kind: "search", value: "Polling" });
    expect(lines).toContain("  tick  Exécute n pas de la boucle de polling.");
    expect(lines).toContain("  fg    Passage au premier plan (liaison + polling).");
    expect(lines).not.toContain("Général");
    expect(renderHelp(spec, {}, { kind: "search", value: "zzz" }).at(-1)).toBe("Aucune commande pour 'zzz'.");
  });

  it("maps the help argument to a filter", () => {
    const spec = loadHelpSpec();
    expect(helpFilterFor(spec, "")).toBeUndefined();
    expect(helpFilterFor(spec, "search Mode")).toEqual({ kind: "search", value: "Mode" });
    expect(helpFilterFor(spec, "device")).toEqual({ kind: "category", value: "device" });
    expect(helpFilterFor(spec, "général")).toEqual({ kind: "category", value: "basics" });
    expect(helpFilterFor(spec, "attach")).toEqual({ kind: "command", value: "attach" });
    expect(findCategory(spec, "  ")).toBeUndefined();
  });

  it("suggests commands and aliases within two edits", () => {
    const spec = loadHelpSpec();
    expect(suggestFromSpec(spec, "tik")).toEqual(["tick"]);
    expect(suggestFromSpec(spec, "zzzzzz")).toEqual([]);
  });

  it("builds the header context from the registry", () => {
    const registry = new SubscriptionRegistry(new SimulatedAdapter());
    const ctx = buildHelpRuntimeContext({ registry, adapter: new SimulatedAdapter() });
    expect(ctx.device).toBe("aucune");
    expect(ctx.surfaces).toBe("1");
    expect(ctx.configPath).toBe("-");
  });
});

describe("cli/levenshtein", () => {
  it("counts edits", () => {
    expect(levenshtein("kitten", "sitting")).toBe(3);
    expect(levenshtein("", "abc")).toBe(3);
    expect(levenshtein("same", "same")).toBe(0);
  });
});

describe("cli/parseNumber", () => {
  it("parses finite numbers only", () => {
    expect(parseNumber("0.5")).toBe(0.5);
    expect(parseNumber("-1")).toBe(-1);
    expect(parseNumber("abc")).toBeUndefined();
    expect(parseNumber(" ")).toBeUndefined();
    expect(parseNumber(undefined)).toBeUndefined();
  });
});
