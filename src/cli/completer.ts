import type { CompleterResult } from "readline";
import { ALL_CONTROLS, categoryOf, isControl, isModeValidFor } from "../gamepad/controls";
import { SIMULATED_PRESETS } from "../device/simulated";
import { loadHelpSpec } from "./help";
import type { CliContext } from "./types";

function norm(s: string): string { return s.trim().toLowerCase(); }

const ALL_MODES = ["stateChanged", "continuous", "analog", "directional", "immediate"];

export function makeCompleter(ctx: CliContext): (line: string) => CompleterResult {
  return (line: string): CompleterResult => {
    const words = line.split(/\s+/);
    const trailingSpace = /\s$/.test(line);
    const lastToken = trailingSpace ? "" : words[words.length - 1];
    const suggestLast = (candidates: readonly string[]): CompleterResult => {
      const uniq = Array.from(new Set(candidates.filter(Boolean)));
      const hits = lastToken ? uniq.filter((x) => norm(x).startsWith(norm(lastToken))) : uniq;
      return [hits.length ? hits : uniq, lastToken];
    };

    try {
      const spec = loadHelpSpec();
      const cmdStrings = new Set<string>(["exit", "quit"]);
      for (const cmd of spec.categories.flatMap((c) => c.commands)) {
        cmdStrings.add(cmd.name);
        for (const a of cmd.aliases || []) cmdStrings.add(a);
      }
      const allCmds = Array.from(cmdStrings);
      if (words.length <= 1 && !trailingSpace) return suggestLast(allCmds);

      const cmd = norm(words[0] || "");
      // Index de l'argument en cours de saisie (0 = premier argument)
      const argIndex = trailingSpace ? words.length - 1 : words.length - 2;
      const args = ((): readonly string[] => {
        if (cmd === "help") return [...spec.categories.map((c) => c.id), ...allCmds, "search "];
        if (cmd === "attach") return argIndex === 0 ? SIMULATED_PRESETS : [];
        if (cmd === "detach") return ctx.adapter.devices().map((d) => d.id);
        if (cmd === "press" || cmd === "release") {
          return ALL_CONTROLS.filter((c) => categoryOf(c) !== "dpad" && categoryOf(c) !== "thumbstick" && categoryOf(c) !== "vendorDirection");
        }
        if (cmd === "pull") return argIndex === 0 ? ALL_CONTROLS.filter((c) => categoryOf(c) === "trigger") : ["0", "0.5", "1"];
        if (cmd === "move") return argIndex === 0 ? ALL_CONTROLS.filter((c) => ["dpad", "thumbstick", "vendorDirection"].includes(categoryOf(c))) : ["-1", "0", "1"];
        if (cmd === "resolve") return ALL_CONTROLS;
        if (cmd === "mode") {
          if (argIndex === 0) return ctx.registry.surfaces();
          if (argIndex === 1) return ALL_CONTROLS;
          const control = words[2] || "";
          return isControl(control) ? ALL_MODES.filter((m) => isModeValidFor(control, m)) : ALL_MODES;
        }
        return [];
      })();
      return suggestLast(args);
    } catch {
      const fallback = ["help", "exit", "quit", "version"];
      return suggestLast(fallback);
    }
  };
}
