import type { Control } from "../types";
import type { SubscriptionRegistry } from "../gamepad/registry";

/** Ordre d'affichage de l'aide. */
export const HELP_ORDER: readonly Control[] = [
  "leftShoulder",
  "rightShoulder",
  "leftTrigger",
  "rightTrigger",
  "buttonMenu",
  "buttonOptions",
  "buttonHome",
  "buttonA",
  "buttonB",
  "buttonX",
  "buttonY",
  "dpad",
  "leftThumbstick",
  "rightThumbstick",
  "leftThumbstickButton",
  "rightThumbstickButton",
  "touchpadButton",
  "touchpadPrimary",
  "touchpadSecondary",
  "paddleButton1",
  "paddleButton2",
  "paddleButton3",
  "paddleButton4",
  "buttonShare",
];

export interface HelpEntry {
  control: Control;
  icon: string;
  title: string;
  usage: string;
}

/** Mise en forme externe des textes d'aide (ex: balisage `**gras**`). */
export type UsageFormatter = (usage: string) => string;

/**
 * Entrées d'aide pour la manette liée: contrôles ayant une aide et existant sur la variante.
 */
export function buildHelpEntries(registry: SubscriptionRegistry, format?: UsageFormatter): HelpEntry[] {
  const info = registry.deviceInfo;
  const out: HelpEntry[] = [];
  for (const control of HELP_ORDER) {
    const { usage } = registry.resolve(control);
    const title = info.titleFor(control);
    if (!usage || !title) continue;
    out.push({ control, icon: info.iconFor(control), title, usage: format ? format(usage) : usage });
  }
  return out;
}
