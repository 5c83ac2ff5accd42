import fs from "fs";
import path from "path";
import YAML from "yaml";
import type { Control } from "../types";
import { ALL_CONTROLS } from "../gamepad/controls";

/**
 * Variante de manette détectée à la connexion.
 */
export type DeviceStyle = "unknown" | "extended" | "dualShock" | "xbox" | "dualSense" | "micro" | "directional";

export const DEVICE_STYLES: readonly DeviceStyle[] = [
  "unknown",
  "extended",
  "dualShock",
  "xbox",
  "dualSense",
  "micro",
  "directional",
];

/** Valeur par style, avec repli `default`. */
export interface StyledValue {
  default: string;
  byStyle: Partial<Record<DeviceStyle, string>>;
}

export interface ControlStyle {
  icon: StyledValue;
  title: StyledValue;
}

export interface StyleTable {
  device: StyledValue;
  controls: ReadonlyMap<Control, ControlStyle>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const STYLE_NAMES: ReadonlySet<string> = new Set<string>(DEVICE_STYLES);

export function isDeviceStyle(value: string): value is DeviceStyle {
  return STYLE_NAMES.has(value);
}

function parseStyledValue(raw: unknown, where: string): StyledValue {
  if (!isRecord(raw)) throw new Error(`styles.yaml: ${where} doit être un objet`);
  const byStyle: Partial<Record<DeviceStyle, string>> = {};
  let fallback = "";
  for (const [key, value] of Object.entries(raw)) {
    const text = value == null ? "" : String(value);
    if (key === "default") fallback = text;
    else if (isDeviceStyle(key)) byStyle[key] = text;
    else throw new Error(`styles.yaml: style inconnu '${key}' (${where})`);
  }
  return { default: fallback, byStyle };
}

/**
 * Construit la table à partir du YAML brut. Chaque contrôle doit avoir `icon` et `title`.
 * @throws Erreur si une section ou un contrôle manque
 */
export function parseStyleTable(raw: unknown): StyleTable {
  if (!isRecord(raw)) throw new Error("styles.yaml invalide");
  const section = raw.controls;
  if (!isRecord(section)) throw new Error("styles.yaml: section 'controls' manquante");
  const controls = new Map<Control, ControlStyle>();
  for (const control of ALL_CONTROLS) {
    const entry = section[control];
    if (!isRecord(entry)) throw new Error(`styles.yaml: contrôle '${control}' manquant`);
    controls.set(control, {
      icon: parseStyledValue(entry.icon, `${control}.icon`),
      title: parseStyledValue(entry.title, `${control}.title`),
    });
  }
  return { device: parseStyledValue(raw.devices, "devices"), controls };
}

/** Valeur pour un style, `default` sinon. */
export function pick(value: StyledValue | undefined, style: DeviceStyle): string {
  if (!value) return "";
  return value.byStyle[style] ?? value.default;
}

let cached: StyleTable | null = null;

/**
 * Charge `styles.yaml` (à côté de ce module). Le résultat est mis en cache.
 */
export function loadStyleTable(): StyleTable {
  if (cached) return cached;
  const filePath = path.resolve(__dirname, "styles.yaml");
  const raw = fs.readFileSync(filePath, { encoding: "utf8" });
  cached = parseStyleTable(YAML.parse(raw));
  return cached;
}
