import { promises as fs } from "fs";
import YAML from "yaml";
import chokidar from "chokidar";
import { parseLogLevel, type LogLevel } from "./logger";
import { DEFAULT_REGISTRY_SETTINGS, type RegistrySettings } from "./gamepad/registry";
import { MIN_POLL_INTERVAL_MS } from "./gamepad/poller";
import { isSimulatedPreset, type SimulatedPreset } from "./device/simulated";

/**
 * Section `gamepad` du fichier YAML (clés snake_case, toutes optionnelles).
 */
export interface GamepadConfig {
  /** Cadence de la boucle de polling en ms (≥ 10). Défaut: 100 */
  poll_interval_ms?: number;
  /** Gain des axes en mode continu/directionnel. Défaut: 5 */
  directional_gain?: number;
  /** Accepter les télécommandes TV. Défaut: false */
  supports_micro?: boolean;
  /** Accepter les manettes virtuelles. Défaut: false */
  supports_virtual?: boolean;
  virtual_vendor_name?: string;
  virtual_product_category?: string;
  /** Surface de base; `null` pour aucune. Défaut: "default" */
  default_surface?: string | null;
}

/** Manette simulée branchée au démarrage. */
export interface SimulatorConfig {
  /** Preset, ou "none" pour démarrer sans manette. Défaut: "xbox" */
  device?: SimulatedPreset | "none";
  vendor_name?: string;
}

/**
 * Configuration brute telle que lue dans le YAML.
 */
export interface RawAppConfig {
  log_level?: string;
  gamepad?: GamepadConfig;
  simulator?: SimulatorConfig;
}

/**
 * Configuration normalisée: toutes les valeurs sont renseignées.
 */
export interface AppConfig {
  logLevel: LogLevel;
  gamepad: RegistrySettings;
  simulator: {
    device: SimulatedPreset | null;
    vendorName: string | null;
  };
}

const DEFAULT_PATHS = ["padrouter.yaml", "config/padrouter.yaml"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function numberOr(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function booleanOr(value: unknown, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === "string" && value.length > 0 ? value : fallback;
}

/**
 * Normalise le YAML parsé: valeurs absentes ou invalides → défauts.
 */
export function normalizeConfig(raw: unknown): AppConfig {
  const root = isRecord(raw) ? raw : {};
  const gp = isRecord(root.gamepad) ? root.gamepad : {};
  const sim = isRecord(root.simulator) ? root.simulator : {};
  const d = DEFAULT_REGISTRY_SETTINGS;

  let defaultSurface: string | null = d.defaultSurface;
  if (gp.default_surface === null) defaultSurface = null;
  else if (typeof gp.default_surface === "string" && gp.default_surface.length > 0) defaultSurface = gp.default_surface;

  let device: SimulatedPreset | null = "xbox";
  if (sim.device === "none" || sim.device === null) device = null;
  else if (typeof sim.device === "string" && isSimulatedPreset(sim.device)) device = sim.device;

  return {
    logLevel: parseLogLevel(root.log_level),
    gamepad: {
      pollIntervalMs: Math.max(MIN_POLL_INTERVAL_MS, numberOr(gp.poll_interval_ms, d.pollIntervalMs)),
      directionalGain: numberOr(gp.directional_gain, d.directionalGain),
      supportsMicro: booleanOr(gp.supports_micro, d.supportsMicro),
      supportsVirtual: booleanOr(gp.supports_virtual, d.supportsVirtual),
      virtualVendorName: stringOr(gp.virtual_vendor_name, d.virtualVendorName),
      virtualProductCategory: stringOr(gp.virtual_product_category, d.virtualProductCategory),
      defaultSurface,
    },
    simulator: {
      device,
      vendorName: typeof sim.vendor_name === "string" && sim.vendor_name.length > 0 ? sim.vendor_name : null,
    },
  };
}

/**
 * Recherche le fichier de configuration.
 * @param customPath Chemin prioritaire (testé avant les emplacements par défaut)
 * @returns Premier chemin accessible, ou null
 */
export async function findConfigPath(customPath?: string): Promise<string | null> {
  const candidates = customPath ? [customPath, ...DEFAULT_PATHS] : DEFAULT_PATHS;
  for (const p of candidates) {
    try {
      await fs.access(p);
      return p;
    } catch {
      // continue
    }
  }
  return null;
}

/**
 * Charge et normalise le fichier YAML de configuration.
 * @param filePath Chemin explicite; sinon, recherche via {@link findConfigPath}
 * @throws Erreur si aucun fichier n'est trouvé ou si le YAML est invalide
 */
export async function loadConfig(filePath?: string): Promise<AppConfig> {
  const p = await findConfigPath(filePath);
  if (!p) {
    throw new Error("Aucun fichier de configuration trouvé (padrouter.yaml)");
  }
  const raw = await fs.readFile(p, "utf8");
  return normalizeConfig(YAML.parse(raw));
}

/**
 * Observe un fichier de configuration YAML et notifie en cas de modification.
 * @param filePath Chemin du fichier à surveiller
 * @param onChange Callback appelée avec la nouvelle configuration
 * @param onError Callback d'erreur facultative
 * @returns Fonction pour arrêter l'observation
 */
export function watchConfig(
  filePath: string,
  onChange: (cfg: AppConfig) => void,
  onError?: (err: unknown) => void
): () => void {
  const watcher = chokidar.watch(filePath, { ignoreInitial: true });
  const handler = async (): Promise<void> => {
    try {
      const raw = await fs.readFile(filePath, "utf8");
      onChange(normalizeConfig(YAML.parse(raw)));
    } catch (err) {
      onError?.(err);
    }
  };
  watcher.on("change", () => {
    void handler();
  });
  return () => {
    watcher.close().catch((err: unknown) => onError?.(err));
  };
}
