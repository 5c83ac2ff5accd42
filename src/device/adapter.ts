import type { Control, DirectionControl } from "../types";

export type RawButtonListener = (pressure: number, pressed: boolean) => void;
export type RawAxisListener = (x: number, y: number) => void;

/** Entrée physique à état pressé + pression (bouton, gâchette, épaule). */
export interface RawButtonInput {
  readonly kind: "button";
  /** Abonne un listener aux changements bruts. Retourne la fonction de désabonnement. */
  onValueChanged(listener: RawButtonListener): () => void;
}

/** Entrée physique à deux axes (dpad, stick, surface tactile). */
export interface RawAxisInput {
  readonly kind: "axis";
  onValueChanged(listener: RawAxisListener): () => void;
}

export type RawInput = RawButtonInput | RawAxisInput;

/** Entrées exposées par un périphérique; l'absence d'une clé signifie que le contrôle n'existe pas. */
export type RawInputs = { [C in Control]?: C extends DirectionControl ? RawAxisInput : RawButtonInput };

/**
 * Description des capacités d'un périphérique, renseignée une fois par l'adaptateur.
 * La classification teste la présence de ces champs; aucune conversion de type.
 */
export interface DeviceCapabilities {
  /** Profil de contrôles: complet, réduit (télécommande TV) ou aucun profil reconnu */
  profile: "extended" | "micro" | "none";
  /** Touchpad PS4/PS5 */
  touchpad: boolean;
  /** Gâchettes adaptatives (PS5) */
  adaptiveTriggers: boolean;
  /** Surface Xbox (palettes / bouton Share) */
  paddles: boolean;
  /** Télécommande à pavé directionnel (2e génération) */
  directional: boolean;
}

export interface BatteryState {
  /** Niveau 0..1 */
  level: number;
  charging: boolean;
}

/**
 * Périphérique brut tel que fourni par la plateforme.
 */
export interface RawDevice {
  readonly id: string;
  readonly vendorName: string | null;
  readonly productCategory: string;
  readonly capabilities: DeviceCapabilities;
  readonly inputs: RawInputs;
  readonly haptics: boolean;
  readonly battery: BatteryState | null;
}

/**
 * API contrôleur de la plateforme (collaborateur externe).
 */
export interface RawDeviceAdapter {
  /** Périphériques actuellement connectés; le premier est la manette principale. */
  devices(): readonly RawDevice[];
  onAttach(listener: (device: RawDevice) => void): () => void;
  onDetach(listener: (device: RawDevice) => void): () => void;
}
