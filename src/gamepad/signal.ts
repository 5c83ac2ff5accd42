/**
 * État instantané d'un contrôle pressable (bouton, gâchette).
 */
export interface PressSignal {
  readonly kind: "press";
  readonly pressed: boolean;
  /** Pression 0..1 (1 ou 0 pour un bouton purement numérique) */
  readonly pressure: number;
}

/**
 * État instantané d'un contrôle directionnel (dpad, stick, touchpad), axes -1..1.
 */
export interface AxisSignal {
  readonly kind: "axis";
  readonly x: number;
  readonly y: number;
}

export type ControlSignal = PressSignal | AxisSignal;

export const NEUTRAL_PRESS: PressSignal = { kind: "press", pressed: false, pressure: 0 };
export const NEUTRAL_AXIS: AxisSignal = { kind: "axis", x: 0, y: 0 };

export function pressSignal(pressed: boolean, pressure: number): PressSignal {
  return { kind: "press", pressed, pressure };
}

export function axisSignal(x: number, y: number): AxisSignal {
  return { kind: "axis", x, y };
}

/** Égalité structurelle de deux signaux. */
export function signalsEqual(a: ControlSignal, b: ControlSignal): boolean {
  if (a.kind === "press" && b.kind === "press") return a.pressed === b.pressed && a.pressure === b.pressure;
  if (a.kind === "axis" && b.kind === "axis") return a.x === b.x && a.y === b.y;
  return false;
}

/**
 * Un signal est "actif" s'il est pressé, ou si au moins un axe est non nul
 * (c'est l'équivalent "pressé" du dpad pour l'anti-rebond).
 */
export function isActive(signal: ControlSignal): boolean {
  return signal.kind === "press" ? signal.pressed : signal.x !== 0 || signal.y !== 0;
}

export function isNeutral(signal: ControlSignal): boolean {
  return signal.kind === "press" ? !signal.pressed && signal.pressure === 0 : signal.x === 0 && signal.y === 0;
}

/** Pression au-delà d'un seuil (0..1). */
export function exceeds(signal: PressSignal, threshold: number): boolean {
  return signal.pressure >= threshold;
}

/** Applique un gain aux deux axes. */
export function scaleAxis(signal: AxisSignal, gain: number): AxisSignal {
  return { kind: "axis", x: signal.x * gain, y: signal.y * gain };
}
