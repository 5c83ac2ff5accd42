import type {
  ButtonControl,
  Control,
  ControlCategory,
  ControlMode,
  DirectionControl,
  PressControl,
  ThumbstickControl,
  TriggerControl,
  VendorButtonControl,
  VendorDirectionControl,
} from "../types";

export const BUTTON_CONTROLS: readonly ButtonControl[] = [
  "buttonMenu",
  "buttonOptions",
  "buttonHome",
  "buttonA",
  "buttonB",
  "buttonX",
  "buttonY",
  "leftThumbstickButton",
  "rightThumbstickButton",
];

export const TRIGGER_CONTROLS: readonly TriggerControl[] = ["leftShoulder", "rightShoulder", "leftTrigger", "rightTrigger"];

export const THUMBSTICK_CONTROLS: readonly ThumbstickControl[] = ["leftThumbstick", "rightThumbstick"];

export const VENDOR_BUTTON_CONTROLS: readonly VendorButtonControl[] = [
  "touchpadButton",
  "paddleButton1",
  "paddleButton2",
  "paddleButton3",
  "paddleButton4",
  "buttonShare",
];

export const VENDOR_DIRECTION_CONTROLS: readonly VendorDirectionControl[] = ["touchpadPrimary", "touchpadSecondary"];

/** Tous les contrôles, dans l'ordre d'affichage de l'aide (gâchettes → boutons → sticks → constructeur). */
export const ALL_CONTROLS: readonly Control[] = [
  ...TRIGGER_CONTROLS,
  ...BUTTON_CONTROLS,
  "dpad",
  ...THUMBSTICK_CONTROLS,
  ...VENDOR_BUTTON_CONTROLS,
  ...VENDOR_DIRECTION_CONTROLS,
];

/** Contrôles exposés par une télécommande TV (micro gamepad). */
export const MICRO_CONTROLS: readonly Control[] = ["dpad", "buttonMenu", "buttonA", "buttonX"];

const CATEGORY: Record<Control, ControlCategory> = {
  buttonMenu: "button",
  buttonOptions: "button",
  buttonHome: "button",
  buttonA: "button",
  buttonB: "button",
  buttonX: "button",
  buttonY: "button",
  leftThumbstickButton: "button",
  rightThumbstickButton: "button",
  leftShoulder: "trigger",
  rightShoulder: "trigger",
  leftTrigger: "trigger",
  rightTrigger: "trigger",
  dpad: "dpad",
  leftThumbstick: "thumbstick",
  rightThumbstick: "thumbstick",
  touchpadButton: "vendorButton",
  paddleButton1: "vendorButton",
  paddleButton2: "vendorButton",
  paddleButton3: "vendorButton",
  paddleButton4: "vendorButton",
  buttonShare: "vendorButton",
  touchpadPrimary: "vendorDirection",
  touchpadSecondary: "vendorDirection",
};

/** Catégorie de traitement d'un contrôle. */
export function categoryOf(control: Control): ControlCategory {
  return CATEGORY[control];
}

/** Mode documenté par défaut (utilisé quand aucune surface ne gère le contrôle). */
export function defaultModeFor(control: Control): ControlMode {
  switch (categoryOf(control)) {
    case "button":
    case "dpad":
      return "stateChanged";
    case "trigger":
    case "thumbstick":
      return "analog";
    default:
      return "immediate";
  }
}

/** Vérifie qu'un mode est applicable à un contrôle. */
export function isModeValidFor(control: Control, mode: string): mode is ControlMode {
  switch (categoryOf(control)) {
    case "button":
    case "dpad":
      return mode === "stateChanged" || mode === "continuous";
    case "trigger":
      return mode === "analog" || mode === "continuous";
    case "thumbstick":
      return mode === "analog" || mode === "directional";
    default:
      return mode === "immediate";
  }
}

/** Vrai si le mode délivre via la boucle de polling. */
export function isPolledMode(mode: ControlMode): boolean {
  return mode === "continuous" || mode === "directional";
}

const CONTROL_NAMES: ReadonlySet<string> = new Set<string>(ALL_CONTROLS);

export function isControl(value: string): value is Control {
  return CONTROL_NAMES.has(value);
}

export function isTriggerControl(control: Control): control is TriggerControl {
  return categoryOf(control) === "trigger";
}

export function isPressControl(control: Control): control is PressControl {
  const cat = categoryOf(control);
  return cat === "button" || cat === "vendorButton";
}

export function isDirectionControl(control: Control): control is DirectionControl {
  const cat = categoryOf(control);
  return cat === "dpad" || cat === "thumbstick" || cat === "vendorDirection";
}
