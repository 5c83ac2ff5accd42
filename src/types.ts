/**
 * Boutons numériques soumis au mode `ButtonMode` (anti-rebond ou continu).
 */
export type ButtonControl =
  | "buttonMenu"
  | "buttonOptions"
  | "buttonHome"
  | "buttonA"
  | "buttonB"
  | "buttonX"
  | "buttonY"
  | "leftThumbstickButton"
  | "rightThumbstickButton";

/** Gâchettes et boutons d'épaule (pression analogique + état pressé). */
export type TriggerControl = "leftShoulder" | "rightShoulder" | "leftTrigger" | "rightTrigger";

/** Sticks analogiques. */
export type ThumbstickControl = "leftThumbstick" | "rightThumbstick";

/** Boutons spécifiques constructeur (touchpad PS, palettes Xbox, Share): toujours immédiats. */
export type VendorButtonControl =
  | "touchpadButton"
  | "paddleButton1"
  | "paddleButton2"
  | "paddleButton3"
  | "paddleButton4"
  | "buttonShare";

/** Surfaces tactiles du touchpad PS4/PS5 (un doigt / deux doigts). */
export type VendorDirectionControl = "touchpadPrimary" | "touchpadSecondary";

/**
 * Ensemble fermé des contrôles physiques supportés.
 */
export type Control =
  | ButtonControl
  | TriggerControl
  | "dpad"
  | ThumbstickControl
  | VendorButtonControl
  | VendorDirectionControl;

/** Contrôles qui délivrent un état pressé (`(pressed)`). */
export type PressControl = ButtonControl | VendorButtonControl;

/** Contrôles qui délivrent une paire d'axes (`(x, y)`). */
export type DirectionControl = "dpad" | ThumbstickControl | VendorDirectionControl;

/** Catégorie de traitement d'un contrôle. */
export type ControlCategory = "button" | "trigger" | "dpad" | "thumbstick" | "vendorButton" | "vendorDirection";

export type ButtonMode = "stateChanged" | "continuous";
export type TriggerMode = "analog" | "continuous";
export type ThumbstickMode = "analog" | "directional";
/** Les contrôles constructeur n'ont qu'un comportement. */
export type ImmediateMode = "immediate";

export type ControlMode = ButtonMode | TriggerMode | ThumbstickMode | ImmediateMode;

/** Mode accepté par un contrôle donné. */
export type ModeFor<C extends Control> = C extends ButtonControl | "dpad"
  ? ButtonMode
  : C extends TriggerControl
    ? TriggerMode
    : C extends ThumbstickControl
      ? ThumbstickMode
      : ImmediateMode;

export type ButtonHandler = (pressed: boolean) => void;
export type TriggerHandler = (pressed: boolean, pressure: number) => void;
export type DirectionHandler = (x: number, y: number) => void;

/**
 * Événement normalisé délivré à une surface (variant étiqueté par `kind`).
 */
export type GamepadEvent =
  | { kind: "button"; control: PressControl; pressed: boolean }
  | { kind: "trigger"; control: TriggerControl; pressed: boolean; pressure: number }
  | { kind: "direction"; control: DirectionControl; x: number; y: number };

/** Callback d'application (actif, inactif, arrière-plan). */
export type AppEventHandler = () => void;
