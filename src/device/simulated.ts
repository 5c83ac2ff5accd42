import type { Control } from "../types";
import {
  BUTTON_CONTROLS,
  isDirectionControl,
  MICRO_CONTROLS,
  THUMBSTICK_CONTROLS,
  TRIGGER_CONTROLS,
} from "../gamepad/controls";
import type {
  BatteryState,
  DeviceCapabilities,
  RawAxisInput,
  RawAxisListener,
  RawButtonInput,
  RawButtonListener,
  RawDevice,
  RawDeviceAdapter,
  RawInputs,
} from "./adapter";

export type SimulatedPreset =
  | "extended"
  | "dualShock"
  | "dualSense"
  | "xbox"
  | "micro"
  | "directional"
  | "virtual"
  | "unsupported";

export const SIMULATED_PRESETS: readonly SimulatedPreset[] = [
  "extended",
  "dualShock",
  "dualSense",
  "xbox",
  "micro",
  "directional",
  "virtual",
  "unsupported",
];

const PRESET_NAMES: ReadonlySet<string> = new Set<string>(SIMULATED_PRESETS);

export function isSimulatedPreset(value: string): value is SimulatedPreset {
  return PRESET_NAMES.has(value);
}

/** Bouton simulé: mémorise la dernière valeur émise. */
export class SimulatedButtonInput implements RawButtonInput {
  readonly kind = "button";
  private readonly listeners = new Set<RawButtonListener>();
  pressure = 0;
  pressed = false;

  onValueChanged(listener: RawButtonListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(pressure: number, pressed: boolean): void {
    this.pressure = pressure;
    this.pressed = pressed;
    for (const l of Array.from(this.listeners)) l(pressure, pressed);
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}

/** Entrée à deux axes simulée. */
export class SimulatedAxisInput implements RawAxisInput {
  readonly kind = "axis";
  private readonly listeners = new Set<RawAxisListener>();
  x = 0;
  y = 0;

  onValueChanged(listener: RawAxisListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(x: number, y: number): void {
    this.x = x;
    this.y = y;
    for (const l of Array.from(this.listeners)) l(x, y);
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}

export interface SimulatedDeviceOptions {
  id?: string;
  vendorName?: string | null;
  productCategory?: string;
  haptics?: boolean;
  battery?: BatteryState | null;
}

interface PresetSpec {
  vendorName: string | null;
  productCategory: string;
  capabilities: DeviceCapabilities;
  controls: readonly Control[];
  haptics: boolean;
}

const NO_CAPS: DeviceCapabilities = {
  profile: "extended",
  touchpad: false,
  adaptiveTriggers: false,
  paddles: false,
  directional: false,
};

const EXTENDED_CONTROLS: readonly Control[] = [...TRIGGER_CONTROLS, ...BUTTON_CONTROLS, "dpad", ...THUMBSTICK_CONTROLS];
const TOUCHPAD_CONTROLS: readonly Control[] = ["touchpadButton", "touchpadPrimary", "touchpadSecondary"];

const PRESETS: Record<SimulatedPreset, PresetSpec> = {
  extended: {
    vendorName: "Extended Gamepad",
    productCategory: "Extended Gamepad",
    capabilities: NO_CAPS,
    controls: EXTENDED_CONTROLS,
    haptics: false,
  },
  dualShock: {
    vendorName: "DUALSHOCK 4 Wireless Controller",
    productCategory: "DualShock 4",
    capabilities: { ...NO_CAPS, touchpad: true },
    controls: [...EXTENDED_CONTROLS, ...TOUCHPAD_CONTROLS],
    haptics: true,
  },
  dualSense: {
    vendorName: "DualSense Wireless Controller",
    productCategory: "DualSense",
    capabilities: { ...NO_CAPS, touchpad: true, adaptiveTriggers: true },
    controls: [...EXTENDED_CONTROLS, ...TOUCHPAD_CONTROLS],
    haptics: true,
  },
  xbox: {
    vendorName: "Xbox Wireless Controller",
    productCategory: "Xbox One",
    capabilities: { ...NO_CAPS, paddles: true },
    controls: [...EXTENDED_CONTROLS, "paddleButton1", "paddleButton2", "paddleButton3", "paddleButton4", "buttonShare"],
    haptics: true,
  },
  micro: {
    vendorName: "Remote",
    productCategory: "Remote (1st Generation)",
    capabilities: { ...NO_CAPS, profile: "micro" },
    controls: MICRO_CONTROLS,
    haptics: false,
  },
  directional: {
    vendorName: "Remote",
    productCategory: "Remote (2nd Generation)",
    capabilities: { ...NO_CAPS, profile: "micro", directional: true },
    controls: MICRO_CONTROLS,
    haptics: false,
  },
  virtual: {
    vendorName: "Gamepad",
    productCategory: "MFi",
    capabilities: NO_CAPS,
    controls: EXTENDED_CONTROLS,
    haptics: false,
  },
  unsupported: {
    vendorName: null,
    productCategory: "HID",
    capabilities: { ...NO_CAPS, profile: "none" },
    controls: [],
    haptics: false,
  },
};

let nextId = 1;

/**
 * Manette simulée: expose des entrées brutes pilotables par `button()` / `axis()`.
 */
export class SimulatedDevice implements RawDevice {
  readonly id: string;
  readonly vendorName: string | null;
  readonly productCategory: string;
  readonly capabilities: DeviceCapabilities;
  readonly inputs: RawInputs = {};
  readonly haptics: boolean;
  battery: BatteryState | null;
  private readonly buttons = new Map<Control, SimulatedButtonInput>();
  private readonly axes = new Map<Control, SimulatedAxisInput>();

  constructor(readonly preset: SimulatedPreset, options: SimulatedDeviceOptions = {}) {
    const spec = PRESETS[preset];
    this.id = options.id ?? `sim-${preset}-${nextId++}`;
    this.vendorName = options.vendorName === undefined ? spec.vendorName : options.vendorName;
    this.productCategory = options.productCategory ?? spec.productCategory;
    this.capabilities = spec.capabilities;
    this.haptics = options.haptics ?? spec.haptics;
    this.battery = options.battery === undefined ? { level: 0.8, charging: false } : options.battery;
    for (const control of spec.controls) {
      if (isDirectionControl(control)) {
        const input = new SimulatedAxisInput();
        this.axes.set(control, input);
        this.inputs[control] = input;
      } else {
        const input = new SimulatedButtonInput();
        this.buttons.set(control, input);
        this.inputs[control] = input;
      }
    }
  }

  has(control: Control): boolean {
    return this.buttons.has(control) || this.axes.has(control);
  }

  /**
   * Émet un changement de bouton/gâchette. Pression par défaut: 1 si pressé, 0 sinon.
   * @returns false si le contrôle n'existe pas (ou n'est pas pressable) sur ce périphérique
   */
  button(control: Control, pressed: boolean, pressure: number = pressed ? 1 : 0): boolean {
    const input = this.buttons.get(control);
    if (!input) return false;
    input.emit(pressure, pressed);
    return true;
  }

  /** Émet un changement d'axes. */
  axis(control: Control, x: number, y: number): boolean {
    const input = this.axes.get(control);
    if (!input) return false;
    input.emit(x, y);
    return true;
  }

  /** Nombre total de listeners installés sur les entrées. */
  get listenerCount(): number {
    let n = 0;
    for (const input of this.buttons.values()) n += input.listenerCount;
    for (const input of this.axes.values()) n += input.listenerCount;
    return n;
  }
}

/**
 * Adaptateur en mémoire: remplace l'API contrôleur de la plateforme.
 */
export class SimulatedAdapter implements RawDeviceAdapter {
  private readonly attached: SimulatedDevice[] = [];
  private readonly attachListeners = new Set<(device: RawDevice) => void>();
  private readonly detachListeners = new Set<(device: RawDevice) => void>();

  devices(): readonly SimulatedDevice[] {
    return this.attached.slice();
  }

  get(id: string): SimulatedDevice | undefined {
    return this.attached.find((d) => d.id === id);
  }

  onAttach(listener: (device: RawDevice) => void): () => void {
    this.attachListeners.add(listener);
    return () => {
      this.attachListeners.delete(listener);
    };
  }

  onDetach(listener: (device: RawDevice) => void): () => void {
    this.detachListeners.add(listener);
    return () => {
      this.detachListeners.delete(listener);
    };
  }

  /** Branche un périphérique (déjà branché: sans effet). */
  attach(device: SimulatedDevice): SimulatedDevice {
    if (this.get(device.id)) return device;
    this.attached.push(device);
    for (const l of Array.from(this.attachListeners)) l(device);
    return device;
  }

  detach(id: string): SimulatedDevice | undefined {
    const idx = this.attached.findIndex((d) => d.id === id);
    if (idx < 0) return undefined;
    const [device] = this.attached.splice(idx, 1);
    for (const l of Array.from(this.detachListeners)) l(device);
    return device;
  }

  /** Nombre d'observateurs branchement/débranchement. */
  get watcherCount(): number {
    return this.attachListeners.size + this.detachListeners.size;
  }
}
