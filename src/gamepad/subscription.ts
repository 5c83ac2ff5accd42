import { logger } from "../logger";
import type {
  AppEventHandler,
  ButtonHandler,
  Control,
  ControlMode,
  DirectionControl,
  DirectionHandler,
  GamepadEvent,
  PressControl,
  TriggerControl,
  TriggerHandler,
} from "../types";
import type { RawDevice } from "../device/adapter";
import type { DeviceInfo } from "../device/info";
import { defaultModeFor, isModeValidFor } from "./controls";

export type ConnectHandler = (device: RawDevice, info: DeviceInfo) => void;
export type DisconnectHandler = (device: RawDevice, info: DeviceInfo) => void;

/** Handler lié à un contrôle, étiqueté par sa forme. */
export type BoundHandler =
  | { kind: "button"; handler: ButtonHandler }
  | { kind: "trigger"; handler: TriggerHandler }
  | { kind: "direction"; handler: DirectionHandler };

interface ControlSlot {
  handler: BoundHandler | null;
  mode: ControlMode;
  usage: string;
}

/**
 * Exécute un callback d'abonné; une exception est journalisée et n'interrompt pas l'appelant.
 */
export function invokeSafely(label: string, fn: () => void): boolean {
  try {
    fn();
    return true;
  } catch (err) {
    logger.warn(`Gamepad: callback '${label}' a levé une exception:`, err);
    return false;
  }
}

/**
 * Abonnement d'une surface (écran, menu, vue) aux contrôles de la manette.
 *
 * Chaque contrôle porte un handler optionnel, un mode et un texte d'aide.
 * `deliver()` est l'unique point d'entrée des événements.
 */
export class SurfaceSubscription {
  private readonly slots = new Map<Control, ControlSlot>();
  private connectCb: ConnectHandler | null = null;
  private disconnectCb: DisconnectHandler | null = null;
  private activeCb: AppEventHandler | null = null;
  private inactiveCb: AppEventHandler | null = null;
  private backgroundCb: AppEventHandler | null = null;

  constructor(readonly id: string) {}

  private slot(control: Control): ControlSlot {
    let s = this.slots.get(control);
    if (!s) {
      s = { handler: null, mode: defaultModeFor(control), usage: "" };
      this.slots.set(control, s);
    }
    return s;
  }

  /** Handler `(pressed)` d'un bouton; `null` retire le handler. */
  onButton(control: PressControl, handler: ButtonHandler | null): this {
    this.slot(control).handler = handler ? { kind: "button", handler } : null;
    return this;
  }

  /** Handler `(pressed, pressure)` d'une gâchette ou d'une épaule. */
  onTrigger(control: TriggerControl, handler: TriggerHandler | null): this {
    this.slot(control).handler = handler ? { kind: "trigger", handler } : null;
    return this;
  }

  /** Handler `(x, y)` du dpad, d'un stick ou d'une surface tactile. */
  onDirection(control: DirectionControl, handler: DirectionHandler | null): this {
    this.slot(control).handler = handler ? { kind: "direction", handler } : null;
    return this;
  }

  /**
   * Change le mode d'un contrôle.
   * @returns false (et rien ne change) si le mode n'est pas applicable au contrôle
   */
  setMode(control: Control, mode: string): boolean {
    if (!isModeValidFor(control, mode)) {
      logger.warn(`Gamepad: mode '${mode}' invalide pour ${control} (surface ${this.id})`);
      return false;
    }
    this.slot(control).mode = mode;
    return true;
  }

  setUsage(control: Control, text: string): this {
    this.slot(control).usage = text;
    return this;
  }

  hasHandler(control: Control): boolean {
    return this.slots.get(control)?.handler != null;
  }

  handlerFor(control: Control): BoundHandler | null {
    return this.slots.get(control)?.handler ?? null;
  }

  modeOf(control: Control): ControlMode {
    return this.slots.get(control)?.mode ?? defaultModeFor(control);
  }

  usageOf(control: Control): string {
    return this.slots.get(control)?.usage ?? "";
  }

  /** Contrôles ayant un handler. */
  handledControls(): Control[] {
    const out: Control[] = [];
    for (const [control, s] of this.slots) if (s.handler) out.push(control);
    return out;
  }

  onConnect(cb: ConnectHandler | null): this {
    this.connectCb = cb;
    return this;
  }

  onDisconnect(cb: DisconnectHandler | null): this {
    this.disconnectCb = cb;
    return this;
  }

  onActive(cb: AppEventHandler | null): this {
    this.activeCb = cb;
    return this;
  }

  onInactive(cb: AppEventHandler | null): this {
    this.inactiveCb = cb;
    return this;
  }

  onBackground(cb: AppEventHandler | null): this {
    this.backgroundCb = cb;
    return this;
  }

  /**
   * Délivre un événement au handler du contrôle.
   * @returns true si un handler de la bonne forme a été invoqué sans erreur
   */
  deliver(event: GamepadEvent): boolean {
    const slot = this.slots.get(event.control)?.handler;
    if (!slot) return false;
    const label = `${this.id}/${event.control}`;
    switch (event.kind) {
      case "button": {
        if (slot.kind !== "button") return false;
        const { handler } = slot;
        const { pressed } = event;
        return invokeSafely(label, () => handler(pressed));
      }
      case "trigger": {
        if (slot.kind !== "trigger") return false;
        const { handler } = slot;
        const { pressed, pressure } = event;
        return invokeSafely(label, () => handler(pressed, pressure));
      }
      case "direction": {
        if (slot.kind !== "direction") return false;
        const { handler } = slot;
        const { x, y } = event;
        return invokeSafely(label, () => handler(x, y));
      }
    }
  }

  fireConnect(device: RawDevice, info: DeviceInfo): void {
    const cb = this.connectCb;
    if (cb) invokeSafely(`${this.id}/connect`, () => cb(device, info));
  }

  fireDisconnect(device: RawDevice, info: DeviceInfo): void {
    const cb = this.disconnectCb;
    if (cb) invokeSafely(`${this.id}/disconnect`, () => cb(device, info));
  }

  fireActive(): void {
    const cb = this.activeCb;
    if (cb) invokeSafely(`${this.id}/active`, cb);
  }

  fireInactive(): void {
    const cb = this.inactiveCb;
    if (cb) invokeSafely(`${this.id}/inactive`, cb);
  }

  fireBackground(): void {
    const cb = this.backgroundCb;
    if (cb) invokeSafely(`${this.id}/background`, cb);
  }

  /** Vide tous les slots et callbacks. */
  clear(): void {
    this.slots.clear();
    this.connectCb = null;
    this.disconnectCb = null;
    this.activeCb = null;
    this.inactiveCb = null;
    this.backgroundCb = null;
  }
}
