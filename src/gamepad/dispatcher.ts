import { logger } from "../logger";
import type { Control, ControlMode, GamepadEvent } from "../types";
import { categoryOf, isDirectionControl, isPolledMode, isPressControl, isTriggerControl } from "./controls";
import { axisSignal, isActive, pressSignal, scaleAxis, type ControlSignal } from "./signal";
import type { SurfaceSubscription } from "./subscription";

/** Gain appliqué aux axes en mode continu/directionnel. */
export const DEFAULT_DIRECTIONAL_GAIN = 5;

/** Surface propriétaire d'un contrôle et mode effectif. */
export interface RouteTarget {
  subscription: SurfaceSubscription;
  mode: ControlMode;
}

export type RouteLookup = (control: Control) => RouteTarget | null;

/**
 * Applique le mode de chaque contrôle aux signaux bruts:
 * anti-rebond pour les modes discrets, valeur "stagée" pour les modes continus
 * (livrée ensuite par `tick()`).
 */
export class ModeDispatcher {
  private readonly staged = new Map<Control, ControlSignal>();
  private readonly debounce = new Map<Control, boolean>();

  constructor(
    private readonly lookup: RouteLookup,
    private gain: number = DEFAULT_DIRECTIONAL_GAIN
  ) {}

  get directionalGain(): number {
    return this.gain;
  }

  setDirectionalGain(gain: number): void {
    this.gain = gain;
  }

  /**
   * Signal brut d'un contrôle pressable (bouton, gâchette, bouton constructeur).
   */
  press(control: Control, pressure: number, pressed: boolean): void {
    const target = this.lookup(control);
    if (!target) {
      logger.trace(`Gamepad: ${control} sans handler, signal ignoré`);
      return;
    }
    switch (categoryOf(control)) {
      case "button":
        if (target.mode === "continuous") {
          this.staged.set(control, pressSignal(pressed, pressure));
          return;
        }
        if (this.debounced(control, pressed) && isPressControl(control)) {
          target.subscription.deliver({ kind: "button", control, pressed });
        }
        return;
      case "trigger":
        if (target.mode === "continuous") {
          this.staged.set(control, pressSignal(pressed, pressure));
          return;
        }
        if (this.debounced(control, pressed) && isTriggerControl(control)) {
          target.subscription.deliver({ kind: "trigger", control, pressed, pressure });
        }
        return;
      case "vendorButton":
        if (isPressControl(control)) target.subscription.deliver({ kind: "button", control, pressed });
        return;
      default:
        logger.debug(`Gamepad: signal de pression inattendu pour ${control}`);
    }
  }

  /**
   * Signal brut d'un contrôle directionnel (dpad, stick, touchpad).
   */
  axis(control: Control, x: number, y: number): void {
    const target = this.lookup(control);
    if (!target) {
      logger.trace(`Gamepad: ${control} sans handler, signal ignoré`);
      return;
    }
    if (!isDirectionControl(control)) {
      logger.debug(`Gamepad: signal d'axe inattendu pour ${control}`);
      return;
    }
    if (isPolledMode(target.mode)) {
      this.staged.set(control, scaleAxis(axisSignal(x, y), this.gain));
      return;
    }
    switch (categoryOf(control)) {
      case "dpad":
        // Anti-rebond sur le pavé entier: "pressé" = au moins un axe non nul
        if (this.debounced(control, x !== 0 || y !== 0)) {
          target.subscription.deliver({ kind: "direction", control, x, y });
        }
        return;
      default:
        target.subscription.deliver({ kind: "direction", control, x, y });
    }
  }

  /**
   * Livraison directe, sans mode (télécommandes micro).
   */
  direct(event: GamepadEvent): void {
    const target = this.lookup(event.control);
    if (!target) return;
    target.subscription.deliver(event);
  }

  /**
   * Un pas de la boucle de polling: livre chaque valeur stagée active
   * dont le mode effectif est encore continu/directionnel.
   * @returns nombre de livraisons
   */
  tick(): number {
    let delivered = 0;
    for (const [control, signal] of Array.from(this.staged)) {
      if (!isActive(signal)) continue;
      const target = this.lookup(control);
      if (!target || !isPolledMode(target.mode)) continue;
      const event = toEvent(control, signal);
      if (event && target.subscription.deliver(event)) delivered += 1;
    }
    return delivered;
  }

  /** Valeur stagée d'un contrôle (undefined si aucune). */
  stagedFor(control: Control): ControlSignal | undefined {
    return this.staged.get(control);
  }

  /** Dernier état "pressé" retenu par l'anti-rebond. */
  debounceFor(control: Control): boolean {
    return this.debounce.get(control) ?? false;
  }

  /** Nombre de valeurs stagées actives. */
  get activeCount(): number {
    let n = 0;
    for (const signal of this.staged.values()) if (isActive(signal)) n += 1;
    return n;
  }

  clear(control: Control): void {
    this.staged.delete(control);
  }

  /** Remet valeurs stagées et anti-rebond à l'état neutre. */
  reset(): void {
    this.staged.clear();
    this.debounce.clear();
  }

  /** Met à jour l'état retenu; true si transition. */
  private debounced(control: Control, pressed: boolean): boolean {
    if ((this.debounce.get(control) ?? false) === pressed) return false;
    this.debounce.set(control, pressed);
    return true;
  }
}

function toEvent(control: Control, signal: ControlSignal): GamepadEvent | null {
  if (signal.kind === "press") {
    if (isTriggerControl(control)) return { kind: "trigger", control, pressed: signal.pressed, pressure: signal.pressure };
    if (isPressControl(control)) return { kind: "button", control, pressed: signal.pressed };
    return null;
  }
  if (isDirectionControl(control)) return { kind: "direction", control, x: signal.x, y: signal.y };
  return null;
}
