import type { Control } from "../types";
import { loadStyleTable, pick, type DeviceStyle, type StyleTable } from "./styles";

/** Nom affiché quand le constructeur n'en fournit pas. */
export const DEFAULT_VENDOR_NAME = "Gamepad";

/**
 * Métadonnées de la manette liée: nom constructeur et variante.
 * Icônes et libellés sont des fonctions pures de la variante.
 */
export class DeviceInfo {
  private name = "";
  private currentStyle: DeviceStyle = "unknown";

  constructor(private readonly table: StyleTable = loadStyleTable()) {}

  get vendorName(): string {
    return this.name;
  }

  get style(): DeviceStyle {
    return this.currentStyle;
  }

  /** Vrai tant qu'aucune manette n'est classée. */
  get isUnknown(): boolean {
    return this.currentStyle === "unknown";
  }

  populate(vendorName: string | null, style: DeviceStyle): void {
    this.name = vendorName ?? DEFAULT_VENDOR_NAME;
    this.currentStyle = style;
  }

  reset(): void {
    this.name = "";
    this.currentStyle = "unknown";
  }

  /** Copie indépendante (remise aux callbacks de déconnexion). */
  snapshot(): DeviceInfo {
    const copy = new DeviceInfo(this.table);
    copy.name = this.name;
    copy.currentStyle = this.currentStyle;
    return copy;
  }

  get deviceIcon(): string {
    return pick(this.table.device, this.currentStyle);
  }

  iconFor(control: Control): string {
    return pick(this.table.controls.get(control)?.icon, this.currentStyle);
  }

  titleFor(control: Control): string {
    return pick(this.table.controls.get(control)?.title, this.currentStyle);
  }
}
