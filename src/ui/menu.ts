import { logger } from "../logger";
import { moving } from "../gamepad/direction";
import type { SubscriptionRegistry } from "../gamepad/registry";

export type MenuStyle = "items" | "cards";

export interface GamepadMenuItem {
  id: number;
  title: string;
  enabled: boolean;
  action: (() => void) | null;
}

/**
 * Données d'un menu navigable à la manette.
 */
export class GamepadMenu {
  items: GamepadMenuItem[] = [];

  constructor(public style: MenuStyle = "items") {}

  /** Ajoute un élément; l'id est la position (1..n) au moment de l'ajout. */
  addItem(title: string, options: { enabled?: boolean; action?: () => void } = {}): GamepadMenuItem {
    const item: GamepadMenuItem = {
      id: this.items.length + 1,
      title,
      enabled: options.enabled ?? true,
      action: options.action ?? null,
    };
    this.items.push(item);
    return item;
  }

  /** Éléments activés, dans l'ordre. */
  get activeItems(): GamepadMenuItem[] {
    return this.items.filter((it) => it.enabled);
  }

  clear(): void {
    this.items = [];
  }
}

/**
 * Sélection et fenêtre visible (`maxEntries` éléments à partir de `topIndex`).
 * La sélection reste toujours dans la fenêtre.
 */
export class MenuNavigator {
  selectedIndex = 0;
  topIndex = 0;

  constructor(
    readonly menu: GamepadMenu,
    readonly maxEntries: number = 4
  ) {}

  private get count(): number {
    return this.menu.activeItems.length;
  }

  /** Dernier index visible. */
  get bottomIndex(): number {
    if (this.topIndex + this.maxEntries >= this.count) return this.count - 1;
    return this.topIndex + (this.maxEntries - 1);
  }

  /** Indicateur "plus haut". */
  get canScrollUp(): boolean {
    return this.topIndex > 0;
  }

  /** Indicateur "plus bas". */
  get canScrollDown(): boolean {
    return this.topIndex + this.maxEntries < this.count;
  }

  get selectedItem(): GamepadMenuItem | undefined {
    return this.menu.activeItems[this.selectedIndex];
  }

  visibleItems(): Array<{ item: GamepadMenuItem; selected: boolean }> {
    const items = this.menu.activeItems;
    const out: Array<{ item: GamepadMenuItem; selected: boolean }> = [];
    for (let i = this.topIndex; i <= this.bottomIndex; i++) {
      out.push({ item: items[i], selected: i === this.selectedIndex });
    }
    return out;
  }

  /** @returns true si la sélection a changé */
  up(): boolean {
    if (this.selectedIndex <= 0 || this.count === 0) return false;
    this.selectedIndex -= 1;
    if (this.selectedIndex < this.topIndex) this.topIndex -= 1;
    return true;
  }

  down(): boolean {
    if (this.count === 0 || this.selectedIndex >= this.count - 1) return false;
    this.selectedIndex += 1;
    if (this.selectedIndex > this.bottomIndex) this.topIndex += 1;
    return true;
  }

  /**
   * Retourne l'élément sélectionné. Avec `purge`, la sélection est remise à zéro
   * et le menu vidé avant le retour.
   */
  select(purge: boolean): GamepadMenuItem | null {
    const item = this.selectedItem;
    if (!item) return null;
    if (purge) {
      this.reset();
      this.menu.clear();
    }
    return item;
  }

  reset(): void {
    this.selectedIndex = 0;
    this.topIndex = 0;
  }
}

export const DPAD_MENU_USAGE = "Use the **Up** and **Down** arrows to select an **Item** from the **Menu**.";
export const BUTTON_X_MENU_USAGE = "Choose the **Selected Item** from the **Menu**.";

export type MenuSound = "selectionChanged" | "selected";

export interface AttachMenuOptions {
  maxEntries?: number;
  /** Vider le menu après une sélection (défaut: true) */
  autoPurge?: boolean;
  onSelectionChanged?: (index: number) => void;
  /** Lecture d'un son, sans attente du résultat */
  playSound?: (sound: MenuSound) => void | Promise<void>;
}

export interface AttachedMenu {
  navigator: MenuNavigator;
  detach: () => void;
}

/**
 * Lie un menu à une surface: dpad haut/bas pour naviguer, bouton X pour choisir.
 */
export function attachMenu(
  registry: SubscriptionRegistry,
  surfaceId: string,
  menu: GamepadMenu,
  options: AttachMenuOptions = {}
): AttachedMenu {
  const navigator = new MenuNavigator(menu, options.maxEntries ?? 4);
  const autoPurge = options.autoPurge ?? true;

  const play = (sound: MenuSound): void => {
    const fn = options.playSound;
    if (!fn) return;
    Promise.resolve()
      .then(() => fn(sound))
      .catch((err: unknown) => logger.warn(`Menu: lecture du son '${sound}' impossible:`, err));
  };

  const sub = registry.register(surfaceId);
  sub.onDirection("dpad", (x, y) => {
    const direction = moving(x, y);
    if (direction !== "up" && direction !== "down") return;
    const before = navigator.selectedIndex;
    if (direction === "up" ? !navigator.up() : !navigator.down()) return;
    play("selectionChanged");
    logger.trace(`Menu ${surfaceId}: sélection ${before} → ${navigator.selectedIndex}`);
    options.onSelectionChanged?.(navigator.selectedIndex);
  });
  sub.onButton("buttonX", (pressed) => {
    if (!pressed) return;
    const item = navigator.select(autoPurge);
    if (!item) return;
    play("selected");
    item.action?.();
  });
  registry.setUsage(surfaceId, "dpad", DPAD_MENU_USAGE);
  registry.setUsage(surfaceId, "buttonX", BUTTON_X_MENU_USAGE);

  return {
    navigator,
    detach: () => registry.release(surfaceId),
  };
}
