import { logger } from "../logger";
import type { Control, ControlMode } from "../types";
import type { RawDevice, RawDeviceAdapter } from "../device/adapter";
import { classifyDevice, DEFAULT_DEVICE_POLICY, type DevicePolicy } from "../device/classify";
import { DEFAULT_VENDOR_NAME, DeviceInfo } from "../device/info";
import type { DeviceStyle, StyleTable } from "../device/styles";
import { ALL_CONTROLS, defaultModeFor, isPolledMode, isPressControl, MICRO_CONTROLS } from "./controls";
import { DEFAULT_DIRECTIONAL_GAIN, ModeDispatcher, type RouteTarget } from "./dispatcher";
import { DEFAULT_POLL_INTERVAL_MS, Poller } from "./poller";
import { PriorityStack } from "./priorityStack";
import type { ControlSignal } from "./signal";
import { SurfaceSubscription, type BoundHandler, type ConnectHandler } from "./subscription";

export type ConnectionState = "disconnected" | "connecting" | "bound";

/**
 * Réglages du registre (section `gamepad` de la configuration).
 */
export interface RegistrySettings extends DevicePolicy {
  pollIntervalMs: number;
  directionalGain: number;
  /** Surface créée à la base de la pile; `null` pour n'en créer aucune */
  defaultSurface: string | null;
}

export const DEFAULT_REGISTRY_SETTINGS: RegistrySettings = {
  ...DEFAULT_DEVICE_POLICY,
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  directionalGain: DEFAULT_DIRECTIONAL_GAIN,
  defaultSurface: "default",
};

export interface RegistryOptions extends Partial<RegistrySettings> {
  /** Table d'icônes/libellés (par défaut: `styles.yaml`) */
  styles?: StyleTable;
}

/**
 * Résultat de `resolve()`: handler, mode et aide voyagent ensemble avec la surface propriétaire.
 */
export interface Resolution {
  surfaceId: string | null;
  handler: BoundHandler | null;
  mode: ControlMode;
  usage: string;
}

export interface ShutdownOptions {
  releaseSubscriptions?: boolean;
}

/**
 * Registre des surfaces abonnées et cycle de vie de la manette liée.
 *
 * - pile de priorité: la surface enregistrée en dernier est consultée en premier
 * - une seule manette routée à la fois
 * - aucune méthode ne lève d'exception vers l'hôte
 */
export class SubscriptionRegistry {
  private readonly stack = new PriorityStack<SurfaceSubscription>();
  private readonly info: DeviceInfo;
  private readonly dispatcher: ModeDispatcher;
  private readonly poller: Poller;
  private settings: RegistrySettings;
  private connection: ConnectionState = "disconnected";
  private device: RawDevice | null = null;
  private unbinders: Array<() => void> = [];
  private unwatchers: Array<() => void> = [];
  private foreground = false;

  constructor(
    private readonly adapter: RawDeviceAdapter,
    options: RegistryOptions = {}
  ) {
    const { styles, ...settings } = options;
    this.settings = { ...DEFAULT_REGISTRY_SETTINGS, ...settings };
    this.info = styles ? new DeviceInfo(styles) : new DeviceInfo();
    this.dispatcher = new ModeDispatcher((control) => this.routeTarget(control), this.settings.directionalGain);
    this.poller = new Poller(() => {
      this.tick();
    }, this.settings.pollIntervalMs);
    if (this.settings.defaultSurface !== null) this.register(this.settings.defaultSurface);
  }

  // ---------------------------------------------------------------------------
  // Routage

  /** Enregistre une surface (idempotent: une surface existante n'est pas déplacée). */
  register(surfaceId: string): SurfaceSubscription {
    const existing = this.stack.get(surfaceId);
    if (existing) return existing;
    logger.debug(`Gamepad: surface '${surfaceId}' enregistrée`);
    return this.stack.push(new SurfaceSubscription(surfaceId));
  }

  subscription(surfaceId: string): SurfaceSubscription | undefined {
    return this.stack.get(surfaceId);
  }

  /** Identifiants des surfaces, sommet en premier. */
  surfaces(): string[] {
    return this.stack.toArray().map((s) => s.id);
  }

  /**
   * Retire une surface et vide ses slots. Sans effet si elle est inconnue.
   * Les valeurs stagées des contrôles dont elle était propriétaire sont effacées.
   */
  release(surfaceId: string): void {
    const sub = this.stack.get(surfaceId);
    if (!sub) return;
    for (const control of sub.handledControls()) {
      if (this.routeTarget(control)?.subscription === sub) this.dispatcher.clear(control);
    }
    sub.clear();
    this.stack.remove(surfaceId);
    logger.debug(`Gamepad: surface '${surfaceId}' libérée`);
  }

  /** Première surface (depuis le sommet) ayant un handler pour le contrôle. */
  resolve(control: Control): Resolution {
    const sub = this.stack.find((s) => s.hasHandler(control));
    if (!sub) return { surfaceId: null, handler: null, mode: defaultModeFor(control), usage: "" };
    return { surfaceId: sub.id, handler: sub.handlerFor(control), mode: sub.modeOf(control), usage: sub.usageOf(control) };
  }

  /**
   * Enregistre la surface avec son callback de connexion.
   * Si une manette est liée, la poignée de main est rejouée pour toutes les surfaces.
   * En arrière-plan, seule la nouvelle surface est notifiée: les listeners restent retirés
   * jusqu'à `appForegrounded()`.
   */
  connect(surfaceId: string, onConnect: ConnectHandler): SurfaceSubscription {
    const sub = this.register(surfaceId);
    sub.onConnect(onConnect);
    if (this.device && !this.foreground) {
      sub.fireConnect(this.device, this.info);
    } else if (this.device) {
      this.handshake(this.device);
    } else if (this.foreground) {
      const [first] = this.adapter.devices();
      if (first) this.handshake(first);
    }
    return sub;
  }

  /**
   * Change le mode d'un contrôle pour une surface.
   * @returns false si le mode n'est pas valide pour ce contrôle
   */
  setMode(surfaceId: string, control: Control, mode: string): boolean {
    const sub = this.register(surfaceId);
    if (!sub.setMode(control, mode)) return false;
    // Seul le propriétaire effectif du contrôle peut vider la valeur stagée
    if (!isPolledMode(sub.modeOf(control)) && this.routeTarget(control)?.subscription === sub) {
      this.dispatcher.clear(control);
    }
    return true;
  }

  setUsage(surfaceId: string, control: Control, text: string): void {
    this.register(surfaceId).setUsage(control, text);
  }

  /** Un pas de la boucle de polling (appelé par le timer, ou à la main). */
  tick(): number {
    return this.dispatcher.tick();
  }

  /** État interne du dispatcher pour un contrôle. */
  inspect(control: Control): { staged: ControlSignal | undefined; pressed: boolean } {
    return { staged: this.dispatcher.stagedFor(control), pressed: this.dispatcher.debounceFor(control) };
  }

  // ---------------------------------------------------------------------------
  // Cycle de vie

  get state(): ConnectionState {
    return this.connection;
  }

  get isForeground(): boolean {
    return this.foreground;
  }

  get isPolling(): boolean {
    return this.poller.isRunning();
  }

  get boundDevice(): RawDevice | null {
    return this.device;
  }

  get deviceInfo(): DeviceInfo {
    return this.info;
  }

  get currentSettings(): RegistrySettings {
    return { ...this.settings };
  }

  /**
   * Rétablit la liaison: la manette liée si elle est toujours présente, sinon la première disponible.
   * Une manette liée qui a disparu est déconnectée.
   */
  reconnect(): void {
    const devices = this.adapter.devices();
    const bound = this.device;
    if (bound && !devices.some((d) => d.id === bound.id)) this.disconnectDevice(bound);
    const target = (bound && devices.find((d) => d.id === bound.id)) ?? devices[0];
    if (target) this.handshake(target);
    else logger.debug("Gamepad: aucune manette disponible");
  }

  appForegrounded(): void {
    this.foreground = true;
    this.watch();
    this.reconnect();
    this.poller.start();
    for (const sub of this.stack) sub.fireActive();
    logger.info("Gamepad: application au premier plan");
  }

  appBackgrounded(): void {
    for (const sub of this.stack) sub.fireInactive();
    this.poller.stop();
    this.unbindListeners();
    this.dispatcher.reset();
    this.unwatch();
    this.foreground = false;
    logger.info("Gamepad: application en arrière-plan");
  }

  appEnteringBackground(): void {
    for (const sub of this.stack) sub.fireBackground();
  }

  /**
   * Arrêt: passage en arrière-plan, déconnexion de la manette liée
   * et, si demandé, libération de toutes les surfaces.
   */
  shutdown(options: ShutdownOptions = {}): void {
    if (this.foreground) this.appBackgrounded();
    if (this.device) this.disconnectDevice(this.device);
    if (options.releaseSubscriptions) {
      for (const id of this.surfaces()) this.release(id);
    }
    logger.info("Gamepad: registre arrêté");
  }

  /**
   * Applique de nouveaux réglages: cadence et gain immédiatement,
   * politique d'acceptation à la prochaine poignée de main.
   */
  updateSettings(next: Partial<RegistrySettings>): void {
    this.settings = { ...this.settings, ...next };
    this.poller.setIntervalMs(this.settings.pollIntervalMs);
    this.dispatcher.setDirectionalGain(this.settings.directionalGain);
    logger.debug("Gamepad: réglages mis à jour");
  }

  // ---------------------------------------------------------------------------
  // Capacités

  isConnected(): boolean {
    return this.connection === "bound";
  }

  vendorName(): string {
    return this.info.vendorName || DEFAULT_VENDOR_NAME;
  }

  productCategory(): string {
    return this.device?.productCategory ?? "";
  }

  styleVariant(): DeviceStyle {
    return this.info.style;
  }

  supportsHaptics(): boolean {
    return this.device?.haptics ?? false;
  }

  /** Niveau de batterie 0..100, ou -1 si inconnu. */
  batteryLevel(): number {
    const battery = this.device?.battery;
    if (!battery) return -1;
    return Math.round(battery.level * 100);
  }

  isCharging(): boolean {
    return this.device?.battery?.charging ?? false;
  }

  // ---------------------------------------------------------------------------
  // Interne

  private routeTarget(control: Control): RouteTarget | null {
    const sub = this.stack.find((s) => s.hasHandler(control));
    return sub ? { subscription: sub, mode: sub.modeOf(control) } : null;
  }

  private watch(): void {
    if (this.unwatchers.length > 0) return;
    this.unwatchers = [
      this.adapter.onAttach((device) => {
        logger.info(`Gamepad: manette détectée (${device.vendorName ?? DEFAULT_VENDOR_NAME})`);
        this.handshake(device);
      }),
      this.adapter.onDetach((device) => {
        this.disconnectDevice(device);
      }),
    ];
  }

  private unwatch(): void {
    for (const off of this.unwatchers.splice(0)) off();
  }

  private handshake(device: RawDevice): boolean {
    const result = classifyDevice(device, this.settings);
    if (!result.accepted) {
      if (result.reason === "unsupported") logger.warn(`Gamepad: périphérique '${device.id}' sans profil reconnu`);
      else logger.debug(`Gamepad: périphérique '${device.id}' refusé (${result.reason})`);
      return false;
    }
    if (this.device && this.device.id !== device.id) this.disconnectDevice(this.device);

    this.connection = "connecting";
    this.unbindListeners();
    this.info.populate(device.vendorName, result.style);
    if (result.micro) this.bindMicro(device);
    else this.bindExtended(device);
    this.device = device;
    this.connection = "bound";
    logger.info(`Gamepad: ${this.info.vendorName} connectée (${result.style})`);

    for (const sub of this.stack) sub.fireConnect(device, this.info);
    return true;
  }

  private bindExtended(device: RawDevice): void {
    for (const control of ALL_CONTROLS) {
      const input = device.inputs[control];
      if (!input) continue;
      if (input.kind === "button") {
        this.unbinders.push(input.onValueChanged((pressure, pressed) => this.dispatcher.press(control, pressure, pressed)));
      } else {
        this.unbinders.push(input.onValueChanged((x, y) => this.dispatcher.axis(control, x, y)));
      }
    }
  }

  /** Télécommande: pas de traitement de mode, livraison immédiate. */
  private bindMicro(device: RawDevice): void {
    for (const control of MICRO_CONTROLS) {
      const input = device.inputs[control];
      if (!input) continue;
      if (input.kind === "axis") {
        if (control !== "dpad") continue;
        this.unbinders.push(
          input.onValueChanged((x, y) => this.dispatcher.direct({ kind: "direction", control, x, y }))
        );
      } else if (isPressControl(control)) {
        this.unbinders.push(
          input.onValueChanged((_pressure, pressed) => this.dispatcher.direct({ kind: "button", control, pressed }))
        );
      }
    }
  }

  private unbindListeners(): void {
    for (const off of this.unbinders.splice(0)) off();
  }

  private disconnectDevice(device: RawDevice): void {
    if (!this.device || this.device.id !== device.id) {
      logger.debug(`Gamepad: déconnexion ignorée pour '${device.id}' (non liée)`);
      return;
    }
    this.unbindListeners();
    const snapshot = this.info.snapshot();
    this.dispatcher.reset();
    this.info.reset();
    this.device = null;
    this.connection = "disconnected";
    logger.info(`Gamepad: ${snapshot.vendorName} déconnectée`);
    for (const sub of this.stack) sub.fireDisconnect(device, snapshot);
  }
}
