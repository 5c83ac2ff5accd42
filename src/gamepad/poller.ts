import { logger } from "../logger";

/** Cadence par défaut de la boucle de polling. */
export const DEFAULT_POLL_INTERVAL_MS = 100;
export const MIN_POLL_INTERVAL_MS = 10;

/**
 * Boucle à intervalle fixe. Un pas qui lève une exception est journalisé, la boucle continue.
 */
export class Poller {
  private timer: ReturnType<typeof setInterval> | null = null;
  private period: number;

  constructor(
    private readonly step: () => void,
    intervalMs: number = DEFAULT_POLL_INTERVAL_MS
  ) {
    this.period = Math.max(MIN_POLL_INTERVAL_MS, intervalMs);
  }

  get intervalMs(): number {
    return this.period;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      try {
        this.step();
      } catch (err) {
        logger.warn("Gamepad: erreur dans la boucle de polling:", err);
      }
    }, this.period);
    logger.debug(`Gamepad: polling démarré (${this.period} ms)`);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    logger.debug("Gamepad: polling arrêté");
  }

  /** Change la cadence; une boucle en cours est redémarrée. */
  setIntervalMs(intervalMs: number): void {
    const next = Math.max(MIN_POLL_INTERVAL_MS, intervalMs);
    if (next === this.period) return;
    this.period = next;
    if (this.timer) {
      this.stop();
      this.start();
    }
  }
}
