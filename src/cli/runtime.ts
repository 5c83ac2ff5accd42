import { logger } from "../logger";

/**
 * Clear console including scrollback where supported.
 */
export function clearConsole(): void {
  try {
    process.stdout.write("\x1B[2J\x1B[3J\x1B[H");
  } catch (err) {
    logger.debug("clearConsole failed", err);
  }
}

/**
 * Parse un nombre fini; `undefined` sinon.
 */
export function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}
