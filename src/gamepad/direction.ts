/** Direction générale d'un dpad ou d'un stick. */
export type MovementDirection = "none" | "up" | "down" | "left" | "right";

/**
 * Traduit une paire d'axes en direction. L'axe X est prioritaire sur Y
 * quand les deux sont non nuls.
 */
export function moving(x: number, y: number): MovementDirection {
  if (x > 0) return "right";
  if (x < 0) return "left";
  if (y > 0) return "up";
  if (y < 0) return "down";
  return "none";
}
