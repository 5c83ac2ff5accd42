import { logger } from "../logger";
import type { SubscriptionRegistry } from "../gamepad/registry";
import type { SurfaceSubscription } from "../gamepad/subscription";
import { ALL_CONTROLS, isDirectionControl, isPressControl, isTriggerControl } from "../gamepad/controls";
import type { Control } from "../types";

/**
 * Surface de démonstration: journalise chaque événement reçu et les transitions de connexion.
 */
export function attachLoggingSurface(registry: SubscriptionRegistry, surfaceId: string): SurfaceSubscription {
  const sub = registry.connect(surfaceId, (_device, info) => {
    logger.info(`[${surfaceId}] connectée: ${info.vendorName} (${info.style}) icône=${info.deviceIcon}`);
  });
  sub.onDisconnect((_device, info) => {
    logger.info(`[${surfaceId}] déconnectée: ${info.vendorName}`);
  });
  sub.onActive(() => logger.debug(`[${surfaceId}] active`));
  sub.onInactive(() => logger.debug(`[${surfaceId}] inactive`));
  sub.onBackground(() => logger.debug(`[${surfaceId}] arrière-plan`));

  const label = (control: Control): string => registry.deviceInfo.titleFor(control) || control;
  for (const control of ALL_CONTROLS) {
    if (isTriggerControl(control)) {
      sub.onTrigger(control, (pressed, pressure) =>
        logger.info(`[${surfaceId}] ${label(control)}: ${pressed ? "pressé" : "relâché"} (${pressure.toFixed(2)})`)
      );
    } else if (isPressControl(control)) {
      sub.onButton(control, (pressed) => logger.info(`[${surfaceId}] ${label(control)}: ${pressed ? "pressé" : "relâché"}`));
    } else if (isDirectionControl(control)) {
      sub.onDirection(control, (x, y) => logger.info(`[${surfaceId}] ${label(control)}: x=${x.toFixed(2)} y=${y.toFixed(2)}`));
    }
    registry.setUsage(surfaceId, control, `Journalise **${control}**.`);
  }
  return sub;
}
