import { logger } from "../logger";
import type { AppConfig } from "../config";
import { SimulatedAdapter, SimulatedDevice } from "../device/simulated";
import { SubscriptionRegistry } from "../gamepad/registry";

export interface Runtime {
  adapter: SimulatedAdapter;
  registry: SubscriptionRegistry;
}

/**
 * Construit l'adaptateur simulé et le registre à partir de la configuration.
 */
export function createRuntime(cfg: AppConfig): Runtime {
  const adapter = new SimulatedAdapter();
  const registry = new SubscriptionRegistry(adapter, cfg.gamepad);
  return { adapter, registry };
}

/**
 * Branche la manette simulée configurée (section `simulator`), si demandée.
 */
export function attachConfiguredDevice(adapter: SimulatedAdapter, cfg: AppConfig): SimulatedDevice | null {
  const preset = cfg.simulator.device;
  if (!preset) {
    logger.info("Simulateur: aucune manette au démarrage.");
    return null;
  }
  const device = new SimulatedDevice(preset, cfg.simulator.vendorName ? { vendorName: cfg.simulator.vendorName } : {});
  adapter.attach(device);
  logger.info(`Simulateur: manette '${preset}' branchée (${device.id})`);
  return device;
}
