import type { SubscriptionRegistry } from "../gamepad/registry";
import type { SimulatedAdapter } from "../device/simulated";

/**
 * Public context provided by the application to attach the CLI.
 */
export interface CliContext {
  registry: SubscriptionRegistry;
  adapter: SimulatedAdapter;
  configPath?: string | null;
  onExit?: () => Promise<void> | void;
}
