import { logger, parseLogLevel, setLogLevel } from "./logger";
import { findConfigPath, loadConfig, watchConfig, type AppConfig } from "./config";
import { shouldAttachCli } from "./utils/runtime";
import { attachCli } from "./cli";
import { attachConfiguredDevice, createRuntime } from "./app/bootstrap";
import { attachLoggingSurface } from "./app/demoSurface";

export interface StartOptions {
  /** Chemin de configuration prioritaire */
  configPath?: string;
}

/**
 * Point d'entrée de l'application.
 * - Charge la configuration, construit l'adaptateur et le registre
 * - Enregistre la surface de démonstration, branche la manette simulée
 * - Active le hot‑reload de la configuration et la CLI
 *
 * @returns Fonction de nettoyage (arrêt propre des composants)
 */
export async function startApp(options: StartOptions = {}): Promise<() => Promise<void>> {
  logger.info("Démarrage padrouter…");
  const configPath = await findConfigPath(options.configPath);
  if (!configPath) {
    throw new Error("padrouter.yaml introuvable (racine ou config/)");
  }

  let cfg: AppConfig = await loadConfig(configPath);
  const applyLogLevel = (c: AppConfig): void => setLogLevel(process.env.LOG_LEVEL ? parseLogLevel(process.env.LOG_LEVEL) : c.logLevel);
  applyLogLevel(cfg);
  logger.info(`Configuration: ${configPath}`);

  const { adapter, registry } = createRuntime(cfg);
  attachLoggingSurface(registry, "demo");
  attachConfiguredDevice(adapter, cfg);
  registry.appForegrounded();

  const stopWatch = watchConfig(
    configPath,
    (next) => {
      cfg = next;
      applyLogLevel(cfg);
      registry.updateSettings(cfg.gamepad);
      logger.info("Configuration rechargée.");
    },
    (err) => logger.warn("Erreur hot reload config:", err)
  );

  let detachCli: (() => void) | null = null;
  let stopped = false;
  const cleanup = async (): Promise<void> => {
    if (stopped) return;
    stopped = true;
    stopWatch();
    detachCli?.();
    registry.appEnteringBackground();
    registry.shutdown({ releaseSubscriptions: true });
    logger.info("Arrêt padrouter");
  };

  if (shouldAttachCli()) {
    detachCli = attachCli({
      registry,
      adapter,
      configPath,
      onExit: async () => {
        await cleanup();
        process.exit(0);
      },
    });
  } else {
    logger.info("CLI désactivée (PM2, DISABLE_CLI ou terminal non interactif).");
  }

  return cleanup;
}
