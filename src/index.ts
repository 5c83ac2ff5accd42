#!/usr/bin/env node
import { logger } from "./logger";
import { startApp } from "./app";

async function main(): Promise<void> {
  const cleanup = await startApp({ configPath: process.argv[2] });

  const onSignal = (): void => {
    cleanup()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error("Erreur à l'arrêt:", err);
        process.exit(1);
      });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err: unknown) => {
  logger.error("Erreur fatale:", err);
  process.exit(1);
});
