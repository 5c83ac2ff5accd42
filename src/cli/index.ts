import readline from "readline";
import { logger } from "../logger";
import { loadHelpSpec, printHelp } from "./help";
import { buildHelpRuntimeContext } from "./helpSupport";
import { runCommand } from "./commands";
import { makeCompleter } from "./completer";
import { createInitialSession } from "./session";
import type { CliContext } from "./types";

export type { CliContext } from "./types";

/**
 * Attache le REPL interactif sur stdin/stdout.
 * @returns Fonction de détachement (ferme l'interface readline)
 */
export function attachCli(ctx: CliContext): () => void {
  const session = createInitialSession();
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, completer: makeCompleter(ctx) });
  try {
    const spec = loadHelpSpec();
    printHelp(spec, buildHelpRuntimeContext(ctx), { kind: "category", value: "basics" });
  } catch (err) {
    logger.debug("help.yaml:", err);
    process.stdout.write("Aide CLI indisponible (help.yaml introuvable ou invalide). Tapez 'help'.\n");
  }
  rl.setPrompt("padrouter> ");
  rl.prompt();

  let closing = false;
  const exit = async (): Promise<void> => {
    if (closing) return;
    closing = true;
    rl.close();
    await ctx.onExit?.();
  };

  rl.on("line", (line) => {
    runCommand(line, ctx, session)
      .then(async (outcome) => {
        if (outcome === "exit") await exit();
        else rl.prompt();
      })
      .catch((err: unknown) => {
        logger.error("Erreur CLI:", err);
        rl.prompt();
      });
  });

  rl.on("close", () => {
    exit().catch((err: unknown) => logger.error("Erreur à la fermeture:", err));
  });

  return () => {
    rl.close();
  };
}
