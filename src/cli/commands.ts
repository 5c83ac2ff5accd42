import type { CliContext } from "./types";
import type { SessionState } from "./session";
import { deviceHandlers } from "./commands/device";
import { routingHandlers } from "./commands/routing";
import { miscHandlers } from "./commands/misc";

export type CommandHandler = (args: string[], ctx: CliContext, session: SessionState) => Promise<void> | void;

export interface CommandHandlers {
	[name: string]: CommandHandler;
}

export const handlers: CommandHandlers = {
	// Manette simulée
	attach: deviceHandlers.attach,
	detach: deviceHandlers.detach,
	press: deviceHandlers.press,
	release: deviceHandlers.release,
	pull: deviceHandlers.pull,
	move: deviceHandlers.move,
	// Routage
	surfaces: routingHandlers.surfaces,
	resolve: routingHandlers.resolve,
	mode: routingHandlers.mode,
	tick: routingHandlers.tick,
	controls: routingHandlers.controls,
	status: routingHandlers.status,
	fg: routingHandlers.fg,
	bg: routingHandlers.bg,
	// Divers
	help: miscHandlers.help,
	version: miscHandlers.version,
	clear: miscHandlers.clear,
};

export type CommandOutcome = "exit" | "continue";

/**
 * Exécute une ligne saisie. Les alias `-h/--help`, `-v/--version` et `quit` sont acceptés.
 */
export async function runCommand(line: string, ctx: CliContext, session: SessionState): Promise<CommandOutcome> {
	const [rawCmd = "", ...rest] = line.trim().split(/\s+/);
	const cmd = rawCmd === "-h" || rawCmd === "--help" ? "help" : (rawCmd === "-v" || rawCmd === "--version" ? "version" : rawCmd);
	if (cmd === "exit" || cmd === "quit") return "exit";
	if (cmd.length === 0) return "continue";
	const handler = Object.prototype.hasOwnProperty.call(handlers, cmd) ? handlers[cmd] : undefined;
	if (handler) await handler(rest, ctx, session);
	else miscHandlers.unknown([cmd], ctx);
	return "continue";
}
