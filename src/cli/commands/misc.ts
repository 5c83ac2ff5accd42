import { logger } from "../../logger";
import { isControl } from "../../gamepad/controls";
import { findCategory, loadHelpSpec, printHelp, type HelpFilter, type HelpSpec } from "../help";
import { buildHelpRuntimeContext, suggestFromSpec } from "../helpSupport";
import { clearConsole } from "../runtime";
import type { CliContext } from "../types";

/** `help`, `help search <texte>`, `help <catégorie>` ou `help <commande>`. */
export function helpFilterFor(spec: HelpSpec, arg: string): HelpFilter | undefined {
	if (!arg) return undefined;
	const search = /^search\s+(.+)$/i.exec(arg);
	if (search) return { kind: "search", value: search[1] };
	const cat = findCategory(spec, arg);
	return cat ? { kind: "category", value: cat.id } : { kind: "command", value: arg };
}

function withHelpSpec(run: (spec: HelpSpec) => void): void {
	let spec: HelpSpec;
	try {
		spec = loadHelpSpec();
	} catch (err) {
		logger.debug("help.yaml:", err);
		logger.warn("Aide indisponible (help.yaml introuvable ou invalide).");
		return;
	}
	run(spec);
}

export const miscHandlers = {
	help(rest: string[], ctx: CliContext) {
		withHelpSpec((spec) => printHelp(spec, buildHelpRuntimeContext(ctx), helpFilterFor(spec, rest.join(" ").trim())));
	},
	version(_rest: string[], _ctx: CliContext) {
		withHelpSpec((spec) => logger.info(`${spec.meta?.program ?? "padrouter"} ${spec.meta?.version ?? "0.0.0"}`));
	},
	clear(_rest: string[], _ctx: CliContext) {
		clearConsole();
	},
	unknown(rest: string[], _ctx: CliContext) {
		const cmd = rest[0] ?? "";
		if (!cmd) return;
		// Nom de contrôle tapé seul: proposer les commandes qui le prennent
		if (isControl(cmd)) {
			logger.warn(`'${cmd}' est un contrôle, pas une commande. Ex.: press ${cmd}, resolve ${cmd}`);
			return;
		}
		logger.warn(`Commande inconnue: ${cmd}. Tapez 'help'.`);
		withHelpSpec((spec) => {
			const s = suggestFromSpec(spec, cmd);
			if (s.length > 0) process.stdout.write(`Voulez-vous dire: ${s.join(", ")}\n`);
		});
	},
};
