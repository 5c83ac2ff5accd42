import path from "path";
import type { CliContext } from "./types";
import type { HelpRuntimeContext, HelpSpec } from "./help";
import { levenshtein } from "./levenshtein";
import { getLogLevel } from "../logger";

/**
 * Calcule jusqu'à 3 suggestions de commandes proches d'une saisie inconnue.
 * Compare contre `id`, `name` et `aliases` de la spec.
 *
 * @param spec Spécification d'aide (catégories/commandes)
 * @param input Chaîne entrée par l'utilisateur (commande inconnue)
 * @returns Liste (≤3) de suggestions triées par similarité croissante
 */
export function suggestFromSpec(spec: HelpSpec, input: string): string[] {
	const all = spec.categories.flatMap((c) => c.commands);
	const keys = new Set<string>();
	for (const c of all) {
		keys.add(c.id);
		keys.add(c.name);
		(c.aliases || []).forEach((a) => keys.add(a));
	}

	const arr = Array.from(keys);
	const scored = arr.map((k) => ({ k, d: levenshtein(k.toLowerCase(), input.toLowerCase()) }));
	scored.sort((a, b) => a.d - b.d);
	const top = scored.filter((x) => x.d <= 2).slice(0, 3);
	return top.map((x) => x.k);
}

/**
 * Construit le contexte d'en‑tête pour le rendu de l'aide (cheatsheet):
 * chemin de config, manette liée, nombre de surfaces, niveau de log.
 */
export function buildHelpRuntimeContext(ctx: CliContext): HelpRuntimeContext {
	const configPath = ctx.configPath ? path.resolve(process.cwd(), ctx.configPath) : "-";
	const { registry } = ctx;
	const device = registry.isConnected() ? `${registry.vendorName()} (${registry.styleVariant()})` : "aucune";
	const surfaces = String(registry.surfaces().length);
	return { configPath, device, surfaces, logLevel: getLogLevel() };
}
