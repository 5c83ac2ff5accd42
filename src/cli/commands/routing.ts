import { logger } from "../../logger";
import { isControl } from "../../gamepad/controls";
import { buildHelpEntries } from "../../ui/help";
import { parseNumber } from "../runtime";
import type { CliContext } from "../types";

export const routingHandlers = {
	surfaces(_rest: string[], ctx: CliContext) {
		const ids = ctx.registry.surfaces();
		if (ids.length === 0) {
			logger.info("Aucune surface.");
			return;
		}
		ids.forEach((id, i) => {
			const handled = ctx.registry.subscription(id)?.handledControls() ?? [];
			logger.info(`[${i}] ${id}: ${handled.length > 0 ? handled.join(", ") : "—"}`);
		});
	},
	resolve(rest: string[], ctx: CliContext) {
		const control = rest[0] || "";
		if (!isControl(control)) {
			logger.warn("Usage: resolve <control>");
			return;
		}
		const r = ctx.registry.resolve(control);
		logger.info(`${control} → surface=${r.surfaceId ?? "—"} mode=${r.mode} usage=${r.usage || "—"}`);
	},
	mode(rest: string[], ctx: CliContext) {
		const [surfaceId, control, mode] = rest;
		if (!surfaceId || !control || !mode || !isControl(control)) {
			logger.warn("Usage: mode <surface> <control> <mode>");
			return;
		}
		if (ctx.registry.setMode(surfaceId, control, mode)) logger.info(`${surfaceId}/${control}: mode ${mode}`);
	},
	tick(rest: string[], ctx: CliContext) {
		const n = Math.max(1, Math.floor(parseNumber(rest[0]) ?? 1));
		let delivered = 0;
		for (let i = 0; i < n; i++) delivered += ctx.registry.tick();
		logger.info(`Polling: ${n} pas, ${delivered} livraison(s)`);
	},
	controls(_rest: string[], ctx: CliContext) {
		const entries = buildHelpEntries(ctx.registry);
		if (entries.length === 0) {
			logger.info("Aucune aide définie.");
			return;
		}
		for (const e of entries) logger.info(`${e.title} [${e.icon}]: ${e.usage}`);
	},
	status(_rest: string[], ctx: CliContext) {
		const r = ctx.registry;
		logger.info(
			`État: ${r.state} | ${r.vendorName()} (${r.styleVariant()}) | catégorie=${r.productCategory() || "—"} | ` +
				`batterie=${r.batteryLevel()}${r.isCharging() ? " (en charge)" : ""} | haptique=${r.supportsHaptics() ? "oui" : "non"}`
		);
		logger.info(`Premier plan: ${r.isForeground ? "oui" : "non"} | polling: ${r.isPolling ? "actif" : "arrêté"}`);
	},
	fg(_rest: string[], ctx: CliContext) {
		ctx.registry.appForegrounded();
	},
	bg(_rest: string[], ctx: CliContext) {
		ctx.registry.appEnteringBackground();
		ctx.registry.appBackgrounded();
	},
};
