import { logger } from "../../logger";
import { isControl } from "../../gamepad/controls";
import { isSimulatedPreset, SIMULATED_PRESETS, SimulatedDevice } from "../../device/simulated";
import { parseNumber } from "../runtime";
import type { CliContext } from "../types";
import type { SessionState } from "../session";

/** Manette ciblée par les commandes: la dernière branchée, sinon la première. */
export function currentDevice(ctx: CliContext, session: SessionState): SimulatedDevice | undefined {
	const byId = session.lastDeviceId ? ctx.adapter.get(session.lastDeviceId) : undefined;
	return byId ?? ctx.adapter.devices()[0];
}

function withDevice(ctx: CliContext, session: SessionState, fn: (device: SimulatedDevice) => void): void {
	const device = currentDevice(ctx, session);
	if (!device) {
		logger.warn("Aucune manette branchée. Utilisez: attach <preset>");
		return;
	}
	fn(device);
}

export const deviceHandlers = {
	attach(rest: string[], ctx: CliContext, session: SessionState) {
		const preset = rest[0] || "";
		if (!isSimulatedPreset(preset)) {
			logger.warn(`Usage: attach <${SIMULATED_PRESETS.join("|")}> [vendor name]`);
			return;
		}
		const vendorName = rest.slice(1).join(" ");
		const device = new SimulatedDevice(preset, vendorName ? { vendorName } : {});
		ctx.adapter.attach(device);
		session.lastDeviceId = device.id;
		logger.info(`Manette simulée branchée: ${device.id}`);
	},
	detach(rest: string[], ctx: CliContext, session: SessionState) {
		const id = rest[0] || currentDevice(ctx, session)?.id;
		if (!id || !ctx.adapter.detach(id)) {
			logger.warn("Aucune manette à débrancher.");
			return;
		}
		if (session.lastDeviceId === id) session.lastDeviceId = null;
		logger.info(`Manette simulée débranchée: ${id}`);
	},
	press(rest: string[], ctx: CliContext, session: SessionState) {
		const control = rest[0] || "";
		const pressure = parseNumber(rest[1]) ?? 1;
		if (!isControl(control)) {
			logger.warn("Usage: press <control> [pressure]");
			return;
		}
		withDevice(ctx, session, (d) => {
			if (!d.button(control, true, pressure)) logger.warn(`${control}: pas de bouton sur ${d.id}`);
		});
	},
	release(rest: string[], ctx: CliContext, session: SessionState) {
		const control = rest[0] || "";
		if (!isControl(control)) {
			logger.warn("Usage: release <control>");
			return;
		}
		withDevice(ctx, session, (d) => {
			if (!d.button(control, false, 0)) logger.warn(`${control}: pas de bouton sur ${d.id}`);
		});
	},
	pull(rest: string[], ctx: CliContext, session: SessionState) {
		const control = rest[0] || "";
		const pressure = parseNumber(rest[1]);
		if (!isControl(control) || pressure === undefined) {
			logger.warn("Usage: pull <control> <pressure>");
			return;
		}
		withDevice(ctx, session, (d) => {
			if (!d.button(control, pressure > 0, pressure)) logger.warn(`${control}: pas de gâchette sur ${d.id}`);
		});
	},
	move(rest: string[], ctx: CliContext, session: SessionState) {
		const control = rest[0] || "";
		const x = parseNumber(rest[1]);
		const y = parseNumber(rest[2]);
		if (!isControl(control) || x === undefined || y === undefined) {
			logger.warn("Usage: move <control> <x> <y>");
			return;
		}
		withDevice(ctx, session, (d) => {
			if (!d.axis(control, x, y)) logger.warn(`${control}: pas d'axes sur ${d.id}`);
		});
	},
};
