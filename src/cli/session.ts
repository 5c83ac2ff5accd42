export interface SessionState {
	/** Dernière manette branchée depuis la CLI */
	lastDeviceId: string | null;
}

export function createInitialSession(): SessionState {
	return { lastDeviceId: null };
}
