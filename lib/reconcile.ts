import { auditLog, AuditAction, AuditOutcome } from "./audit.js";
import { createLogger } from "./logger.js";
import { applyTokens, findByRefreshToken, patchCredential } from "./pool.js";
import { generateCredentialId, type CredentialStore } from "./storage.js";

const log = createLogger("reconcile");

export interface ReconcileResult {
	/** Id the active credential carries after reconciliation. */
	activeId?: string;
	/** How the id was obtained when the active document had none. */
	assignedId?: "matched" | "minted";
	/** The pool entry sharing the active id was brought up to date. */
	synced: boolean;
	persisted: boolean;
}

/**
 * Startup reconciliation: give the active credential an id (reusing the pool
 * entry with the same refresh token when there is one) and push its current
 * tokens into the pool entry sharing that id.
 */
export async function reconcileOnStart(store: CredentialStore): Promise<ReconcileResult> {
	const active = await store.loadActive();
	if (!active) {
		return { synced: false, persisted: true };
	}

	let persisted = true;
	let assignedId: ReconcileResult["assignedId"];
	let activeId = active.id;
	if (!activeId) {
		const pool = await store.loadReserve();
		const matched = findByRefreshToken(pool, active.refreshToken);
		activeId = matched?.id ?? generateCredentialId(Date.now(), new Set(pool.map((credential) => credential.id)));
		assignedId = matched ? "matched" : "minted";
		persisted = await store.saveActive({ ...active, id: activeId });
		log.info("Assigned id to active credential", { id: activeId, source: assignedId });
	}

	const tokens = { accessToken: active.accessToken, refreshToken: active.refreshToken };
	const outcome = await patchCredential(store, activeId, (entry) => applyTokens(entry, tokens));
	const synced = outcome === "saved";
	persisted = persisted && outcome !== "failed";

	if (assignedId || synced) {
		auditLog(
			AuditAction.ACTIVE_RECONCILE,
			"startup",
			activeId,
			persisted ? AuditOutcome.SUCCESS : AuditOutcome.FAILURE,
			{ assignedId, synced },
		);
	}
	return { activeId, assignedId, synced, persisted };
}
