import { auditLog, AuditAction, AuditOutcome } from "./audit.js";
import { QUOTA_LIMITS } from "./constants.js";
import { createLogger, tokenSuffix } from "./logger.js";
import { applyTokens, applyUsage, patchCredential, statusForRatio } from "./pool.js";
import type { CredentialStore } from "./storage.js";
import type {
	ActiveCredential,
	Credential,
	CredentialStatus,
	RemoteCallOptions,
	TokenPair,
	UsageInfo,
	UsageOracle,
} from "./types.js";

const log = createLogger("checks");

export type ActiveCheckResult =
	| { type: "no-active" }
	| {
			type: "checked";
			id?: string;
			ratio: number;
			info?: UsageInfo;
			refreshed: boolean;
			/** False when refreshed tokens could not be written back. */
			persisted: boolean;
	  }
	| { type: "failed"; id?: string; refreshed: boolean; persisted: boolean };

/**
 * Writes refreshed tokens into the active document, unless something else
 * replaced the active credential while the query was running.
 */
async function persistActiveRefresh(
	store: CredentialStore,
	queried: ActiveCredential,
	refreshed: TokenPair,
): Promise<boolean> {
	const current = await store.loadActive();
	const unchanged =
		current !== null &&
		current.refreshToken === queried.refreshToken &&
		current.id === queried.id;
	if (!unchanged) {
		log.warn("Active credential changed during the check, keeping the newer document", {
			queried: tokenSuffix(queried.refreshToken),
			current: tokenSuffix(current?.refreshToken),
		});
		return true;
	}

	const saved = await store.saveActive({ ...refreshed, id: queried.id });
	if (saved && queried.id) {
		// Keep the pool shadow (if any) on the same tokens.
		const shadow = await patchCredential(store, queried.id, (entry) => applyTokens(entry, refreshed));
		if (shadow === "failed") return false;
	}
	auditLog(
		AuditAction.CREDENTIAL_REFRESH,
		"monitor",
		queried.id ?? "active",
		saved ? AuditOutcome.SUCCESS : AuditOutcome.FAILURE,
	);
	return saved;
}

/**
 * Queries the active credential and persists any refreshed tokens. Never
 * fails over; the caller decides what an exhausted ratio means.
 */
export async function checkActiveUsage(
	store: CredentialStore,
	oracle: UsageOracle,
	options: RemoteCallOptions = {},
): Promise<ActiveCheckResult> {
	const active = await store.loadActive();
	if (!active) {
		return { type: "no-active" };
	}

	const usage = await oracle.queryUsage(active, options);
	let persisted = true;
	if (usage.refreshedTokens) {
		persisted = await persistActiveRefresh(store, active, usage.refreshedTokens);
	}

	const refreshed = usage.refreshedTokens !== undefined;
	if (usage.ratio < 0) {
		return { type: "failed", id: active.id, refreshed, persisted };
	}
	return { type: "checked", id: active.id, ratio: usage.ratio, info: usage.info, refreshed, persisted };
}

export interface ReserveCheckRow {
	id: string;
	ratio: number;
	info?: UsageInfo;
	status: CredentialStatus;
	refreshed: boolean;
	persisted: boolean;
}

export interface CheckReserveOptions extends RemoteCallOptions {
	/** Only these ids. Unknown ids are ignored. Omit to check every entry. */
	ids?: readonly string[];
	/** Active id; its pool shadow is skipped when checking everything. */
	activeId?: string;
	warnThreshold?: number;
}

/**
 * Queries reserve entries one after another. Each entry's refreshed tokens
 * and then its ratio/status are written before the next entry is queried.
 */
export async function checkReserve(
	store: CredentialStore,
	oracle: UsageOracle,
	options: CheckReserveOptions = {},
): Promise<ReserveCheckRow[]> {
	const warnThreshold = options.warnThreshold ?? QUOTA_LIMITS.WARN_THRESHOLD;
	const pool = await store.loadReserve();
	const wanted = options.ids ? new Set(options.ids) : null;
	const targets: Credential[] = wanted
		? pool.filter((credential) => wanted.has(credential.id))
		: pool.filter((credential) => credential.id !== options.activeId);

	const rows: ReserveCheckRow[] = [];
	for (const target of targets) {
		const usage = await oracle.queryUsage(target, { timeoutMs: options.timeoutMs });

		let persisted = true;
		if (usage.refreshedTokens) {
			const tokens = usage.refreshedTokens;
			persisted = (await patchCredential(store, target.id, (entry) => applyTokens(entry, tokens))) !== "failed";
		}
		const saved = await patchCredential(store, target.id, (entry) => applyUsage(entry, usage.ratio, warnThreshold));
		persisted = persisted && saved !== "failed";

		const row: ReserveCheckRow = {
			id: target.id,
			ratio: usage.ratio < 0 ? -1 : usage.ratio,
			status: statusForRatio(usage.ratio, warnThreshold),
			refreshed: usage.refreshedTokens !== undefined,
			persisted,
		};
		if (usage.info) row.info = usage.info;
		rows.push(row);

		auditLog(
			AuditAction.CREDENTIAL_CHECK,
			"user",
			target.id,
			usage.ratio < 0 ? AuditOutcome.FAILURE : AuditOutcome.SUCCESS,
			{ ratio: row.ratio, refreshed: row.refreshed },
		);
	}
	return rows;
}

export type DeleteResult = { type: "deleted"; removed: number } | { type: "persist-failed" };

export async function deleteCredentials(store: CredentialStore, ids: readonly string[]): Promise<DeleteResult> {
	const doomed = new Set(ids);
	const pool = await store.loadReserve();
	const kept = pool.filter((credential) => !doomed.has(credential.id));
	const removed = pool.length - kept.length;
	if (removed === 0) {
		return { type: "deleted", removed: 0 };
	}

	if (!(await store.saveReserve(kept))) {
		return { type: "persist-failed" };
	}
	for (const id of ids) {
		if (pool.some((credential) => credential.id === id)) {
			auditLog(AuditAction.CREDENTIAL_REMOVE, "user", id, AuditOutcome.SUCCESS);
		}
	}
	return { type: "deleted", removed };
}

/**
 * Writes the active credential's tokens (and its ratio, when known) into the
 * pool entry sharing its id, inserting one at the front when there is none.
 * An active credential without an id is left alone.
 */
export async function syncActiveToReserve(
	store: CredentialStore,
	active: ActiveCredential,
	ratio?: number,
	warnThreshold: number = QUOTA_LIMITS.WARN_THRESHOLD,
): Promise<boolean> {
	const id = active.id;
	if (!id) return true;

	const tokens: TokenPair = { accessToken: active.accessToken, refreshToken: active.refreshToken };
	const pool = await store.loadReserve();
	const index = pool.findIndex((credential) => credential.id === id);
	const existing = pool[index];
	let entry: Credential = existing ? applyTokens(existing, tokens) : { id, ...tokens, status: "active" };
	// A failed final query does not overwrite what the pool already knows.
	if (ratio !== undefined && ratio >= 0) {
		entry = applyUsage(entry, ratio, warnThreshold);
	}

	if (existing) {
		pool[index] = entry;
	} else {
		pool.unshift(entry);
	}
	return store.saveReserve(pool);
}
