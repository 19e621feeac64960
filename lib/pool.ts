import type { CredentialStore } from "./storage.js";
import type { Credential, CredentialStatus, TokenPair } from "./types.js";

/**
 * Status a reserve entry takes after a usage query.
 */
export function statusForRatio(ratio: number, warnThreshold: number): CredentialStatus {
	if (ratio < 0) return "invalid";
	return ratio >= warnThreshold ? "low-quota" : "active";
}

export function applyUsage(credential: Credential, ratio: number, warnThreshold: number): Credential {
	return {
		...credential,
		lastKnownRatio: ratio < 0 ? -1 : ratio,
		status: statusForRatio(ratio, warnThreshold),
	};
}

export function applyTokens(credential: Credential, tokens: TokenPair): Credential {
	return { ...credential, accessToken: tokens.accessToken, refreshToken: tokens.refreshToken };
}

export function findByRefreshToken(pool: readonly Credential[], refreshToken: string): Credential | undefined {
	if (!refreshToken) return undefined;
	return pool.find((credential) => credential.refreshToken === refreshToken);
}

export type PatchOutcome = "saved" | "missing" | "failed";

/**
 * Re-loads the pool, rewrites the entry with `id` and saves. The snapshot the
 * caller started from is never written back, so concurrent edits to other
 * entries survive.
 */
export async function patchCredential(
	store: CredentialStore,
	id: string,
	patch: (credential: Credential) => Credential,
): Promise<PatchOutcome> {
	const pool = await store.loadReserve();
	const index = pool.findIndex((credential) => credential.id === id);
	const current = pool[index];
	if (!current) return "missing";

	pool[index] = { ...patch(current), id: current.id };
	return (await store.saveReserve(pool)) ? "saved" : "failed";
}
