/**
 * Rotation Strategy Module
 *
 * Picks the reserve credential with the most headroom to take over the
 * active slot.
 */

import { QUOTA_LIMITS } from "./constants.js";
import type { Credential } from "./types.js";

/**
 * Ratio used for ranking. Never-queried entries count as 0. An entry whose
 * last query failed keeps its -1 and so ranks first; the admission check
 * decides whether it is usable.
 */
export function effectiveRatio(credential: Credential): number {
	return credential.lastKnownRatio ?? 0;
}

export function isFailoverEligible(
	credential: Credential,
	activeId: string | undefined,
	warnThreshold: number = QUOTA_LIMITS.WARN_THRESHOLD,
): boolean {
	if (activeId !== undefined && credential.id === activeId) return false;
	const ratio = credential.lastKnownRatio ?? 0;
	return ratio < warnThreshold;
}

/**
 * Selects the eligible reserve entry with the lowest ratio. Ties keep pool
 * order. Returns null when nothing is eligible.
 */
export function selectFailoverCandidate(
	pool: readonly Credential[],
	activeId: string | undefined,
	warnThreshold: number = QUOTA_LIMITS.WARN_THRESHOLD,
): Credential | null {
	let best: Credential | null = null;
	let bestScore = Number.POSITIVE_INFINITY;

	for (const credential of pool) {
		if (!isFailoverEligible(credential, activeId, warnThreshold)) continue;
		const score = effectiveRatio(credential);
		if (best === null || score < bestScore) {
			best = credential;
			bestScore = score;
		}
	}

	return best;
}
