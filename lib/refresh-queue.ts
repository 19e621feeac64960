/**
 * Refresh Queue Module
 *
 * Concurrent workers (a reserve check, a switch admission check, the active
 * poller) can ask to refresh the same credential at once. Refresh tokens are
 * single-use upstream, so a second parallel refresh would invalidate the
 * first. Subsequent callers await the in-flight refresh instead.
 */

import { refreshAccessToken, type RefreshEndpoint } from "./auth/auth.js";
import type { TokenResult } from "./types.js";
import { createLogger, tokenSuffix } from "./logger.js";

const log = createLogger("refresh-queue");

export type Refresher = (refreshToken: string) => Promise<TokenResult>;

interface RefreshEntry {
	promise: Promise<TokenResult>;
	startedAt: number;
}

interface RotationEntry {
	result: TokenResult;
	settledAt: number;
}

export interface RefreshQueueMetrics {
	started: number;
	deduplicated: number;
	rotationReused: number;
	succeeded: number;
	failed: number;
	rotated: number;
	staleEvictions: number;
	lastFailureReason: string | null;
	pending: number;
}

function createInitialMetrics(): RefreshQueueMetrics {
	return {
		started: 0,
		deduplicated: 0,
		rotationReused: 0,
		succeeded: 0,
		failed: 0,
		rotated: 0,
		staleEvictions: 0,
		lastFailureReason: null,
		pending: 0,
	};
}

/**
 * Deduplicates refreshes per refresh token.
 *
 * When the provider rotates the refresh token, the result is kept under the
 * new token for `maxEntryAgeMs`, so a caller that already holds the new token
 * reuses it instead of spending that token on a second refresh.
 *
 * @example
 * ```typescript
 * const queue = new RefreshQueue((rt) => refreshAccessToken(rt, endpoint));
 * const [a, b] = await Promise.all([queue.refresh(rt), queue.refresh(rt)]);
 * // one remote call, a === b
 * ```
 */
export class RefreshQueue {
	private pending: Map<string, RefreshEntry> = new Map();
	private rotations: Map<string, RotationEntry> = new Map();
	private metrics: RefreshQueueMetrics = createInitialMetrics();
	private readonly refresher: Refresher;
	private readonly maxEntryAgeMs: number;

	/**
	 * @param maxEntryAgeMs - Entries older than this are evicted so a stuck call cannot block refreshes forever.
	 *   Also how long a rotated token keeps pointing at the refresh that issued it.
	 */
	constructor(refresher: Refresher, maxEntryAgeMs: number = 30_000) {
		this.refresher = refresher;
		this.maxEntryAgeMs = maxEntryAgeMs;
	}

	async refresh(refreshToken: string): Promise<TokenResult> {
		this.cleanup();

		const existing = this.pending.get(refreshToken);
		if (existing) {
			this.metrics.deduplicated += 1;
			log.debug("Reusing in-flight refresh", {
				refreshToken: tokenSuffix(refreshToken),
				waitingMs: Date.now() - existing.startedAt,
			});
			return existing.promise;
		}

		const rotation = this.rotations.get(refreshToken);
		if (rotation) {
			this.metrics.rotationReused += 1;
			log.debug("Reusing refresh that issued this token", { refreshToken: tokenSuffix(refreshToken) });
			return rotation.result;
		}

		this.metrics.started += 1;
		const promise = this.executeRefresh(refreshToken);
		this.pending.set(refreshToken, { promise, startedAt: Date.now() });
		this.metrics.pending = this.pending.size;

		try {
			return await promise;
		} finally {
			this.pending.delete(refreshToken);
			this.metrics.pending = this.pending.size;
		}
	}

	private async executeRefresh(refreshToken: string): Promise<TokenResult> {
		let result: TokenResult;
		try {
			result = await this.refresher(refreshToken);
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			log.error("Token refresh threw", { refreshToken: tokenSuffix(refreshToken), error: message });
			result = { type: "failed", reason: "network_error", message };
		}

		if (result.type === "success") {
			this.metrics.succeeded += 1;
			this.metrics.lastFailureReason = null;
			if (result.refresh !== refreshToken) {
				this.rotations.set(result.refresh, { result, settledAt: Date.now() });
				this.metrics.rotated += 1;
			}
			log.info("Token refresh succeeded", { refreshToken: tokenSuffix(refreshToken) });
		} else {
			this.metrics.failed += 1;
			this.metrics.lastFailureReason = result.reason;
			log.warn("Token refresh failed", {
				refreshToken: tokenSuffix(refreshToken),
				reason: result.reason,
			});
		}
		return result;
	}

	private cleanup(): void {
		const now = Date.now();
		for (const [token, entry] of this.pending.entries()) {
			if (now - entry.startedAt > this.maxEntryAgeMs) {
				this.metrics.staleEvictions += 1;
				log.warn("Removing stale refresh entry", {
					refreshToken: tokenSuffix(token),
					ageMs: now - entry.startedAt,
				});
				this.pending.delete(token);
			}
		}
		for (const [token, entry] of this.rotations.entries()) {
			if (now - entry.settledAt > this.maxEntryAgeMs) {
				this.rotations.delete(token);
			}
		}
		this.metrics.pending = this.pending.size;
	}

	isRefreshing(refreshToken: string): boolean {
		return this.pending.has(refreshToken);
	}

	get pendingCount(): number {
		return this.pending.size;
	}

	clear(): void {
		this.pending.clear();
		this.rotations.clear();
		this.metrics = createInitialMetrics();
	}

	getMetricsSnapshot(): RefreshQueueMetrics {
		return {
			...this.metrics,
			pending: this.pending.size,
		};
	}
}

/**
 * Queue backed by the real refresh endpoint.
 */
export function createRefreshQueue(endpoint: RefreshEndpoint): RefreshQueue {
	return new RefreshQueue(
		(refreshToken) => refreshAccessToken(refreshToken, endpoint),
		// Anything older than one request timeout is stuck, not in flight.
		endpoint.timeoutMs + 1_000,
	);
}
