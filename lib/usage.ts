import { createLogger, tokenSuffix } from "./logger.js";
import type { RefreshQueue } from "./refresh-queue.js";
import { safeParseUsageResponse } from "./schemas.js";
import type {
	RemoteCallOptions,
	TokenPair,
	UsageInfo,
	UsageOracle,
	UsageQueryResult,
} from "./types.js";

const log = createLogger("usage");

export interface UsageEndpoint {
	usageUrl: string;
	timeoutMs: number;
}

export interface UsageSnapshot {
	ratio: number;
	info: UsageInfo;
}

/**
 * Used fraction of the allowance, clamped to [0, 1]. An allowance of 0 reads as 0.
 */
export function computeUsageRatio(total: number, used: number): number {
	if (total <= 0) return 0;
	return Math.min(1, Math.max(0, used / total));
}

/**
 * One bearer-authenticated usage query. Returns null on any failure:
 * transport error, timeout, non-2xx status, or a body without `usage`.
 */
export async function fetchUsage(accessToken: string, endpoint: UsageEndpoint): Promise<UsageSnapshot | null> {
	const controller = new AbortController();
	const timeout = setTimeout(() => {
		controller.abort();
	}, endpoint.timeoutMs);

	try {
		const response = await fetch(endpoint.usageUrl, {
			method: "GET",
			headers: {
				Authorization: `Bearer ${accessToken}`,
				Accept: "application/json",
			},
			signal: controller.signal,
		});
		if (!response.ok) {
			log.debug("Usage query rejected", { status: response.status, accessToken: tokenSuffix(accessToken) });
			return null;
		}

		const raw: unknown = await response.json().catch(() => undefined);
		const body = safeParseUsageResponse(raw);
		if (!body) {
			log.debug("Usage response missing usage block");
			return null;
		}

		const standard = body.usage.standard ?? {};
		const total = standard.totalAllowance ?? 0;
		const used = standard.orgTotalTokensUsed ?? 0;
		return {
			ratio: computeUsageRatio(total, used),
			info: { total, used, remaining: total - used },
		};
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		log.debug("Usage query failed", { message });
		return null;
	} finally {
		clearTimeout(timeout);
	}
}

export type UsageFetcher = (accessToken: string, endpoint: UsageEndpoint) => Promise<UsageSnapshot | null>;

export interface UsageOracleOptions {
	usageUrl: string;
	timeoutMs: number;
	refreshQueue: RefreshQueue;
	fetcher?: UsageFetcher;
}

/**
 * Query → refresh → retry once.
 *
 * A successful refresh is reported through `refreshedTokens` even when the
 * retried query fails; the caller owns persisting it.
 */
export class RemoteUsageOracle implements UsageOracle {
	private readonly usageUrl: string;
	private readonly timeoutMs: number;
	private readonly refreshQueue: RefreshQueue;
	private readonly fetcher: UsageFetcher;

	constructor(options: UsageOracleOptions) {
		this.usageUrl = options.usageUrl;
		this.timeoutMs = options.timeoutMs;
		this.refreshQueue = options.refreshQueue;
		this.fetcher = options.fetcher ?? fetchUsage;
	}

	async queryUsage(tokens: TokenPair, options: RemoteCallOptions = {}): Promise<UsageQueryResult> {
		const endpoint: UsageEndpoint = {
			usageUrl: this.usageUrl,
			timeoutMs: options.timeoutMs ?? this.timeoutMs,
		};

		if (tokens.accessToken) {
			const first = await this.fetcher(tokens.accessToken, endpoint);
			if (first) {
				return { ratio: first.ratio, info: first.info };
			}
		}

		if (!tokens.refreshToken) {
			return { ratio: -1 };
		}

		const refreshed = await this.refreshQueue.refresh(tokens.refreshToken);
		if (refreshed.type === "failed") {
			return { ratio: -1 };
		}

		const refreshedTokens: TokenPair = {
			accessToken: refreshed.access,
			refreshToken: refreshed.refresh,
		};
		const retry = await this.fetcher(refreshed.access, endpoint);
		if (!retry) {
			log.warn("Usage query failed after refresh", {
				refreshToken: tokenSuffix(refreshed.refresh),
			});
			return { ratio: -1, refreshedTokens };
		}
		return { ratio: retry.ratio, info: retry.info, refreshedTokens };
	}
}
