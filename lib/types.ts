/**
 * Shared domain types for the credential pool.
 */

/**
 * Status recorded on a reserve entry by the last usage check.
 * - active: usable, last ratio below the warn threshold (or never checked)
 * - low-quota: last ratio at or above the warn threshold
 * - invalid: the last query failed even after a refresh
 */
export type CredentialStatus = "active" | "low-quota" | "invalid";

export interface TokenPair {
	accessToken: string;
	refreshToken: string;
}

/**
 * Credential held in the reserve pool.
 *
 * `lastKnownRatio` is `undefined` when never queried and `-1` when the last
 * query failed; otherwise it is the used fraction in [0, 1].
 */
export interface Credential extends TokenPair {
	id: string;
	status: CredentialStatus;
	lastKnownRatio?: number;
}

/**
 * Contents of the active slot. The upstream client may write it without an id.
 */
export interface ActiveCredential extends TokenPair {
	id?: string;
}

export interface UsageInfo {
	total: number;
	used: number;
	remaining: number;
}

export interface UsageQueryResult {
	/** Used fraction in [0, 1], or -1 when the query failed. */
	ratio: number;
	info?: UsageInfo;
	/** Present whenever a refresh succeeded, even if the retried query did not. */
	refreshedTokens?: TokenPair;
}

export type TokenFailureReason =
	| "http_error"
	| "invalid_response"
	| "network_error"
	| "timeout"
	| "missing_access";

export type TokenResult =
	| { type: "success"; access: string; refresh: string }
	| { type: "failed"; reason: TokenFailureReason; statusCode?: number; message?: string };

export interface RemoteCallOptions {
	timeoutMs?: number;
}

/**
 * Anything that can answer "how much quota does this credential have left".
 */
export interface UsageOracle {
	queryUsage(tokens: TokenPair, options?: RemoteCallOptions): Promise<UsageQueryResult>;
}

export interface LogWatchConfig {
	enabled: boolean;
	logDir: string;
	fileSuffix: string;
	pattern: string;
	pollIntervalMs: number;
}

/**
 * Resolved runtime configuration. Every component takes what it needs from here.
 */
export interface PoolConfig {
	activePath: string;
	reservePath: string;
	refreshUrl: string;
	usageUrl: string;
	clientId: string;
	warnThreshold: number;
	exhaustedWarningThreshold: number;
	checkIntervalMs: number;
	requestTimeoutMs: number;
	shutdownTimeoutMs: number;
	auditEnabled: boolean;
	auditLogDir: string;
	logWatch: LogWatchConfig;
}
