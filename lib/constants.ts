/** Name used in log prefixes and the default config directory. */
export const PACKAGE_NAME = "credential-reserve";

export const CONFIG_DIR_NAME = ".credential-reserve";
export const CONFIG_FILE_NAME = "config.json";
export const RESERVE_FILE_NAME = "tokens.json";

/** Upstream client's own credential document, relative to the home directory. */
export const ACTIVE_DOCUMENT_RELATIVE_PATH = [".factory", "auth.json"] as const;
export const UPSTREAM_LOG_RELATIVE_DIR = [".factory", "logs"] as const;

export const DEFAULT_REFRESH_URL = "https://api.workos.com/user_management/authenticate";
export const DEFAULT_USAGE_URL = "https://app.factory.ai/api/organization/members/chat-usage";
export const DEFAULT_CLIENT_ID = "client_01HNM792M5G5G1A2THWPXKFMXB";
export const BILLING_URL = "https://app.factory.ai/settings/billing";

export const DEFAULT_PAYMENT_ERROR_PATTERN =
	"Ready for more\\? Reload your tokens.*?https://app\\.factory\\.ai/settings/billing";

export const QUOTA_LIMITS = {
	/** Reserve entries at or above this ratio are not failover candidates. */
	WARN_THRESHOLD: 0.9,
	/** A user-initiated active check at or above this ratio raises a warning. */
	EXHAUSTED_WARNING_THRESHOLD: 0.99,
	/** A fresh ratio at or above this blocks promotion. */
	PROMOTION_CEILING: 1.0,
} as const;

export const TIMING = {
	CHECK_INTERVAL_MS: 90_000,
	REQUEST_TIMEOUT_MS: 30_000,
	SHUTDOWN_TIMEOUT_MS: 5_000,
	LOG_POLL_INTERVAL_MS: 1_000,
} as const;
