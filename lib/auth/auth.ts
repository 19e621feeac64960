import { createLogger, tokenSuffix } from "../logger.js";
import { safeParseOAuthTokenResponse } from "../schemas.js";
import type { TokenResult } from "../types.js";
import { DEFAULT_CLIENT_ID, DEFAULT_REFRESH_URL, TIMING } from "../constants.js";

const log = createLogger("auth");

export interface RefreshEndpoint {
	tokenUrl: string;
	clientId: string;
	timeoutMs: number;
}

export const DEFAULT_REFRESH_ENDPOINT: RefreshEndpoint = {
	tokenUrl: DEFAULT_REFRESH_URL,
	clientId: DEFAULT_CLIENT_ID,
	timeoutMs: TIMING.REQUEST_TIMEOUT_MS,
};

function isAbortError(error: unknown): boolean {
	return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

/**
 * Exchange a refresh token for a new access token (form-encoded
 * `grant_type=refresh_token`). A response without a new refresh token keeps
 * the one that was sent.
 */
export async function refreshAccessToken(
	refreshToken: string,
	endpoint: RefreshEndpoint = DEFAULT_REFRESH_ENDPOINT,
): Promise<TokenResult> {
	const controller = new AbortController();
	const timeout = setTimeout(() => {
		controller.abort();
	}, endpoint.timeoutMs);

	try {
		const response = await fetch(endpoint.tokenUrl, {
			method: "POST",
			headers: { "Content-Type": "application/x-www-form-urlencoded" },
			body: new URLSearchParams({
				grant_type: "refresh_token",
				refresh_token: refreshToken,
				client_id: endpoint.clientId,
			}),
			signal: controller.signal,
		});

		if (!response.ok) {
			const text = await response.text().catch(() => "");
			log.warn("Token refresh rejected", {
				status: response.status,
				refreshToken: tokenSuffix(refreshToken),
			});
			return { type: "failed", reason: "http_error", statusCode: response.status, message: text || undefined };
		}

		const rawJson: unknown = await response.json().catch(() => undefined);
		const json = safeParseOAuthTokenResponse(rawJson);
		if (!json) {
			log.warn("Token refresh response validation failed");
			return { type: "failed", reason: "invalid_response", message: "Response failed schema validation" };
		}

		const access = (json.access_token ?? "").trim();
		if (!access) {
			return { type: "failed", reason: "missing_access", message: "No access token in response" };
		}

		const nextRefresh = (json.refresh_token ?? "").trim() || refreshToken;
		return { type: "success", access, refresh: nextRefresh };
	} catch (error) {
		if (isAbortError(error)) {
			log.warn("Token refresh timed out", { timeoutMs: endpoint.timeoutMs });
			return { type: "failed", reason: "timeout", message: `Timed out after ${endpoint.timeoutMs}ms` };
		}
		const message = error instanceof Error ? error.message : String(error);
		log.warn("Token refresh error", { message });
		return { type: "failed", reason: "network_error", message };
	} finally {
		clearTimeout(timeout);
	}
}
