/**
 * Zod schemas for runtime validation.
 * These describe everything read from disk or from the network.
 */
import { z } from "zod";

// ============================================================================
// Config File Schema
// ============================================================================

export function isValidRegExp(source: string): boolean {
	try {
		new RegExp(source);
		return true;
	} catch {
		return false;
	}
}

export const LogWatchConfigSchema = z.object({
	enabled: z.boolean().optional(),
	logDir: z.string().min(1).optional(),
	fileSuffix: z.string().optional(),
	pattern: z.string().min(1).refine(isValidRegExp, { message: "Invalid regular expression" }).optional(),
	pollIntervalMs: z.number().min(100).optional(),
});

export const PoolConfigFileSchema = z.object({
	activePath: z.string().min(1).optional(),
	reservePath: z.string().min(1).optional(),
	refreshUrl: z.string().url().optional(),
	usageUrl: z.string().url().optional(),
	clientId: z.string().min(1).optional(),
	warnThreshold: z.number().gt(0).max(1).optional(),
	exhaustedWarningThreshold: z.number().gt(0).max(1).optional(),
	checkIntervalMs: z.number().min(1_000).optional(),
	requestTimeoutMs: z.number().min(500).optional(),
	shutdownTimeoutMs: z.number().min(500).optional(),
	auditEnabled: z.boolean().optional(),
	auditLogDir: z.string().min(1).optional(),
	logWatch: LogWatchConfigSchema.optional(),
});

export type PoolConfigFile = z.infer<typeof PoolConfigFileSchema>;

// ============================================================================
// Credential Document Schemas
// ============================================================================

export const CredentialStatusSchema = z.enum(["active", "low-quota", "invalid"]);

const IdentifierSchema = z.union([z.string(), z.number()]);

/**
 * One reserve pool entry as written on disk. Field names match the upstream
 * client's own auth document so entries can be copied between the two.
 */
export const StoredCredentialSchema = z
	.object({
		id: IdentifierSchema.optional(),
		access_token: z.string().optional(),
		refresh_token: z.string().optional(),
		status: z.string().optional(),
		ratio: z.number().nullable().optional(),
	})
	.passthrough();

export type StoredCredential = z.infer<typeof StoredCredentialSchema>;

/**
 * The reserve document is either a bare array or `{ tokens: [...] }`.
 */
export const ReserveDocumentSchema = z.union([
	z.array(z.unknown()),
	z.object({ tokens: z.array(z.unknown()) }).passthrough(),
]);

/**
 * Active document. Keys this package does not own are kept as-is on write.
 */
export const ActiveDocumentSchema = z
	.object({
		id: IdentifierSchema.optional(),
		access_token: z.string().optional(),
		refresh_token: z.string().optional(),
	})
	.passthrough();

export type ActiveDocument = z.infer<typeof ActiveDocumentSchema>;

// ============================================================================
// Remote Response Schemas
// ============================================================================

export const OAuthTokenResponseSchema = z
	.object({
		access_token: z.string().optional(),
		refresh_token: z.string().optional(),
	})
	.passthrough();

export type OAuthTokenResponse = z.infer<typeof OAuthTokenResponseSchema>;

export const UsageResponseSchema = z
	.object({
		usage: z
			.object({
				standard: z
					.object({
						totalAllowance: z.number().optional(),
						orgTotalTokensUsed: z.number().optional(),
					})
					.passthrough()
					.optional(),
			})
			.passthrough(),
	})
	.passthrough();

export type UsageResponse = z.infer<typeof UsageResponseSchema>;

// ============================================================================
// Helper Functions
// ============================================================================

export function safeParseOAuthTokenResponse(data: unknown): OAuthTokenResponse | null {
	const result = OAuthTokenResponseSchema.safeParse(data);
	return result.success ? result.data : null;
}

export function safeParseUsageResponse(data: unknown): UsageResponse | null {
	const result = UsageResponseSchema.safeParse(data);
	return result.success ? result.data : null;
}

/**
 * Get validation errors as a flat array of strings.
 * Useful for logging and error messages.
 */
export function getValidationErrors(schema: z.ZodTypeAny, data: unknown): string[] {
	const result = schema.safeParse(data);
	if (result.success) {
		return [];
	}
	return result.error.issues.map((issue) => {
		const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
		return `${path}${issue.message}`;
	});
}
