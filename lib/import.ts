import { auditLog, AuditAction, AuditOutcome } from "./audit.js";
import { createLogger } from "./logger.js";
import { generateCredentialId, type CredentialStore } from "./storage.js";
import type { Credential, TokenPair } from "./types.js";

const log = createLogger("import");

export const IMPORT_FIELD_SEPARATOR = "----";

/**
 * Parses `refreshToken----accessToken[----anything]` lines. Blank lines,
 * lines with a single field and lines with an empty refresh token are dropped.
 */
export function parseImportLines(text: string): TokenPair[] {
	const pairs: TokenPair[] = [];
	for (const rawLine of text.split(/\r?\n/)) {
		const line = rawLine.trim();
		if (!line) continue;

		const [refreshPart, accessPart] = line.split(IMPORT_FIELD_SEPARATOR);
		if (refreshPart === undefined || accessPart === undefined) continue;

		const refreshToken = refreshPart.trim();
		if (!refreshToken) continue;
		pairs.push({ refreshToken, accessToken: accessPart.trim() });
	}
	return pairs;
}

export interface ImportResult {
	added: number;
	skipped: number;
	/** Ids minted for the added entries, in input order. */
	ids: string[];
	persisted: boolean;
}

/**
 * Adds every pair whose refresh token is not in the pool yet. The batch goes
 * to the front of the pool in input order; repeats inside the batch count as
 * skipped.
 */
export async function importCredentials(
	store: CredentialStore,
	pairs: readonly TokenPair[],
	now: number = Date.now(),
): Promise<ImportResult> {
	const pool = await store.loadReserve();
	const knownRefreshTokens = new Set(pool.map((credential) => credential.refreshToken).filter(Boolean));
	const takenIds = new Set(pool.map((credential) => credential.id));

	const batch: Credential[] = [];
	let skipped = 0;
	for (const pair of pairs) {
		if (knownRefreshTokens.has(pair.refreshToken)) {
			skipped += 1;
			continue;
		}
		const id = generateCredentialId(now + batch.length, takenIds);
		takenIds.add(id);
		knownRefreshTokens.add(pair.refreshToken);
		batch.push({ id, ...pair, status: "active" });
	}

	if (batch.length === 0) {
		return { added: 0, skipped, ids: [], persisted: true };
	}

	const persisted = await store.saveReserve([...batch, ...pool]);
	const ids = batch.map((credential) => credential.id);
	log.info("Imported credentials", { added: batch.length, skipped, persisted });
	auditLog(
		AuditAction.CREDENTIAL_IMPORT,
		"user",
		"reserve",
		persisted ? AuditOutcome.SUCCESS : AuditOutcome.FAILURE,
		{ added: batch.length, skipped, ids },
	);
	return { added: persisted ? batch.length : 0, skipped, ids: persisted ? ids : [], persisted };
}
