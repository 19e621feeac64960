import { promises as fs } from "node:fs";
import { dirname } from "node:path";
import { auditLog, AuditAction, AuditOutcome } from "./audit.js";
import { createLogger, tokenSuffix } from "./logger.js";
import {
	ActiveDocumentSchema,
	CredentialStatusSchema,
	ReserveDocumentSchema,
	StoredCredentialSchema,
	type StoredCredential,
} from "./schemas.js";
import { createTempPath } from "./storage/paths.js";
import type { ActiveCredential, Credential, CredentialStatus } from "./types.js";

const log = createLogger("storage");

/**
 * Custom error class for storage operations with platform-aware hints.
 */
export class StorageError extends Error {
	readonly code: string;
	readonly path: string;
	readonly hint: string;

	constructor(message: string, code: string, path: string, hint: string, cause?: Error) {
		super(message, { cause });
		this.name = "StorageError";
		this.code = code;
		this.path = path;
		this.hint = hint;
	}
}

function errorCode(error: unknown): string {
	if (error instanceof Error && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return "UNKNOWN";
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Generate platform-aware troubleshooting hint based on error code.
 */
export function formatStorageErrorHint(error: unknown, path: string): string {
	const code = errorCode(error);
	const isWindows = process.platform === "win32";

	switch (code) {
		case "EACCES":
		case "EPERM":
			return isWindows
				? `Permission denied writing to ${path}. Check antivirus exclusions for this folder. Ensure you have write permissions.`
				: `Permission denied writing to ${path}. Check folder permissions.`;
		case "EBUSY":
			return `File is locked at ${path}. The file may be open in another program. Close any editors or processes accessing it.`;
		case "ENOSPC":
			return `Disk is full. Free up space and try again. Path: ${path}`;
		case "EEMPTY":
			return `File written but is empty. This may indicate a disk or filesystem issue. Path: ${path}`;
		default:
			return isWindows
				? `Failed to write to ${path}. Check folder permissions and ensure path contains no special characters.`
				: `Failed to write to ${path}. Check folder permissions and disk space.`;
	}
}

const WINDOWS_RENAME_RETRY_ATTEMPTS = 5;
const WINDOWS_RENAME_RETRY_BASE_DELAY_MS = 10;

function isWindowsLockError(error: unknown): boolean {
	const code = errorCode(error);
	return code === "EPERM" || code === "EBUSY";
}

async function renameWithWindowsRetry(sourcePath: string, destinationPath: string): Promise<void> {
	let lastError: unknown = null;

	for (let attempt = 0; attempt < WINDOWS_RENAME_RETRY_ATTEMPTS; attempt += 1) {
		try {
			await fs.rename(sourcePath, destinationPath);
			return;
		} catch (error) {
			if (process.platform === "win32" && isWindowsLockError(error)) {
				lastError = error;
				await new Promise((resolve) =>
					setTimeout(resolve, WINDOWS_RENAME_RETRY_BASE_DELAY_MS * 2 ** attempt),
				);
				continue;
			}
			throw error;
		}
	}

	if (lastError) {
		throw lastError;
	}
}

/**
 * Serializes `data` to a temporary file beside `path`, then renames it over
 * `path`. Readers see either the old document or the new one, never a partial
 * write. The temporary file is removed on any failure.
 *
 * @throws StorageError with platform-aware hints on failure
 */
export async function writeJsonAtomic(path: string, data: unknown): Promise<void> {
	const tempPath = createTempPath(path);

	try {
		await fs.mkdir(dirname(path), { recursive: true });
		const content = `${JSON.stringify(data, null, 2)}\n`;
		await fs.writeFile(tempPath, content, { encoding: "utf-8", mode: 0o600 });

		const stats = await fs.stat(tempPath);
		if (stats.size === 0) {
			throw Object.assign(new Error("File written but size is 0"), { code: "EEMPTY" });
		}

		await renameWithWindowsRetry(tempPath, path);
	} catch (error) {
		try {
			await fs.unlink(tempPath);
		} catch {
			// Temp file may never have been created.
		}

		const code = errorCode(error);
		throw new StorageError(
			`Failed to write ${path}: ${errorMessage(error)}`,
			code,
			path,
			formatStorageErrorHint(error, path),
			error instanceof Error ? error : undefined,
		);
	}
}

function stripUtf8Bom(content: string): string {
	return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

type ReadResult =
	| { type: "missing" }
	| { type: "corrupt"; error: string }
	| { type: "ok"; data: unknown };

async function readJsonDocument(path: string): Promise<ReadResult> {
	let content: string;
	try {
		content = await fs.readFile(path, "utf-8");
	} catch (error) {
		if (errorCode(error) === "ENOENT") {
			return { type: "missing" };
		}
		return { type: "corrupt", error: errorMessage(error) };
	}

	try {
		const data: unknown = JSON.parse(stripUtf8Bom(content));
		return { type: "ok", data };
	} catch (error) {
		return { type: "corrupt", error: errorMessage(error) };
	}
}

/**
 * Millisecond-clock identifier. `taken` holds ids already in use; the clock
 * value is bumped until it no longer collides.
 */
export function generateCredentialId(now: number = Date.now(), taken?: ReadonlySet<string>): string {
	let candidate = Math.trunc(now);
	while (taken?.has(String(candidate))) {
		candidate += 1;
	}
	return String(candidate);
}

function normalizeIdentifier(value: string | number | undefined): string | undefined {
	if (value === undefined) return undefined;
	const id = String(value).trim();
	return id.length > 0 ? id : undefined;
}

function normalizeStatus(value: string | undefined): CredentialStatus {
	const parsed = CredentialStatusSchema.safeParse(value);
	return parsed.success ? parsed.data : "active";
}

function normalizeRatio(value: number | null | undefined): number | undefined {
	if (typeof value !== "number" || !Number.isFinite(value)) return undefined;
	if (value === -1) return -1;
	return value >= 0 && value <= 1 ? value : undefined;
}

export interface NormalizedReserve {
	credentials: Credential[];
	/** Entries that had no id and were given one during normalization. */
	mintedIds: number;
}

/**
 * Normalizes a parsed reserve document (bare array or `{ tokens }`).
 * Entries that fail validation or carry no token at all are dropped.
 */
export function normalizeReserveDocument(data: unknown, now: number = Date.now()): NormalizedReserve {
	const parsed = ReserveDocumentSchema.safeParse(data);
	if (!parsed.success) {
		return { credentials: [], mintedIds: 0 };
	}

	const rawEntries = Array.isArray(parsed.data) ? parsed.data : parsed.data.tokens;
	const entries: StoredCredential[] = [];
	for (const raw of rawEntries) {
		const entry = StoredCredentialSchema.safeParse(raw);
		if (entry.success) entries.push(entry.data);
	}

	const taken = new Set<string>();
	for (const entry of entries) {
		const id = normalizeIdentifier(entry.id);
		if (id) taken.add(id);
	}

	const credentials: Credential[] = [];
	let mintedIds = 0;
	for (const entry of entries) {
		const accessToken = (entry.access_token ?? "").trim();
		const refreshToken = (entry.refresh_token ?? "").trim();
		if (!accessToken && !refreshToken) continue;

		let id = normalizeIdentifier(entry.id);
		if (!id) {
			id = generateCredentialId(now, taken);
			taken.add(id);
			mintedIds += 1;
		}

		const credential: Credential = {
			id,
			accessToken,
			refreshToken,
			status: normalizeStatus(entry.status),
		};
		const ratio = normalizeRatio(entry.ratio);
		if (ratio !== undefined) credential.lastKnownRatio = ratio;
		credentials.push(credential);
	}

	return { credentials, mintedIds };
}

export function serializeCredential(credential: Credential): StoredCredential {
	const stored: StoredCredential = {
		id: credential.id,
		refresh_token: credential.refreshToken,
		access_token: credential.accessToken,
		status: credential.status,
	};
	if (credential.lastKnownRatio !== undefined) {
		stored.ratio = credential.lastKnownRatio;
	}
	return stored;
}

/**
 * Parses the active document. Returns null when it holds neither token.
 */
export function parseActiveDocument(data: unknown): ActiveCredential | null {
	const parsed = ActiveDocumentSchema.safeParse(data);
	if (!parsed.success || Array.isArray(data)) return null;

	const accessToken = (parsed.data.access_token ?? "").trim();
	const refreshToken = (parsed.data.refresh_token ?? "").trim();
	if (!accessToken && !refreshToken) return null;

	const active: ActiveCredential = { accessToken, refreshToken };
	const id = normalizeIdentifier(parsed.data.id);
	if (id) active.id = id;
	return active;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export interface CredentialStorePaths {
	activePath: string;
	reservePath: string;
}

/**
 * Durable store for the active slot and the reserve pool.
 *
 * Reads fail soft: a missing or malformed document reads as absent/empty.
 * Writes fail loud: every save resolves to `false` when nothing was written.
 * Nothing is cached; every call goes back to disk.
 */
export class CredentialStore {
	readonly activePath: string;
	readonly reservePath: string;

	constructor(paths: CredentialStorePaths) {
		this.activePath = paths.activePath;
		this.reservePath = paths.reservePath;
	}

	async loadActive(): Promise<ActiveCredential | null> {
		const result = await readJsonDocument(this.activePath);
		if (result.type === "missing") return null;
		if (result.type === "corrupt") {
			log.warn("Active document unreadable, treating as absent", {
				path: this.activePath,
				error: result.error,
			});
			return null;
		}
		return parseActiveDocument(result.data);
	}

	/**
	 * Writes the credential's tokens and id into the active document, keeping
	 * every other key the upstream client stored there.
	 */
	async saveActive(credential: ActiveCredential): Promise<boolean> {
		const existing = await readJsonDocument(this.activePath);
		const document: Record<string, unknown> =
			existing.type === "ok" && isPlainObject(existing.data) ? { ...existing.data } : {};

		document.access_token = credential.accessToken;
		document.refresh_token = credential.refreshToken;
		if (credential.id) {
			document.id = credential.id;
		} else {
			delete document.id;
		}

		const ok = await this.write(this.activePath, document);
		if (ok) {
			log.debug("Saved active credential", {
				id: credential.id,
				refreshToken: tokenSuffix(credential.refreshToken),
			});
		}
		return ok;
	}

	/**
	 * Replaces the active document with `{}` so the upstream client sees no login.
	 */
	async clearActive(): Promise<boolean> {
		return this.write(this.activePath, {});
	}

	/**
	 * Loads the reserve pool. A missing document is created empty; entries
	 * without an id are given one and the repaired pool is written back.
	 */
	async loadReserve(): Promise<Credential[]> {
		const result = await readJsonDocument(this.reservePath);
		if (result.type === "missing") {
			await this.saveReserve([]);
			return [];
		}
		if (result.type === "corrupt") {
			log.warn("Reserve document unreadable, treating as empty", {
				path: this.reservePath,
				error: result.error,
			});
			return [];
		}

		const { credentials, mintedIds } = normalizeReserveDocument(result.data);
		if (mintedIds > 0) {
			log.info("Assigned ids to reserve entries that had none", { count: mintedIds });
			await this.saveReserve(credentials);
		}
		return credentials;
	}

	async saveReserve(credentials: Credential[]): Promise<boolean> {
		return this.write(this.reservePath, credentials.map(serializeCredential));
	}

	private async write(path: string, data: unknown): Promise<boolean> {
		try {
			await writeJsonAtomic(path, data);
			return true;
		} catch (error) {
			const storageError =
				error instanceof StorageError
					? error
					: new StorageError(errorMessage(error), errorCode(error), path, formatStorageErrorHint(error, path));
			log.error("Failed to save document", {
				path,
				code: storageError.code,
				message: storageError.message,
				hint: storageError.hint,
			});
			auditLog(AuditAction.STORE_WRITE_FAILURE, "store", path, AuditOutcome.FAILURE, {
				code: storageError.code,
			});
			return false;
		}
	}
}
