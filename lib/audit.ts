import { mkdirSync, existsSync, statSync, renameSync, readdirSync, unlinkSync, appendFileSync } from "node:fs";
import { join } from "node:path";
import { getCorrelationId } from "./logger.js";
import { getDefaultAuditLogDir } from "./storage/paths.js";

// In-memory queue so concurrent writers append whole lines in order
const logQueue: string[] = [];
let isFlushing = false;

function flushLogQueue(logPath: string): void {
	if (isFlushing || logQueue.length === 0) return;
	isFlushing = true;

	const itemsToFlush = logQueue.splice(0, logQueue.length);
	const payload = itemsToFlush.join("");

	try {
		appendFileSync(logPath, payload);
	} catch (error) {
		// File locked by another process: keep the lines for the next flush
		logQueue.unshift(...itemsToFlush);
		console.error("[AuditLog] Failed to flush queue, retaining items:", error);
	} finally {
		isFlushing = false;
	}
}

export enum AuditAction {
	CREDENTIAL_IMPORT = "credential.import",
	CREDENTIAL_REMOVE = "credential.remove",
	CREDENTIAL_SWITCH = "credential.switch",
	CREDENTIAL_FAILOVER = "credential.failover",
	CREDENTIAL_REFRESH = "credential.refresh",
	CREDENTIAL_CHECK = "credential.check",
	STORE_WRITE_FAILURE = "store.write-failure",
	ACTIVE_RECONCILE = "active.reconcile",
	ACTIVE_CLEAR = "active.clear",
}

export enum AuditOutcome {
	SUCCESS = "success",
	FAILURE = "failure",
	PARTIAL = "partial",
}

export interface AuditEntry {
	timestamp: string;
	correlationId: string | null;
	action: AuditAction;
	actor: string;
	resource: string;
	outcome: AuditOutcome;
	metadata?: Record<string, unknown>;
}

export interface AuditConfig {
	enabled: boolean;
	logDir: string;
	maxFileSizeBytes: number;
	maxFiles: number;
}

const DEFAULT_CONFIG: AuditConfig = {
	enabled: true,
	logDir: getDefaultAuditLogDir(),
	maxFileSizeBytes: 10 * 1024 * 1024,
	maxFiles: 5,
};

let auditConfig: AuditConfig = { ...DEFAULT_CONFIG };

export function configureAudit(config: Partial<AuditConfig>): void {
	auditConfig = { ...auditConfig, ...config };
}

export function getAuditConfig(): AuditConfig {
	return { ...auditConfig };
}

function ensureLogDir(): void {
	if (!existsSync(auditConfig.logDir)) {
		mkdirSync(auditConfig.logDir, { recursive: true, mode: 0o700 });
	}
}

function getLogFilePath(): string {
	return join(auditConfig.logDir, "audit.log");
}

function rotateLogsIfNeeded(): void {
	const logPath = getLogFilePath();
	if (!existsSync(logPath)) return;

	const stats = statSync(logPath);
	if (stats.size < auditConfig.maxFileSizeBytes) return;

	for (let i = auditConfig.maxFiles - 1; i >= 1; i--) {
		const older = join(auditConfig.logDir, `audit.${i}.log`);
		const newer = i === 1 ? logPath : join(auditConfig.logDir, `audit.${i - 1}.log`);

		if (i === auditConfig.maxFiles - 1 && existsSync(older)) {
			unlinkSync(older);
		}
		if (existsSync(newer)) {
			renameSync(newer, older);
		}
	}
}

const SECRET_KEY_FRAGMENTS = ["token", "secret", "password"];

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function sanitizeMetadata(
	metadata: Record<string, unknown> | undefined,
): Record<string, unknown> | undefined {
	if (!metadata) return undefined;

	const sanitized: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(metadata)) {
		const lowerKey = key.toLowerCase();
		if (SECRET_KEY_FRAGMENTS.some((fragment) => lowerKey.includes(fragment))) {
			sanitized[key] = "***REDACTED***";
		} else if (isRecord(value)) {
			sanitized[key] = sanitizeMetadata(value);
		} else {
			sanitized[key] = value;
		}
	}
	return sanitized;
}

export function auditLog(
	action: AuditAction,
	actor: string,
	resource: string,
	outcome: AuditOutcome,
	metadata?: Record<string, unknown>,
): void {
	if (!auditConfig.enabled) return;

	try {
		ensureLogDir();
		rotateLogsIfNeeded();

		const entry: AuditEntry = {
			timestamp: new Date().toISOString(),
			correlationId: getCorrelationId(),
			action,
			actor,
			resource,
			outcome,
			metadata: sanitizeMetadata(metadata),
		};

		logQueue.push(JSON.stringify(entry) + "\n");
		flushLogQueue(getLogFilePath());
	} catch (error) {
		console.error("[AuditLog] Failed to record entry:", error);
	}
}

export function getAuditLogPath(): string {
	return getLogFilePath();
}

export function listAuditLogFiles(): string[] {
	ensureLogDir();
	const files = readdirSync(auditConfig.logDir);
	return files
		.filter((f) => f.startsWith("audit") && f.endsWith(".log"))
		.map((f) => join(auditConfig.logDir, f))
		.sort();
}
