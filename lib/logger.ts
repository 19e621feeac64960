import { PACKAGE_NAME } from "./constants.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

function isLogLevel(value: string): value is LogLevel {
	return value in LOG_LEVEL_PRIORITY;
}

function parseLogLevel(value: string | undefined): LogLevel {
	if (!value) return "info";
	const normalized = value.toLowerCase().trim();
	return isLogLevel(normalized) ? normalized : "info";
}

export const DEBUG_ENABLED =
	process.env.CREDENTIAL_RESERVE_DEBUG === "1" ||
	process.env.CREDENTIAL_RESERVE_LOG_LEVEL !== undefined;
export const LOG_LEVEL = parseLogLevel(process.env.CREDENTIAL_RESERVE_LOG_LEVEL);

let correlationId: string | null = null;

function shouldLog(level: LogLevel): boolean {
	if (level === "error") return true;
	if (!DEBUG_ENABLED) return false;
	return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[LOG_LEVEL];
}

function formatDuration(ms: number): string {
	if (ms < 1000) return `${Math.round(ms)}ms`;
	if (ms < 60000) return `${(ms / 1000).toFixed(2)}s`;
	const minutes = Math.floor(ms / 60000);
	const seconds = ((ms % 60000) / 1000).toFixed(1);
	return `${minutes}m ${seconds}s`;
}

/**
 * Last six characters of a token, enough to tell credentials apart in logs.
 */
export function tokenSuffix(token: string | undefined): string {
	if (!token) return "(none)";
	return token.length <= 6 ? "***" : `...${token.slice(-6)}`;
}

export function setCorrelationId(id?: string): string {
	correlationId = id ?? `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
	return correlationId;
}

export function getCorrelationId(): string | null {
	return correlationId;
}

export function clearCorrelationId(): void {
	correlationId = null;
}

function write(level: LogLevel, prefix: string, message: string, data?: unknown): void {
	if (!shouldLog(level)) return;
	const sink = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
	if (data !== undefined) {
		sink(`${prefix} ${message}`, data);
	} else {
		sink(`${prefix} ${message}`);
	}
}

export function logDebug(message: string, data?: unknown): void {
	write("debug", `[${PACKAGE_NAME}]`, message, data);
}

export function logInfo(message: string, data?: unknown): void {
	write("info", `[${PACKAGE_NAME}]`, message, data);
}

export function logWarn(message: string, data?: unknown): void {
	write("warn", `[${PACKAGE_NAME}]`, message, data);
}

export function logError(message: string, data?: unknown): void {
	write("error", `[${PACKAGE_NAME}]`, message, data);
}

export interface ScopedLogger {
	debug(message: string, data?: unknown): void;
	info(message: string, data?: unknown): void;
	warn(message: string, data?: unknown): void;
	error(message: string, data?: unknown): void;
	time(label: string): () => number;
}

export function createLogger(scope: string): ScopedLogger {
	const prefix = `[${PACKAGE_NAME}:${scope}]`;

	return {
		debug(message: string, data?: unknown) {
			write("debug", prefix, message, data);
		},
		info(message: string, data?: unknown) {
			write("info", prefix, message, data);
		},
		warn(message: string, data?: unknown) {
			write("warn", prefix, message, data);
		},
		error(message: string, data?: unknown) {
			write("error", prefix, message, data);
		},
		time(label: string): () => number {
			const startTime = performance.now();
			return () => {
				const duration = performance.now() - startTime;
				if (shouldLog("debug")) {
					console.log(`${prefix} ${label}: ${formatDuration(duration)}`);
				}
				return duration;
			};
		},
	};
}

export { formatDuration };
