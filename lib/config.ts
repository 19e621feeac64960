import { readFileSync, existsSync } from "node:fs";
import type { LogWatchConfig, PoolConfig } from "./types.js";
import { logWarn } from "./logger.js";
import { PoolConfigFileSchema, getValidationErrors, isValidRegExp, type PoolConfigFile } from "./schemas.js";
import {
	DEFAULT_CLIENT_ID,
	DEFAULT_PAYMENT_ERROR_PATTERN,
	DEFAULT_REFRESH_URL,
	DEFAULT_USAGE_URL,
	QUOTA_LIMITS,
	TIMING,
} from "./constants.js";
import {
	getConfigFilePath,
	getDefaultActivePath,
	getDefaultAuditLogDir,
	getDefaultLogDir,
	getDefaultReservePath,
	resolvePath,
} from "./storage/paths.js";

const ENV_PREFIX = "CREDENTIAL_RESERVE_";

/**
 * Defaults used when neither the environment nor the config file sets a value.
 */
export function getDefaultPoolConfig(): PoolConfig {
	return {
		activePath: getDefaultActivePath(),
		reservePath: getDefaultReservePath(),
		refreshUrl: DEFAULT_REFRESH_URL,
		usageUrl: DEFAULT_USAGE_URL,
		clientId: DEFAULT_CLIENT_ID,
		warnThreshold: QUOTA_LIMITS.WARN_THRESHOLD,
		exhaustedWarningThreshold: QUOTA_LIMITS.EXHAUSTED_WARNING_THRESHOLD,
		checkIntervalMs: TIMING.CHECK_INTERVAL_MS,
		requestTimeoutMs: TIMING.REQUEST_TIMEOUT_MS,
		shutdownTimeoutMs: TIMING.SHUTDOWN_TIMEOUT_MS,
		auditEnabled: true,
		auditLogDir: getDefaultAuditLogDir(),
		logWatch: {
			enabled: true,
			logDir: getDefaultLogDir(),
			fileSuffix: ".log",
			pattern: DEFAULT_PAYMENT_ERROR_PATTERN,
			pollIntervalMs: TIMING.LOG_POLL_INTERVAL_MS,
		},
	};
}

function stripUtf8Bom(content: string): string {
	return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

/**
 * Drops the keys zod complained about so the rest of the file still applies.
 */
function withoutInvalidKeys(userConfig: Record<string, unknown>): Record<string, unknown> {
	const result = PoolConfigFileSchema.safeParse(userConfig);
	if (result.success) return userConfig;

	const copy: Record<string, unknown> = { ...userConfig };
	const nested = isRecord(copy.logWatch) ? { ...copy.logWatch } : undefined;
	for (const issue of result.error.issues) {
		const [head, child] = issue.path;
		if (head === "logWatch" && nested && typeof child === "string") {
			delete nested[child];
		} else if (typeof head === "string") {
			delete copy[head];
		}
	}
	if (nested && "logWatch" in copy) copy.logWatch = nested;
	return copy;
}

/**
 * Reads the JSON config file. Returns `{}` when it is missing or unusable.
 */
export function loadConfigFile(configPath: string = getConfigFilePath()): PoolConfigFile {
	try {
		if (!existsSync(configPath)) {
			return {};
		}

		const fileContent = readFileSync(configPath, "utf-8");
		const userConfig: unknown = JSON.parse(stripUtf8Bom(fileContent));

		const schemaErrors = getValidationErrors(PoolConfigFileSchema, userConfig);
		if (schemaErrors.length > 0) {
			logWarn(`Config validation warnings: ${schemaErrors.slice(0, 3).join(", ")}`);
		}
		if (!isRecord(userConfig)) {
			return {};
		}

		const parsed = PoolConfigFileSchema.safeParse(withoutInvalidKeys(userConfig));
		return parsed.success ? parsed.data : {};
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		logWarn(`Failed to load config from ${configPath}: ${message}`);
		return {};
	}
}

type Env = Record<string, string | undefined>;

function parseBooleanEnv(value: string | undefined): boolean | undefined {
	if (value === undefined) return undefined;
	const normalized = value.trim().toLowerCase();
	if (normalized === "1" || normalized === "true") return true;
	if (normalized === "0" || normalized === "false") return false;
	return undefined;
}

function parseNumberEnv(value: string | undefined): number | undefined {
	if (value === undefined || value.trim() === "") return undefined;
	const parsed = Number(value);
	if (!Number.isFinite(parsed)) return undefined;
	return parsed;
}

function parseStringEnv(value: string | undefined): string | undefined {
	if (value === undefined) return undefined;
	const trimmed = value.trim();
	return trimmed.length > 0 ? trimmed : undefined;
}

function resolveBooleanSetting(
	env: Env,
	name: string,
	configValue: boolean | undefined,
	defaultValue: boolean,
): boolean {
	const envValue = parseBooleanEnv(env[ENV_PREFIX + name]);
	if (envValue !== undefined) return envValue;
	return configValue ?? defaultValue;
}

function resolveNumberSetting(
	env: Env,
	name: string,
	configValue: number | undefined,
	defaultValue: number,
	options: { min: number; max?: number },
): number {
	const envValue = parseNumberEnv(env[ENV_PREFIX + name]);
	const candidate = envValue ?? configValue ?? defaultValue;
	const clamped = Math.max(options.min, candidate);
	return options.max !== undefined ? Math.min(options.max, clamped) : clamped;
}

function resolveStringSetting(
	env: Env,
	name: string,
	configValue: string | undefined,
	defaultValue: string,
): string {
	return parseStringEnv(env[ENV_PREFIX + name]) ?? configValue ?? defaultValue;
}

/**
 * A pattern from the environment that does not compile is ignored in favour
 * of the file value or the default.
 */
function resolvePatternSetting(env: Env, configValue: string | undefined, defaultValue: string): string {
	const envValue = parseStringEnv(env[`${ENV_PREFIX}LOG_PATTERN`]);
	if (envValue !== undefined) {
		if (isValidRegExp(envValue)) return envValue;
		logWarn(`Ignoring ${ENV_PREFIX}LOG_PATTERN: not a valid regular expression`);
	}
	return configValue ?? defaultValue;
}

function resolvePathSetting(
	env: Env,
	name: string,
	configValue: string | undefined,
	defaultValue: string,
): string {
	return resolvePath(resolveStringSetting(env, name, configValue, defaultValue));
}

const THRESHOLD_BOUNDS = { min: 0.01, max: 1 };

export interface LoadPoolConfigOptions {
	configPath?: string;
	env?: Env;
	/** Applied last, e.g. from command-line flags. */
	overrides?: Partial<Omit<PoolConfig, "logWatch">> & { logWatch?: Partial<LogWatchConfig> };
}

/**
 * Resolves the full runtime configuration.
 * Priority: environment variable > config file > default.
 */
export function loadPoolConfig(options: LoadPoolConfigOptions = {}): PoolConfig {
	const env = options.env ?? process.env;
	const file = loadConfigFile(options.configPath);
	const defaults = getDefaultPoolConfig();
	const fileLogWatch = file.logWatch ?? {};

	const logWatch: LogWatchConfig = {
		enabled: resolveBooleanSetting(env, "LOG_WATCH", fileLogWatch.enabled, defaults.logWatch.enabled),
		logDir: resolvePathSetting(env, "LOG_DIR", fileLogWatch.logDir, defaults.logWatch.logDir),
		fileSuffix: resolveStringSetting(env, "LOG_SUFFIX", fileLogWatch.fileSuffix, defaults.logWatch.fileSuffix),
		pattern: resolvePatternSetting(env, fileLogWatch.pattern, defaults.logWatch.pattern),
		pollIntervalMs: resolveNumberSetting(
			env,
			"LOG_POLL_INTERVAL_MS",
			fileLogWatch.pollIntervalMs,
			defaults.logWatch.pollIntervalMs,
			{ min: 100 },
		),
	};

	const config: PoolConfig = {
		activePath: resolvePathSetting(env, "ACTIVE_PATH", file.activePath, defaults.activePath),
		reservePath: resolvePathSetting(env, "RESERVE_PATH", file.reservePath, defaults.reservePath),
		refreshUrl: resolveStringSetting(env, "REFRESH_URL", file.refreshUrl, defaults.refreshUrl),
		usageUrl: resolveStringSetting(env, "USAGE_URL", file.usageUrl, defaults.usageUrl),
		clientId: resolveStringSetting(env, "CLIENT_ID", file.clientId, defaults.clientId),
		warnThreshold: resolveNumberSetting(
			env,
			"WARN_THRESHOLD",
			file.warnThreshold,
			defaults.warnThreshold,
			THRESHOLD_BOUNDS,
		),
		exhaustedWarningThreshold: resolveNumberSetting(
			env,
			"EXHAUSTED_WARNING_THRESHOLD",
			file.exhaustedWarningThreshold,
			defaults.exhaustedWarningThreshold,
			THRESHOLD_BOUNDS,
		),
		checkIntervalMs: resolveNumberSetting(
			env,
			"CHECK_INTERVAL_MS",
			file.checkIntervalMs,
			defaults.checkIntervalMs,
			{ min: 1_000 },
		),
		requestTimeoutMs: resolveNumberSetting(
			env,
			"REQUEST_TIMEOUT_MS",
			file.requestTimeoutMs,
			defaults.requestTimeoutMs,
			{ min: 500 },
		),
		shutdownTimeoutMs: resolveNumberSetting(
			env,
			"SHUTDOWN_TIMEOUT_MS",
			file.shutdownTimeoutMs,
			defaults.shutdownTimeoutMs,
			{ min: 500 },
		),
		auditEnabled: resolveBooleanSetting(env, "AUDIT", file.auditEnabled, defaults.auditEnabled),
		auditLogDir: resolvePathSetting(env, "AUDIT_LOG_DIR", file.auditLogDir, defaults.auditLogDir),
		logWatch,
	};

	const { logWatch: logWatchOverrides, ...overrides } = options.overrides ?? {};
	return {
		...config,
		...overrides,
		logWatch: { ...config.logWatch, ...logWatchOverrides },
	};
}
