/**
 * Default locations for the two credential documents and the upstream logs.
 */

import { basename, dirname, isAbsolute, join, resolve } from "node:path";
import { homedir } from "node:os";
import {
	ACTIVE_DOCUMENT_RELATIVE_PATH,
	CONFIG_DIR_NAME,
	CONFIG_FILE_NAME,
	RESERVE_FILE_NAME,
	UPSTREAM_LOG_RELATIVE_DIR,
} from "../constants.js";

export function getConfigDir(): string {
	return join(homedir(), CONFIG_DIR_NAME);
}

export function getConfigFilePath(): string {
	return join(getConfigDir(), CONFIG_FILE_NAME);
}

export function getDefaultReservePath(): string {
	return join(getConfigDir(), RESERVE_FILE_NAME);
}

export function getDefaultActivePath(): string {
	return join(homedir(), ...ACTIVE_DOCUMENT_RELATIVE_PATH);
}

export function getDefaultLogDir(): string {
	return join(homedir(), ...UPSTREAM_LOG_RELATIVE_DIR);
}

export function getDefaultAuditLogDir(): string {
	return join(getConfigDir(), "logs");
}

/**
 * Expands a leading `~` and resolves relative paths against the working directory.
 */
export function resolvePath(filePath: string): string {
	if (filePath === "~") return homedir();
	if (filePath.startsWith("~/") || filePath.startsWith("~\\")) {
		return join(homedir(), filePath.slice(2));
	}
	return isAbsolute(filePath) ? filePath : resolve(filePath);
}

/**
 * Temporary path next to the target so the final rename stays on one filesystem.
 */
export function createTempPath(targetPath: string): string {
	const uniqueSuffix = `${process.pid}.${Date.now()}.${Math.random().toString(36).slice(2, 8)}`;
	return join(dirname(targetPath), `.${basename(targetPath)}.${uniqueSuffix}.tmp`);
}
