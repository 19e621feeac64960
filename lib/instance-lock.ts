import { promises as fs } from "node:fs";
import { dirname, join } from "node:path";
import lockfile from "proper-lockfile";
import { PACKAGE_NAME } from "./constants.js";
import { createLogger } from "./logger.js";

const log = createLogger("instance-lock");

const LOCK_OPTIONS = {
	stale: 10_000,
	retries: 0,
};

export class InstanceLockError extends Error {
	readonly lockPath: string;

	constructor(lockPath: string, cause?: Error) {
		super(`Another ${PACKAGE_NAME} process is already running (lock: ${lockPath})`, { cause });
		this.name = "InstanceLockError";
		this.lockPath = lockPath;
	}
}

export interface InstanceLock {
	readonly lockPath: string;
	release(): Promise<void>;
}

function isLockedError(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ELOCKED";
}

/**
 * Takes the process-wide lock beside the reserve document. A second
 * coordinating process fails with {@link InstanceLockError}.
 */
export async function acquireInstanceLock(reservePath: string): Promise<InstanceLock> {
	const directory = dirname(reservePath);
	const lockPath = join(directory, `${PACKAGE_NAME}.lock`);
	await fs.mkdir(directory, { recursive: true });

	let releaseLock: () => Promise<void>;
	try {
		releaseLock = await lockfile.lock(directory, {
			...LOCK_OPTIONS,
			lockfilePath: lockPath,
			onCompromised: (error) => {
				log.error("Instance lock compromised", { lockPath, message: error.message });
			},
		});
	} catch (error) {
		if (isLockedError(error)) {
			throw new InstanceLockError(lockPath, error instanceof Error ? error : undefined);
		}
		throw error;
	}

	let released = false;
	return {
		lockPath,
		async release() {
			if (released) return;
			released = true;
			try {
				await releaseLock();
			} catch (unlockError) {
				log.warn("Failed to release lock", { error: String(unlockError) });
			}
		},
	};
}
