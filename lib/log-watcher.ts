import { EventEmitter } from "node:events";
import { promises as fs } from "node:fs";
import { join } from "node:path";
import { createLogger } from "./logger.js";
import type { LogWatchConfig } from "./types.js";

const log = createLogger("log-watcher");

export interface PaymentErrorEvent {
	file: string;
	line: string;
}

export interface LogWatcherEvents {
	payment_error: [PaymentErrorEvent];
}

type WatchSettings = Pick<LogWatchConfig, "logDir" | "fileSuffix" | "pattern" | "pollIntervalMs">;

/**
 * Tails every `*<suffix>` file in a directory and emits `payment_error` when
 * newly appended text matches the pattern.
 *
 * Files present when watching starts are read from their current end; files
 * that appear later are read from the start. Each scan moves every cursor to
 * end of file, so text is never matched twice.
 */
export class LogWatcher extends EventEmitter<LogWatcherEvents> {
	private readonly settings: WatchSettings;
	private readonly pattern: RegExp;
	private readonly positions = new Map<string, number>();
	private timer: ReturnType<typeof setTimeout> | null = null;
	private primed = false;
	private running = false;

	constructor(settings: WatchSettings) {
		super();
		this.settings = settings;
		this.pattern = new RegExp(settings.pattern);
	}

	get isWatching(): boolean {
		return this.running;
	}

	async start(): Promise<void> {
		if (this.running) return;
		this.running = true;
		await this.prime();
		log.info("Watching upstream logs", {
			dir: this.settings.logDir,
			files: this.positions.size,
		});
		this.schedule();
	}

	stop(): void {
		this.running = false;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
	}

	/**
	 * Records the current size of every existing file.
	 */
	async prime(): Promise<void> {
		for (const file of await this.listFiles()) {
			const size = await this.sizeOf(file);
			this.positions.set(file, size ?? 0);
		}
		this.primed = true;
	}

	/**
	 * Reads what was appended since the last scan. Returns the number of
	 * events emitted.
	 */
	async scan(): Promise<number> {
		if (!this.primed) {
			await this.prime();
			return 0;
		}

		let emitted = 0;
		for (const file of await this.listFiles()) {
			try {
				if (await this.scanFile(file)) emitted += 1;
			} catch (error) {
				const message = error instanceof Error ? error.message : String(error);
				log.warn("Failed to read log file", { file, message });
			}
		}
		return emitted;
	}

	private async scanFile(file: string): Promise<boolean> {
		const size = await this.sizeOf(file);
		if (size === null) {
			this.positions.delete(file);
			return false;
		}

		let position = this.positions.get(file) ?? 0;
		if (size < position) {
			// Truncated or rotated in place.
			position = 0;
		}
		if (size === position) {
			this.positions.set(file, size);
			return false;
		}

		const appended = await readRange(file, position, size);
		this.positions.set(file, size);

		const match = this.pattern.exec(appended);
		if (!match) return false;

		log.warn("Payment error detected in upstream log", { file });
		this.emit("payment_error", { file, line: match[0] });
		return true;
	}

	private schedule(): void {
		if (!this.running) return;
		this.timer = setTimeout(() => {
			this.scan()
				.catch((error: unknown) => {
					const message = error instanceof Error ? error.message : String(error);
					log.error("Log scan failed", { message });
				})
				.finally(() => {
					this.schedule();
				});
		}, this.settings.pollIntervalMs);
		this.timer.unref();
	}

	private async listFiles(): Promise<string[]> {
		try {
			const entries = await fs.readdir(this.settings.logDir, { withFileTypes: true });
			return entries
				.filter((entry) => entry.isFile() && entry.name.endsWith(this.settings.fileSuffix))
				.map((entry) => join(this.settings.logDir, entry.name))
				.sort();
		} catch (error) {
			if (error instanceof Error && "code" in error && error.code === "ENOENT") {
				return [];
			}
			throw error;
		}
	}

	private async sizeOf(file: string): Promise<number | null> {
		try {
			return (await fs.stat(file)).size;
		} catch {
			return null;
		}
	}
}

async function readRange(file: string, start: number, end: number): Promise<string> {
	const handle = await fs.open(file, "r");
	try {
		const buffer = Buffer.alloc(end - start);
		const { bytesRead } = await handle.read(buffer, 0, buffer.length, start);
		return buffer.subarray(0, bytesRead).toString("utf-8");
	} finally {
		await handle.close();
	}
}
