import { createLogger } from "./logger.js";

const log = createLogger("monitor");

export interface ActiveChecker {
	checkActive(userInitiated: boolean): Promise<unknown>;
}

/**
 * Fixed-interval poller. Starting runs one check right away (reported like a
 * user-initiated check), then one every `intervalMs`. Overlap is left to the
 * checker's single-flight gate: a tick that lands while a check is still
 * running does nothing.
 */
export class Monitor {
	private readonly checker: ActiveChecker;
	private readonly intervalMs: number;
	private timer: ReturnType<typeof setInterval> | null = null;

	constructor(checker: ActiveChecker, intervalMs: number) {
		this.checker = checker;
		this.intervalMs = intervalMs;
	}

	get isRunning(): boolean {
		return this.timer !== null;
	}

	start(): void {
		if (this.timer) return;
		log.info("Monitoring started", { intervalMs: this.intervalMs });
		this.fire(true);
		this.timer = setInterval(() => {
			this.fire(false);
		}, this.intervalMs);
	}

	stop(): void {
		if (!this.timer) return;
		clearInterval(this.timer);
		this.timer = null;
		log.info("Monitoring stopped");
	}

	private fire(userInitiated: boolean): void {
		this.checker.checkActive(userInitiated).catch((error: unknown) => {
			const message = error instanceof Error ? error.message : String(error);
			log.error("Active check failed", { message });
		});
	}
}
