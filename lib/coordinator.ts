/**
 * Coordinator
 *
 * The one place that starts operations, owns the single-flight gate and the
 * in-memory pool snapshot, and reports results. Workers (checks, failover,
 * import) compute a result and return it; only the coordinator applies it to
 * the snapshot and emits events.
 */

import { EventEmitter } from "node:events";
import { auditLog, AuditAction, AuditOutcome, configureAudit } from "./audit.js";
import {
	checkActiveUsage,
	checkReserve,
	deleteCredentials,
	syncActiveToReserve,
	type ActiveCheckResult,
	type DeleteResult,
	type ReserveCheckRow,
} from "./checks.js";
import {
	FailoverEngine,
	type AutoFailoverResult,
	type ConfirmPromotion,
	type SwitchFailure,
	type SwitchResult,
} from "./failover.js";
import { importCredentials, parseImportLines, type ImportResult } from "./import.js";
import { acquireInstanceLock, type InstanceLock } from "./instance-lock.js";
import { LogWatcher, type PaymentErrorEvent } from "./log-watcher.js";
import { clearCorrelationId, createLogger, setCorrelationId } from "./logger.js";
import { Monitor } from "./monitor.js";
import { reconcileOnStart, type ReconcileResult } from "./reconcile.js";
import { createRefreshQueue } from "./refresh-queue.js";
import { OPERATION_CLASSES, OperationGate, type OperationClass } from "./single-flight.js";
import { CredentialStore } from "./storage.js";
import type { ActiveCredential, Credential, PoolConfig, UsageInfo, UsageOracle } from "./types.js";
import { RemoteUsageOracle } from "./usage.js";

const log = createLogger("coordinator");

export interface ActiveUsage {
	id?: string;
	ratio: number;
	info?: UsageInfo;
	checkedAt: number;
}

/**
 * What a presentation layer renders. The reserve list leaves out the pool
 * entry that shadows the active credential.
 */
export interface PoolSnapshot {
	active: ActiveCredential | null;
	reserve: Credential[];
	activeUsage: ActiveUsage | null;
	running: OperationClass[];
}

export type Skipped = {
	type: "skipped";
	reason: "in-flight" | "conflict";
	blockedBy: OperationClass;
};

export type Errored = { type: "error"; message: string };

export type ReserveCheckResult = { type: "checked"; rows: ReserveCheckRow[] };

export type AutoSwitchTrigger = "user" | "payment-error";

export type OperationReport =
	| { operation: "active-check"; userInitiated: boolean; result: ActiveCheckResult | Skipped | Errored }
	| { operation: "check-all" | "check-selected"; result: ReserveCheckResult | Skipped | Errored }
	| { operation: "switch"; result: SwitchResult | Skipped | Errored }
	| { operation: "auto-switch"; trigger: AutoSwitchTrigger; result: AutoFailoverResult | Skipped | Errored }
	| { operation: "delete"; result: DeleteResult | Errored }
	| { operation: "import"; result: ImportResult | Errored }
	| { operation: "reconcile"; result: ReconcileResult | Errored };

export type NoBackupReason = "none-available" | SwitchFailure["type"];

export interface CoordinatorEvents {
	result: [OperationReport];
	exhausted: [{ id?: string; ratio: number; info?: UsageInfo }];
	failover: [{ id: string; previousId?: string; ratio: number; trigger: AutoSwitchTrigger }];
	"no-backup": [{ reason: NoBackupReason; id?: string; trigger: AutoSwitchTrigger }];
	"payment-error": [PaymentErrorEvent];
}

export interface ShutdownOptions {
	/** Replace the active document with `{}` after syncing it into the pool. */
	clearActive?: boolean;
}

export interface ShutdownResult {
	synced: boolean;
	cleared: boolean;
	ratio?: number;
}

export interface CoordinatorDependencies {
	config: PoolConfig;
	store?: CredentialStore;
	oracle?: UsageOracle;
	engine?: FailoverEngine;
}

function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export class Coordinator extends EventEmitter<CoordinatorEvents> {
	readonly config: PoolConfig;
	readonly store: CredentialStore;
	private readonly oracle: UsageOracle;
	private readonly engine: FailoverEngine;
	private readonly gate = new OperationGate();
	private snapshot: PoolSnapshot = { active: null, reserve: [], activeUsage: null, running: [] };
	private monitor: Monitor | null = null;
	private watcher: LogWatcher | null = null;
	private lock: InstanceLock | null = null;

	constructor(dependencies: CoordinatorDependencies) {
		super();
		const { config } = dependencies;
		this.config = config;
		this.store =
			dependencies.store ?? new CredentialStore({ activePath: config.activePath, reservePath: config.reservePath });
		this.oracle =
			dependencies.oracle ??
			new RemoteUsageOracle({
				usageUrl: config.usageUrl,
				timeoutMs: config.requestTimeoutMs,
				refreshQueue: createRefreshQueue({
					tokenUrl: config.refreshUrl,
					clientId: config.clientId,
					timeoutMs: config.requestTimeoutMs,
				}),
			});
		this.engine =
			dependencies.engine ??
			new FailoverEngine({
				store: this.store,
				oracle: this.oracle,
				warnThreshold: config.warnThreshold,
				requestTimeoutMs: config.requestTimeoutMs,
			});
	}

	getSnapshot(): PoolSnapshot {
		return {
			...this.snapshot,
			reserve: [...this.snapshot.reserve],
			running: this.gate.snapshot(),
		};
	}

	async refreshSnapshot(): Promise<PoolSnapshot> {
		const active = await this.store.loadActive();
		const pool = await this.store.loadReserve();
		const activeId = active?.id;
		const usage = this.snapshot.activeUsage;
		this.snapshot = {
			active,
			reserve: pool.filter((credential) => activeId === undefined || credential.id !== activeId),
			// Usage measured for a different credential no longer describes the slot.
			activeUsage: usage && usage.id === activeId ? usage : null,
			running: this.gate.snapshot(),
		};
		return this.getSnapshot();
	}

	async checkActive(userInitiated: boolean): Promise<ActiveCheckResult | Skipped | Errored> {
		const result = await this.gated("active-check", () =>
			checkActiveUsage(this.store, this.oracle, { timeoutMs: this.config.requestTimeoutMs }),
		);

		if (result.type === "checked") {
			this.snapshot.activeUsage = { id: result.id, ratio: result.ratio, info: result.info, checkedAt: Date.now() };
			if (userInitiated && result.ratio >= this.config.exhaustedWarningThreshold) {
				this.emit("exhausted", { id: result.id, ratio: result.ratio, info: result.info });
			}
		} else if (result.type === "failed") {
			this.snapshot.activeUsage = { id: result.id, ratio: -1, checkedAt: Date.now() };
		}
		await this.settle({ operation: "active-check", userInitiated, result });
		return result;
	}

	async checkAll(): Promise<ReserveCheckResult | Skipped | Errored> {
		const result = await this.gated("check-all", async () => {
			const active = await this.store.loadActive();
			const rows = await checkReserve(this.store, this.oracle, {
				activeId: active?.id,
				warnThreshold: this.config.warnThreshold,
				timeoutMs: this.config.requestTimeoutMs,
			});
			return { type: "checked" as const, rows };
		});
		await this.settle({ operation: "check-all", result });
		return result;
	}

	async checkSelected(ids: readonly string[]): Promise<ReserveCheckResult | Skipped | Errored> {
		const result = await this.gated("check-selected", async () => {
			const rows = await checkReserve(this.store, this.oracle, {
				ids,
				warnThreshold: this.config.warnThreshold,
				timeoutMs: this.config.requestTimeoutMs,
			});
			return { type: "checked" as const, rows };
		});
		await this.settle({ operation: "check-selected", result });
		return result;
	}

	/**
	 * Manual switch. `confirm` sees the candidate's fresh usage before anything is written.
	 */
	async switchTo(id: string, confirm?: ConfirmPromotion): Promise<SwitchResult | Skipped | Errored> {
		const result = await this.gated("switch", async () =>
			this.engine.promote(id, { confirm, demotedRatio: await this.knownActiveRatio(), actor: "user" }),
		);
		if (result.type === "switched") {
			this.snapshot.activeUsage = { id: result.id, ratio: result.ratio, info: result.info, checkedAt: Date.now() };
		}
		await this.settle({ operation: "switch", result });
		return result;
	}

	async autoSwitch(trigger: AutoSwitchTrigger = "user"): Promise<AutoFailoverResult | Skipped | Errored> {
		const result = await this.gated("switch", async () =>
			this.engine.autoFailover({ demotedRatio: await this.knownActiveRatio(), actor: "auto" }),
		);

		if (result.type === "switched") {
			this.snapshot.activeUsage = { id: result.id, ratio: result.ratio, info: result.info, checkedAt: Date.now() };
			this.emit("failover", { id: result.id, previousId: result.previousId, ratio: result.ratio, trigger });
		} else if (result.type === "none-available") {
			this.emit("no-backup", { reason: "none-available", trigger });
		} else if (result.type === "failed") {
			this.emit("no-backup", { reason: result.failure.type, id: result.failure.id, trigger });
		}
		await this.settle({ operation: "auto-switch", trigger, result });
		return result;
	}

	/**
	 * Reaction to an upstream billing error: fail over immediately.
	 */
	async handlePaymentError(event: PaymentErrorEvent): Promise<AutoFailoverResult | Skipped | Errored> {
		this.emit("payment-error", event);
		return this.autoSwitch("payment-error");
	}

	async deleteCredentials(ids: readonly string[]): Promise<DeleteResult | Errored> {
		const result = await this.guarded(() => deleteCredentials(this.store, ids));
		await this.settle({ operation: "delete", result });
		return result;
	}

	async importText(text: string): Promise<ImportResult | Errored> {
		const result = await this.guarded(() => importCredentials(this.store, parseImportLines(text)));
		await this.settle({ operation: "import", result });
		return result;
	}

	async reconcile(): Promise<ReconcileResult | Errored> {
		const result = await this.guarded(() => reconcileOnStart(this.store));
		await this.settle({ operation: "reconcile", result });
		return result;
	}

	/**
	 * Takes the single-instance lock. Released by {@link shutdown}.
	 */
	async acquireLock(): Promise<void> {
		if (this.lock) return;
		this.lock = await acquireInstanceLock(this.config.reservePath);
	}

	/**
	 * Starts the interval poller and, when enabled, the log watcher. The
	 * watcher is built first so a bad pattern leaves nothing running.
	 */
	async startMonitoring(options: { logWatch?: boolean } = {}): Promise<void> {
		const watchLogs = options.logWatch ?? this.config.logWatch.enabled;
		if (watchLogs && !this.watcher) {
			const watcher = new LogWatcher(this.config.logWatch);
			watcher.on("payment_error", (event) => {
				this.handlePaymentError(event).catch((error: unknown) => {
					log.error("Payment error handling failed", { message: describeError(error) });
				});
			});
			this.watcher = watcher;
		}

		if (!this.monitor) {
			this.monitor = new Monitor(this, this.config.checkIntervalMs);
			this.monitor.start();
		}

		if (this.watcher && !this.watcher.isWatching) {
			try {
				await this.watcher.start();
			} catch (error) {
				this.stopMonitoring();
				throw error;
			}
		}
	}

	stopMonitoring(): void {
		this.monitor?.stop();
		this.monitor = null;
		this.watcher?.stop();
		this.watcher?.removeAllListeners();
		this.watcher = null;
	}

	get isMonitoring(): boolean {
		return this.monitor?.isRunning ?? false;
	}

	/**
	 * Final query on the active credential with the short shutdown timeout,
	 * then sync it into the pool and optionally sign the upstream client out.
	 * Waits for running operations first and holds every operation class
	 * until it is done, so nothing writes the store behind it.
	 */
	async shutdown(options: ShutdownOptions = {}): Promise<ShutdownResult> {
		this.stopMonitoring();
		await this.gate.drain();
		const held = OPERATION_CLASSES.filter((operation) => this.gate.tryAcquire(operation));
		setCorrelationId();
		try {
			const check = await checkActiveUsage(this.store, this.oracle, { timeoutMs: this.config.shutdownTimeoutMs });
			const ratio = check.type === "checked" ? check.ratio : undefined;

			// Re-read: the final check may have written refreshed tokens.
			const active = await this.store.loadActive();
			const synced = active ? await syncActiveToReserve(this.store, active, ratio, this.config.warnThreshold) : true;

			let cleared = false;
			if (options.clearActive && active) {
				cleared = synced && (await this.store.clearActive());
				auditLog(
					AuditAction.ACTIVE_CLEAR,
					"shutdown",
					active.id ?? "active",
					cleared ? AuditOutcome.SUCCESS : AuditOutcome.FAILURE,
				);
				if (!synced) {
					log.warn("Active credential kept because it could not be saved to the pool", { id: active.id });
				}
			}
			return { synced, cleared, ratio };
		} catch (error) {
			log.error("Shutdown sync failed", { message: describeError(error) });
			return { synced: false, cleared: false };
		} finally {
			clearCorrelationId();
			for (const operation of held) this.gate.release(operation);
			await this.releaseLock();
		}
	}

	async releaseLock(): Promise<void> {
		const lock = this.lock;
		this.lock = null;
		await lock?.release();
	}

	/**
	 * Applies the coordinator's audit settings to the process-wide audit log.
	 */
	applyAuditConfig(): void {
		configureAudit({ enabled: this.config.auditEnabled, logDir: this.config.auditLogDir });
	}

	private async knownActiveRatio(): Promise<number | undefined> {
		const usage = this.snapshot.activeUsage;
		if (!usage || usage.ratio < 0) return undefined;
		const active = await this.store.loadActive();
		return active && active.id === usage.id ? usage.ratio : undefined;
	}

	private async gated<T>(operation: OperationClass, task: () => Promise<T>): Promise<T | Skipped | Errored> {
		const outcome = await this.gate.run(operation, () => this.guarded(task));
		if (outcome.type === "skipped") {
			log.debug("Operation skipped", { operation, reason: outcome.reason, blockedBy: outcome.blockedBy });
			return { type: "skipped", reason: outcome.reason, blockedBy: outcome.blockedBy };
		}
		return outcome.value;
	}

	private async guarded<T>(task: () => Promise<T>): Promise<T | Errored> {
		setCorrelationId();
		try {
			return await task();
		} catch (error) {
			const message = describeError(error);
			log.error("Operation failed", { message });
			return { type: "error", message };
		} finally {
			clearCorrelationId();
		}
	}

	private async settle(report: OperationReport): Promise<void> {
		try {
			await this.refreshSnapshot();
		} catch (error) {
			log.warn("Snapshot refresh failed", { message: describeError(error) });
		}
		this.emit("result", report);
	}
}

export function createCoordinator(config: PoolConfig): Coordinator {
	const coordinator = new Coordinator({ config });
	coordinator.applyAuditConfig();
	return coordinator;
}
