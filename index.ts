/**
 * credential-reserve
 *
 * Keeps one OAuth credential in the upstream client's active slot and a pool
 * of reserve credentials beside it. When the active credential's quota runs
 * out, or the client logs a billing error, the reserve credential with the
 * most headroom is promoted.
 */

export { loadPoolConfig, loadConfigFile, getDefaultPoolConfig, type LoadPoolConfigOptions } from "./lib/config.js";
export {
	CredentialStore,
	StorageError,
	writeJsonAtomic,
	generateCredentialId,
	normalizeReserveDocument,
	parseActiveDocument,
	type CredentialStorePaths,
} from "./lib/storage.js";
export { refreshAccessToken, DEFAULT_REFRESH_ENDPOINT, type RefreshEndpoint } from "./lib/auth/auth.js";
export { RefreshQueue, createRefreshQueue, type Refresher, type RefreshQueueMetrics } from "./lib/refresh-queue.js";
export {
	RemoteUsageOracle,
	fetchUsage,
	computeUsageRatio,
	type UsageEndpoint,
	type UsageSnapshot,
	type UsageOracleOptions,
} from "./lib/usage.js";
export { selectFailoverCandidate, isFailoverEligible } from "./lib/rotation.js";
export {
	FailoverEngine,
	type AutoFailoverResult,
	type ConfirmPromotion,
	type PromoteOptions,
	type SwitchFailure,
	type SwitchResult,
} from "./lib/failover.js";
export {
	checkActiveUsage,
	checkReserve,
	deleteCredentials,
	syncActiveToReserve,
	type ActiveCheckResult,
	type DeleteResult,
	type ReserveCheckRow,
} from "./lib/checks.js";
export { importCredentials, parseImportLines, type ImportResult } from "./lib/import.js";
export { reconcileOnStart, type ReconcileResult } from "./lib/reconcile.js";
export { OperationGate, type OperationClass, type GateOutcome } from "./lib/single-flight.js";
export {
	Coordinator,
	createCoordinator,
	type CoordinatorEvents,
	type OperationReport,
	type PoolSnapshot,
	type ShutdownOptions,
	type ShutdownResult,
} from "./lib/coordinator.js";
export { Monitor } from "./lib/monitor.js";
export { LogWatcher, type PaymentErrorEvent } from "./lib/log-watcher.js";
export { acquireInstanceLock, InstanceLockError, type InstanceLock } from "./lib/instance-lock.js";
export { configureAudit, AuditAction, AuditOutcome } from "./lib/audit.js";
export { createLogger } from "./lib/logger.js";
export type * from "./lib/types.js";
