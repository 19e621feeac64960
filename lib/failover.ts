/**
 * Failover Engine
 *
 * Promotion moves a reserve credential into the active slot and demotes the
 * previous active credential into the pool. The pool is saved once with both
 * the removal and the demotion applied.
 */

import { auditLog, AuditAction, AuditOutcome } from "./audit.js";
import { QUOTA_LIMITS } from "./constants.js";
import { createLogger, tokenSuffix } from "./logger.js";
import { applyTokens, applyUsage, findByRefreshToken, patchCredential } from "./pool.js";
import { selectFailoverCandidate } from "./rotation.js";
import { generateCredentialId, type CredentialStore } from "./storage.js";
import type { ActiveCredential, Credential, UsageInfo, UsageOracle, UsageQueryResult } from "./types.js";

const log = createLogger("failover");

export type ConfirmPromotion = (candidate: Credential, usage: UsageQueryResult) => Promise<boolean>;

export type SwitchResult =
	| { type: "switched"; id: string; previousId?: string; ratio: number; info?: UsageInfo }
	| { type: "not-found"; id: string }
	| { type: "query-failed"; id: string }
	| { type: "exhausted"; id: string; ratio: number }
	| { type: "cancelled"; id: string }
	| { type: "persist-failed"; id: string; target: "active" | "reserve" };

export type SwitchFailure = Exclude<SwitchResult, { type: "switched" }>;

export type AutoFailoverResult =
	| { type: "switched"; id: string; previousId?: string; ratio: number; info?: UsageInfo }
	| { type: "none-available" }
	| { type: "failed"; failure: SwitchFailure };

export interface PromoteOptions {
	/** Interactive confirmation shown with the fresh ratio; `false` cancels. */
	confirm?: ConfirmPromotion;
	/** Last known ratio of the outgoing active credential, stored on its demoted entry. */
	demotedRatio?: number;
	actor?: string;
}

export interface FailoverEngineOptions {
	store: CredentialStore;
	oracle: UsageOracle;
	warnThreshold?: number;
	promotionCeiling?: number;
	requestTimeoutMs?: number;
}

export class FailoverEngine {
	private readonly store: CredentialStore;
	private readonly oracle: UsageOracle;
	private readonly warnThreshold: number;
	private readonly promotionCeiling: number;
	private readonly requestTimeoutMs: number | undefined;

	constructor(options: FailoverEngineOptions) {
		this.store = options.store;
		this.oracle = options.oracle;
		this.warnThreshold = options.warnThreshold ?? QUOTA_LIMITS.WARN_THRESHOLD;
		this.promotionCeiling = options.promotionCeiling ?? QUOTA_LIMITS.PROMOTION_CEILING;
		this.requestTimeoutMs = options.requestTimeoutMs;
	}

	/**
	 * Promotes reserve entry `id` after a fresh admission query.
	 */
	async promote(id: string, options: PromoteOptions = {}): Promise<SwitchResult> {
		const actor = options.actor ?? "user";
		const pool = await this.store.loadReserve();
		const found = pool.find((credential) => credential.id === id);
		if (!found) {
			return { type: "not-found", id };
		}

		const usage = await this.oracle.queryUsage(found, { timeoutMs: this.requestTimeoutMs });
		const candidate = usage.refreshedTokens ? applyTokens(found, usage.refreshedTokens) : found;

		// Refreshed tokens and the fresh ratio land before anything structural.
		const persisted = await patchCredential(this.store, id, (current) => {
			const withTokens = usage.refreshedTokens ? applyTokens(current, usage.refreshedTokens) : current;
			return applyUsage(withTokens, usage.ratio, this.warnThreshold);
		});
		if (persisted === "failed" && usage.refreshedTokens) {
			log.error("Refreshed tokens for candidate could not be saved", { id });
		}

		if (usage.ratio < 0) {
			this.audit(actor, id, AuditOutcome.FAILURE, { reason: "query-failed" });
			return { type: "query-failed", id };
		}
		if (usage.ratio >= this.promotionCeiling) {
			this.audit(actor, id, AuditOutcome.FAILURE, { reason: "exhausted", ratio: usage.ratio });
			return { type: "exhausted", id, ratio: usage.ratio };
		}
		if (options.confirm && !(await options.confirm(candidate, usage))) {
			return { type: "cancelled", id };
		}

		const previous = await this.store.loadActive();
		const activated = await this.store.saveActive({
			id: candidate.id,
			accessToken: candidate.accessToken,
			refreshToken: candidate.refreshToken,
		});
		if (!activated) {
			this.audit(actor, id, AuditOutcome.FAILURE, { reason: "persist-failed", target: "active" });
			return { type: "persist-failed", id, target: "active" };
		}

		const latest = await this.store.loadReserve();
		const remaining = latest.filter((credential) => credential.id !== id);
		const previousId = previous ? this.demote(remaining, previous, candidate.id, options.demotedRatio) : undefined;

		if (!(await this.store.saveReserve(remaining))) {
			this.audit(actor, id, AuditOutcome.PARTIAL, { reason: "persist-failed", target: "reserve" });
			return { type: "persist-failed", id, target: "reserve" };
		}

		log.info("Promoted reserve credential", {
			id,
			previousId,
			ratio: usage.ratio,
			refreshToken: tokenSuffix(candidate.refreshToken),
		});
		this.audit(actor, id, AuditOutcome.SUCCESS, { previousId, ratio: usage.ratio });
		return { type: "switched", id, previousId, ratio: usage.ratio, info: usage.info };
	}

	/**
	 * Picks the best candidate and promotes it. No second candidate is tried
	 * when the admission check fails.
	 */
	async autoFailover(options: Omit<PromoteOptions, "confirm"> = {}): Promise<AutoFailoverResult> {
		const active = await this.store.loadActive();
		const pool = await this.store.loadReserve();
		const candidate = selectFailoverCandidate(pool, active?.id, this.warnThreshold);
		if (!candidate) {
			log.warn("No reserve credential below the warn threshold");
			return { type: "none-available" };
		}

		const result = await this.promote(candidate.id, { ...options, actor: options.actor ?? "auto" });
		if (result.type !== "switched") {
			return { type: "failed", failure: result };
		}
		return result;
	}

	/**
	 * Merges the outgoing active credential into `pool` in place. Returns the id
	 * it ends up under, or undefined when it is the credential being promoted.
	 */
	private demote(
		pool: Credential[],
		previous: ActiveCredential,
		promotedId: string,
		ratio: number | undefined,
	): string | undefined {
		const id =
			previous.id ??
			findByRefreshToken(pool, previous.refreshToken)?.id ??
			generateCredentialId(Date.now(), new Set([promotedId, ...pool.map((credential) => credential.id)]));
		if (id === promotedId) return undefined;

		const tokens = { accessToken: previous.accessToken, refreshToken: previous.refreshToken };
		const index = pool.findIndex((credential) => credential.id === id);
		const existing = pool[index];
		let entry: Credential = existing ? applyTokens(existing, tokens) : { id, ...tokens, status: "active" };
		if (ratio !== undefined) {
			entry = applyUsage(entry, ratio, this.warnThreshold);
		}

		if (existing) {
			pool[index] = entry;
		} else {
			pool.unshift(entry);
		}
		return id;
	}

	private audit(actor: string, id: string, outcome: AuditOutcome, metadata: Record<string, unknown>): void {
		const action = actor === "auto" ? AuditAction.CREDENTIAL_FAILOVER : AuditAction.CREDENTIAL_SWITCH;
		auditLog(action, actor, id, outcome, metadata);
	}
}
