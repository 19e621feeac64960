import { ANSI } from "./ansi.js";
import type { ReserveCheckRow } from "../checks.js";
import type { ActiveUsage, PoolSnapshot } from "../coordinator.js";
import type { Credential, CredentialStatus, UsageInfo } from "../types.js";

export interface UiOptions {
	color: boolean;
}

export const PLAIN_UI: UiOptions = { color: false };

export type UiTextTone = "heading" | "accent" | "muted" | "success" | "warning" | "danger" | "normal";

const TONE_TO_COLOR: Record<UiTextTone, string | null> = {
	heading: ANSI.bold,
	accent: ANSI.cyan,
	muted: ANSI.dim,
	success: ANSI.green,
	warning: ANSI.yellow,
	danger: ANSI.red,
	normal: null,
};

export function paintUiText(ui: UiOptions, text: string, tone: UiTextTone = "normal"): string {
	if (!ui.color) return text;
	const color = TONE_TO_COLOR[tone];
	if (!color) return text;
	return `${color}${text}${ANSI.reset}`;
}

export function formatUiHeader(ui: UiOptions, title: string): string[] {
	const divider = "-".repeat(Math.max(8, title.length));
	return [paintUiText(ui, title, "heading"), paintUiText(ui, divider, "muted")];
}

export function formatUiKeyValue(ui: UiOptions, key: string, value: string, valueTone: UiTextTone = "normal"): string {
	return `${paintUiText(ui, `${key}:`, "muted")} ${paintUiText(ui, value, valueTone)}`;
}

function percent(fraction: number): string {
	return `${(fraction * 100).toFixed(1)}%`;
}

/**
 * `Used: 12.3%, remaining: 87.7%`, `query failed` for -1, `not checked` when unset.
 */
export function formatRatio(ratio: number | undefined): string {
	if (ratio === undefined) return "not checked";
	if (ratio < 0) return "query failed";
	return `Used: ${percent(ratio)}, remaining: ${percent(Math.max(0, 1 - ratio))}`;
}

export function formatUsageInfo(info: UsageInfo): string {
	return `${info.used.toLocaleString("en-US")} / ${info.total.toLocaleString("en-US")} tokens`;
}

export function ratioTone(ratio: number | undefined, warnThreshold: number): UiTextTone {
	if (ratio === undefined) return "muted";
	if (ratio < 0) return "danger";
	return ratio >= warnThreshold ? "warning" : "success";
}

const STATUS_TONE: Record<CredentialStatus, UiTextTone> = {
	active: "success",
	"low-quota": "warning",
	invalid: "danger",
};

export function formatCredentialRow(ui: UiOptions, credential: Credential, warnThreshold: number): string {
	const status = paintUiText(ui, credential.status.padEnd(9), STATUS_TONE[credential.status]);
	const usage = paintUiText(ui, formatRatio(credential.lastKnownRatio), ratioTone(credential.lastKnownRatio, warnThreshold));
	return `${credential.id.padEnd(15)} ${status} ${usage}`;
}

function formatActiveUsage(usage: ActiveUsage | null): string {
	if (!usage) return "not checked";
	const line = formatRatio(usage.ratio);
	return usage.info ? `${line} (${formatUsageInfo(usage.info)})` : line;
}

export function formatSnapshot(ui: UiOptions, snapshot: PoolSnapshot, warnThreshold: number): string[] {
	const lines = [...formatUiHeader(ui, "Active credential")];
	if (snapshot.active) {
		lines.push(formatUiKeyValue(ui, "id", snapshot.active.id ?? "(none)"));
		lines.push(formatUiKeyValue(ui, "usage", formatActiveUsage(snapshot.activeUsage)));
	} else {
		lines.push(paintUiText(ui, "No active credential", "warning"));
	}

	lines.push("", ...formatUiHeader(ui, `Reserve pool (${snapshot.reserve.length})`));
	if (snapshot.reserve.length === 0) {
		lines.push(paintUiText(ui, "Reserve pool is empty", "muted"));
	}
	for (const credential of snapshot.reserve) {
		lines.push(formatCredentialRow(ui, credential, warnThreshold));
	}
	return lines;
}

export function formatCheckRow(ui: UiOptions, row: ReserveCheckRow, warnThreshold: number): string {
	const usage = paintUiText(ui, formatRatio(row.ratio), ratioTone(row.ratio, warnThreshold));
	const notes: string[] = [];
	if (row.refreshed) notes.push("refreshed");
	if (!row.persisted) notes.push("not saved");
	const suffix = notes.length > 0 ? ` (${notes.join(", ")})` : "";
	return `${row.id.padEnd(15)} ${usage}${suffix}`;
}
