import { createInterface } from "node:readline/promises";
import { readFile } from "node:fs/promises";
import { stdin as input, stdout as output } from "node:process";
import { parseArgs } from "node:util";
import { loadPoolConfig } from "./config.js";
import { BILLING_URL, PACKAGE_NAME } from "./constants.js";
import { createCoordinator, type Coordinator, type Errored, type Skipped } from "./coordinator.js";
import type { AutoFailoverResult, SwitchFailure, SwitchResult } from "./failover.js";
import { InstanceLockError } from "./instance-lock.js";
import type { ActiveCheckResult } from "./checks.js";
import type { PoolConfig } from "./types.js";
import { isTTY, shouldUseColor } from "./ui/ansi.js";
import {
	formatCheckRow,
	formatRatio,
	formatSnapshot,
	paintUiText,
	type UiOptions,
} from "./ui/format.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: ${PACKAGE_NAME} <command> [options]

Commands:
  status                          Show the active credential and the reserve pool
  import [file|-]                 Import refreshToken----accessToken lines (stdin when omitted)
  check [--all | <id>...]         Check the active credential, every reserve entry, or the given ids
  switch <id> [--yes]             Promote a reserve credential after a fresh usage check
  auto-switch                     Promote the reserve credential with the most headroom
  delete <id>... [--yes]          Remove reserve credentials
  reconcile                       Give the active credential an id and sync it into the pool
  watch [--no-log-watch] [--clear-active-on-exit]
                                  Poll the active credential and fail over on billing errors`;

/**
 * Detect when readline prompts cannot work (no TTY on either end).
 */
export function isNonInteractiveMode(): boolean {
	if (process.env.FORCE_INTERACTIVE_MODE === "1") return false;
	if (!input.isTTY || !output.isTTY) return true;
	return !isTTY();
}

export async function promptYesNo(question: string): Promise<boolean> {
	if (isNonInteractiveMode()) {
		return false;
	}

	const rl = createInterface({ input, output });
	try {
		const answer = await rl.question(`${question} (y/n): `);
		const normalized = answer.trim().toLowerCase();
		return normalized === "y" || normalized === "yes";
	} finally {
		rl.close();
	}
}

export interface CliIO {
	out(line: string): void;
	err(line: string): void;
	readStdin(): Promise<string>;
	readFile(path: string): Promise<string>;
	confirm(question: string): Promise<boolean>;
	/** Resolves when the process is asked to stop (watch mode). */
	waitForExit(): Promise<void>;
	interactive: boolean;
	ui: UiOptions;
}

async function readAllStdin(): Promise<string> {
	const chunks: Buffer[] = [];
	for await (const chunk of input) {
		chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
	}
	return Buffer.concat(chunks).toString("utf-8");
}

function waitForSignal(): Promise<void> {
	return new Promise((resolve) => {
		const onSignal = () => {
			process.off("SIGINT", onSignal);
			process.off("SIGTERM", onSignal);
			resolve();
		};
		process.on("SIGINT", onSignal);
		process.on("SIGTERM", onSignal);
	});
}

export function createProcessIO(): CliIO {
	return {
		out: (line) => console.log(line),
		err: (line) => console.error(line),
		readStdin: readAllStdin,
		readFile: (path) => readFile(path, "utf-8"),
		confirm: promptYesNo,
		waitForExit: waitForSignal,
		interactive: !isNonInteractiveMode(),
		ui: { color: shouldUseColor() },
	};
}

const COMMANDS = ["status", "import", "check", "switch", "auto-switch", "delete", "reconcile", "watch"] as const;
export type CliCommand = (typeof COMMANDS)[number];

function isCommand(value: string): value is CliCommand {
	return COMMANDS.some((command) => command === value);
}

export interface ParsedCommand {
	command: CliCommand;
	args: string[];
	all: boolean;
	yes: boolean;
	logWatch: boolean;
	clearActiveOnExit: boolean;
}

export type ParseResult = { type: "ok"; parsed: ParsedCommand } | { type: "usage"; message?: string };

export function parseCliArgs(argv: readonly string[]): ParseResult {
	let values: { all?: boolean; yes?: boolean; "no-log-watch"?: boolean; "clear-active-on-exit"?: boolean; help?: boolean };
	let positionals: string[];
	try {
		({ values, positionals } = parseArgs({
			args: [...argv],
			allowPositionals: true,
			strict: true,
			options: {
				all: { type: "boolean" },
				yes: { type: "boolean", short: "y" },
				"no-log-watch": { type: "boolean" },
				"clear-active-on-exit": { type: "boolean" },
				help: { type: "boolean", short: "h" },
			},
		}));
	} catch (error) {
		return { type: "usage", message: error instanceof Error ? error.message : String(error) };
	}

	const [name, ...args] = positionals;
	if (values.help || name === undefined) return { type: "usage" };
	if (!isCommand(name)) return { type: "usage", message: `Unknown command: ${name}` };

	const parsed: ParsedCommand = {
		command: name,
		args,
		all: values.all ?? false,
		yes: values.yes ?? false,
		logWatch: !(values["no-log-watch"] ?? false),
		clearActiveOnExit: values["clear-active-on-exit"] ?? false,
	};

	if (parsed.command === "switch" && args.length !== 1) {
		return { type: "usage", message: "switch takes exactly one id" };
	}
	if (parsed.command === "delete" && args.length === 0) {
		return { type: "usage", message: "delete needs at least one id" };
	}
	if (parsed.command === "check" && parsed.all && args.length > 0) {
		return { type: "usage", message: "check takes --all or ids, not both" };
	}
	if (parsed.command === "import" && args.length > 1) {
		return { type: "usage", message: "import takes at most one file" };
	}
	return { type: "ok", parsed };
}

function describeSkipped(result: Skipped): string {
	return result.reason === "in-flight"
		? `Another ${result.blockedBy} is already running`
		: `Cannot start while ${result.blockedBy} is running`;
}

export function describeSwitchFailure(failure: SwitchFailure): string {
	switch (failure.type) {
		case "not-found":
			return `No reserve credential with id ${failure.id}`;
		case "query-failed":
			return `Usage query for ${failure.id} failed; not switching`;
		case "exhausted":
			return `Credential ${failure.id} is exhausted (${formatRatio(failure.ratio)})`;
		case "cancelled":
			return "Switch cancelled";
		case "persist-failed":
			return `Switch to ${failure.id} failed: could not save the ${failure.target} document`;
	}
}

function reportActiveCheck(io: CliIO, result: ActiveCheckResult | Skipped | Errored, warnThreshold: number): number {
	switch (result.type) {
		case "no-active":
			io.out("No active credential");
			return EXIT_OK;
		case "checked": {
			const tone = result.ratio >= warnThreshold ? "warning" : "success";
			io.out(`Active ${result.id ?? "(no id)"}: ${paintUiText(io.ui, formatRatio(result.ratio), tone)}`);
			if (!result.persisted) io.err("Refreshed tokens could not be saved");
			return result.persisted ? EXIT_OK : EXIT_FAILURE;
		}
		case "failed":
			io.out(`Active ${result.id ?? "(no id)"}: ${paintUiText(io.ui, formatRatio(-1), "danger")}`);
			return EXIT_FAILURE;
		case "skipped":
			io.err(describeSkipped(result));
			return EXIT_FAILURE;
		case "error":
			io.err(`Check failed: ${result.message}`);
			return EXIT_FAILURE;
	}
}

function reportSwitch(io: CliIO, result: SwitchResult | AutoFailoverResult | Skipped | Errored): number {
	switch (result.type) {
		case "switched":
			io.out(`Switched to ${result.id} (${formatRatio(result.ratio)})`);
			if (result.previousId) io.out(`Previous credential ${result.previousId} returned to the reserve pool`);
			return EXIT_OK;
		case "none-available":
			io.err("No usable backup credential in the reserve pool");
			return EXIT_FAILURE;
		case "failed":
			io.err(`No usable backup: ${describeSwitchFailure(result.failure)}`);
			return EXIT_FAILURE;
		case "skipped":
			io.err(describeSkipped(result));
			return EXIT_FAILURE;
		case "error":
			io.err(`Switch failed: ${result.message}`);
			return EXIT_FAILURE;
		default:
			io.err(describeSwitchFailure(result));
			return EXIT_FAILURE;
	}
}

async function runStatus(coordinator: Coordinator, io: CliIO): Promise<number> {
	const snapshot = await coordinator.refreshSnapshot();
	for (const line of formatSnapshot(io.ui, snapshot, coordinator.config.warnThreshold)) {
		io.out(line);
	}
	return EXIT_OK;
}

async function runImport(coordinator: Coordinator, io: CliIO, args: string[]): Promise<number> {
	const source = args[0];
	const text = source === undefined || source === "-" ? await io.readStdin() : await io.readFile(source);
	const result = await coordinator.importText(text);
	if ("type" in result) {
		io.err(`Import failed: ${result.message}`);
		return EXIT_FAILURE;
	}
	if (!result.persisted) {
		io.err("Import failed: could not save the reserve pool");
		return EXIT_FAILURE;
	}
	const skipped = result.skipped > 0 ? `, skipped ${result.skipped} duplicate(s)` : "";
	io.out(`Imported ${result.added} credential(s)${skipped}`);
	return EXIT_OK;
}

/**
 * Prints the exhaustion warning raised by a user-initiated active check.
 */
function reportExhaustion(coordinator: Coordinator, io: CliIO): void {
	coordinator.on("exhausted", ({ id, ratio }) => {
		const label = id ? `Active credential ${id}` : "Active credential";
		io.err(paintUiText(io.ui, `${label} is exhausted: ${formatRatio(ratio)}. Switch credentials now.`, "danger"));
	});
}

async function runCheck(coordinator: Coordinator, io: CliIO, parsed: ParsedCommand): Promise<number> {
	const warnThreshold = coordinator.config.warnThreshold;
	reportExhaustion(coordinator, io);
	if (parsed.args.length > 0) {
		const result = await coordinator.checkSelected(parsed.args);
		return reportReserveCheck(io, result, warnThreshold);
	}

	const activeExit = reportActiveCheck(io, await coordinator.checkActive(true), warnThreshold);
	if (!parsed.all) return activeExit;
	const reserveExit = reportReserveCheck(io, await coordinator.checkAll(), warnThreshold);
	return Math.max(activeExit, reserveExit);
}

function reportReserveCheck(
	io: CliIO,
	result: Awaited<ReturnType<Coordinator["checkAll"]>>,
	warnThreshold: number,
): number {
	if (result.type === "skipped") {
		io.err(describeSkipped(result));
		return EXIT_FAILURE;
	}
	if (result.type === "error") {
		io.err(`Check failed: ${result.message}`);
		return EXIT_FAILURE;
	}
	if (result.rows.length === 0) {
		io.out("No reserve credentials to check");
	}
	for (const row of result.rows) {
		io.out(formatCheckRow(io.ui, row, warnThreshold));
	}
	return result.rows.every((row) => row.persisted) ? EXIT_OK : EXIT_FAILURE;
}

async function confirmOrRefuse(io: CliIO, question: string, assumeYes: boolean): Promise<boolean> {
	if (assumeYes) return true;
	if (!io.interactive) {
		io.err("Confirmation needed; pass --yes to run without a prompt");
		return false;
	}
	return io.confirm(question);
}

async function runSwitch(coordinator: Coordinator, io: CliIO, parsed: ParsedCommand): Promise<number> {
	const [id = ""] = parsed.args;
	const result = await coordinator.switchTo(id, (candidate, usage) =>
		confirmOrRefuse(io, `Switch to ${candidate.id}? ${formatRatio(usage.ratio)}`, parsed.yes),
	);
	return reportSwitch(io, result);
}

async function runDelete(coordinator: Coordinator, io: CliIO, parsed: ParsedCommand): Promise<number> {
	if (!(await confirmOrRefuse(io, `Delete ${parsed.args.length} credential(s)?`, parsed.yes))) {
		return EXIT_FAILURE;
	}
	const result = await coordinator.deleteCredentials(parsed.args);
	if (result.type === "error") {
		io.err(`Delete failed: ${result.message}`);
		return EXIT_FAILURE;
	}
	if (result.type === "persist-failed") {
		io.err("Delete failed: could not save the reserve pool");
		return EXIT_FAILURE;
	}
	if (result.removed === 0) {
		io.err("No matching reserve credentials");
		return EXIT_FAILURE;
	}
	io.out(`Deleted ${result.removed} credential(s)`);
	return EXIT_OK;
}

async function runReconcile(coordinator: Coordinator, io: CliIO): Promise<number> {
	const result = await coordinator.reconcile();
	if ("type" in result) {
		io.err(`Reconcile failed: ${result.message}`);
		return EXIT_FAILURE;
	}
	if (!result.activeId) {
		io.out("No active credential");
	} else {
		if (result.assignedId) io.out(`Active credential now has id ${result.activeId}`);
		if (result.synced) io.out(`Synced active credential ${result.activeId} into the reserve pool`);
		if (!result.assignedId && !result.synced) io.out("Nothing to reconcile");
	}
	return result.persisted ? EXIT_OK : EXIT_FAILURE;
}

async function runWatch(coordinator: Coordinator, io: CliIO, parsed: ParsedCommand): Promise<number> {
	reportExhaustion(coordinator, io);
	coordinator.on("payment-error", ({ file }) => {
		io.err(paintUiText(io.ui, `Billing error detected in ${file}; switching credentials (${BILLING_URL})`, "warning"));
	});
	coordinator.on("failover", ({ id, previousId }) => {
		io.out(paintUiText(io.ui, `Failed over to ${id}${previousId ? ` (from ${previousId})` : ""}`, "success"));
	});
	coordinator.on("no-backup", ({ reason, id }) => {
		io.err(paintUiText(io.ui, `No usable backup credential (${reason}${id ? `: ${id}` : ""})`, "danger"));
	});
	coordinator.on("result", (report) => {
		if (report.operation === "active-check" && report.result.type === "checked") {
			io.out(`Active ${report.result.id ?? "(no id)"}: ${formatRatio(report.result.ratio)}`);
		} else if (report.operation === "active-check" && report.result.type === "failed") {
			io.out(`Active ${report.result.id ?? "(no id)"}: ${formatRatio(-1)}`);
		}
	});

	await coordinator.reconcile();
	try {
		await coordinator.startMonitoring({ logWatch: parsed.logWatch });
	} catch (error) {
		io.err(`Could not start monitoring: ${error instanceof Error ? error.message : String(error)}`);
		return EXIT_FAILURE;
	}
	io.out(`Monitoring every ${Math.round(coordinator.config.checkIntervalMs / 1000)}s; press Ctrl+C to stop`);

	await io.waitForExit();
	const result = await coordinator.shutdown({ clearActive: parsed.clearActiveOnExit });
	if (!result.synced) io.err("Active credential could not be synced into the reserve pool");
	if (parsed.clearActiveOnExit && result.cleared) io.out("Active credential cleared");
	return result.synced ? EXIT_OK : EXIT_FAILURE;
}

export interface RunCliOptions {
	io?: CliIO;
	config?: PoolConfig;
	coordinator?: Coordinator;
}

/**
 * Runs one command and returns the process exit code.
 */
export async function runCli(argv: readonly string[], options: RunCliOptions = {}): Promise<number> {
	const io = options.io ?? createProcessIO();
	const parsedResult = parseCliArgs(argv);
	if (parsedResult.type === "usage") {
		if (parsedResult.message) io.err(parsedResult.message);
		io.err(USAGE);
		return EXIT_USAGE;
	}
	const { parsed } = parsedResult;

	const coordinator = options.coordinator ?? createCoordinator(options.config ?? loadPoolConfig());
	if (parsed.command === "status") {
		return runStatus(coordinator, io);
	}
	return runLocked(coordinator, io, parsed);
}

async function runLocked(coordinator: Coordinator, io: CliIO, parsed: ParsedCommand): Promise<number> {
	try {
		await coordinator.acquireLock();
	} catch (error) {
		if (error instanceof InstanceLockError) {
			io.err(error.message);
			return EXIT_FAILURE;
		}
		throw error;
	}

	try {
		switch (parsed.command) {
			case "status":
				return await runStatus(coordinator, io);
			case "import":
				return await runImport(coordinator, io, parsed.args);
			case "check":
				return await runCheck(coordinator, io, parsed);
			case "switch":
				return await runSwitch(coordinator, io, parsed);
			case "auto-switch":
				return reportSwitch(io, await coordinator.autoSwitch("user"));
			case "delete":
				return await runDelete(coordinator, io, parsed);
			case "reconcile":
				return await runReconcile(coordinator, io);
			case "watch":
				return await runWatch(coordinator, io, parsed);
		}
	} finally {
		await coordinator.releaseLock();
	}
}
