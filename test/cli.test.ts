import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
	EXIT_FAILURE,
	EXIT_OK,
	EXIT_USAGE,
	describeSwitchFailure,
	parseCliArgs,
	runCli,
	type CliIO,
} from "../lib/cli.js";
import { Coordinator } from "../lib/coordinator.js";
import { acquireInstanceLock } from "../lib/instance-lock.js";
import { PLAIN_UI } from "../lib/ui/format.js";
import { FakeOracle } from "./helpers/oracle.js";
import { createTempStore, credential, testConfig, type TempStore } from "./helpers/store.js";

interface FakeIO extends CliIO {
	stdout: string[];
	stderr: string[];
}

function createFakeIO(overrides: Partial<CliIO> = {}): FakeIO {
	const stdout: string[] = [];
	const stderr: string[] = [];
	return {
		stdout,
		stderr,
		out: (line) => stdout.push(line),
		err: (line) => stderr.push(line),
		readStdin: async () => "",
		readFile: async () => "",
		confirm: async () => true,
		waitForExit: async () => undefined,
		interactive: false,
		ui: PLAIN_UI,
		...overrides,
	};
}

describe("parseCliArgs", () => {
	it("parses a command with flags", () => {
		expect(parseCliArgs(["switch", "7", "--yes"])).toEqual({
			type: "ok",
			parsed: { command: "switch", args: ["7"], all: false, yes: true, logWatch: true, clearActiveOnExit: false },
		});
	});

	it("reads watch flags", () => {
		const result = parseCliArgs(["watch", "--no-log-watch", "--clear-active-on-exit"]);
		expect(result.type === "ok" && result.parsed).toMatchObject({ logWatch: false, clearActiveOnExit: true });
	});

	it.each([
		[["switch"], "switch takes exactly one id"],
		[["switch", "1", "2"], "switch takes exactly one id"],
		[["delete"], "delete needs at least one id"],
		[["check", "--all", "1"], "check takes --all or ids, not both"],
		[["import", "a.txt", "b.txt"], "import takes at most one file"],
		[["launch"], "Unknown command: launch"],
	])("rejects %j", (argv, message) => {
		expect(parseCliArgs(argv)).toEqual({ type: "usage", message });
	});

	it("asks for usage without a command or with --help", () => {
		expect(parseCliArgs([])).toEqual({ type: "usage" });
		expect(parseCliArgs(["status", "--help"])).toEqual({ type: "usage" });
	});

	it("reports unknown options", () => {
		const result = parseCliArgs(["status", "--bogus"]);
		expect(result.type).toBe("usage");
	});
});

describe("describeSwitchFailure", () => {
	it("describes each failure", () => {
		expect(describeSwitchFailure({ type: "not-found", id: "9" })).toBe("No reserve credential with id 9");
		expect(describeSwitchFailure({ type: "query-failed", id: "9" })).toBe("Usage query for 9 failed; not switching");
		expect(describeSwitchFailure({ type: "exhausted", id: "9", ratio: 1 })).toBe(
			"Credential 9 is exhausted (Used: 100.0%, remaining: 0.0%)",
		);
		expect(describeSwitchFailure({ type: "cancelled", id: "9" })).toBe("Switch cancelled");
		expect(describeSwitchFailure({ type: "persist-failed", id: "9", target: "reserve" })).toBe(
			"Switch to 9 failed: could not save the reserve document",
		);
	});
});

describe("runCli", () => {
	let temp: TempStore;
	let oracle: FakeOracle;
	let coordinator: Coordinator;

	beforeEach(async () => {
		temp = await createTempStore();
		oracle = new FakeOracle();
		coordinator = new Coordinator({ config: testConfig(temp), store: temp.store, oracle });
	});

	afterEach(async () => {
		coordinator.stopMonitoring();
		await coordinator.releaseLock();
		vi.restoreAllMocks();
		await temp.cleanup();
	});

	it("prints usage for bad arguments", async () => {
		const io = createFakeIO();
		expect(await runCli(["switch"], { io, coordinator })).toBe(EXIT_USAGE);
		expect(io.stderr[0]).toBe("switch takes exactly one id");
		expect(io.stderr[1]?.startsWith("Usage: credential-reserve <command>")).toBe(true);
	});

	it("shows the status of the active slot and the pool", async () => {
		await temp.writeActive({ access_token: "at-5", refresh_token: "rt-5", id: "5" });
		await temp.store.saveReserve([credential("5"), credential("6", { lastKnownRatio: 0.5 })]);
		const io = createFakeIO();

		expect(await runCli(["status"], { io, coordinator })).toBe(EXIT_OK);
		expect(io.stdout).toEqual([
			"Active credential",
			"-----------------",
			"id: 5",
			"usage: not checked",
			"",
			"Reserve pool (1)",
			"----------------",
			"6               active    Used: 50.0%, remaining: 50.0%",
		]);
	});

	it("imports from a file", async () => {
		const io = createFakeIO({ readFile: async () => "rt-a----at-a\nrt-a----at-a\n" });

		expect(await runCli(["import", "tokens.txt"], { io, coordinator })).toBe(EXIT_OK);
		expect(io.stdout).toEqual(["Imported 1 credential(s), skipped 1 duplicate(s)"]);
	});

	it("imports from stdin", async () => {
		const io = createFakeIO({ readStdin: async () => "rt-b----at-b\n" });

		expect(await runCli(["import"], { io, coordinator })).toBe(EXIT_OK);
		expect(io.stdout).toEqual(["Imported 1 credential(s)"]);
	});

	it("checks the active credential by default", async () => {
		await temp.writeActive({ access_token: "at-1", refresh_token: "rt-1", id: "1" });
		oracle.answer("at-1", { ratio: 0.25 });
		const io = createFakeIO();

		expect(await runCli(["check"], { io, coordinator })).toBe(EXIT_OK);
		expect(io.stdout).toEqual(["Active 1: Used: 25.0%, remaining: 75.0%"]);
	});

	it("warns separately when the active credential is exhausted", async () => {
		await temp.writeActive({ access_token: "at-1", refresh_token: "rt-1", id: "1" });
		oracle.answer("at-1", { ratio: 1 });
		const io = createFakeIO();

		expect(await runCli(["check"], { io, coordinator })).toBe(EXIT_OK);
		expect(io.stdout).toEqual(["Active 1: Used: 100.0%, remaining: 0.0%"]);
		expect(io.stderr).toEqual([
			"Active credential 1 is exhausted: Used: 100.0%, remaining: 0.0%. Switch credentials now.",
		]);
	});

	it("checks the active credential and every reserve entry with --all", async () => {
		await temp.writeActive({ access_token: "at-1", refresh_token: "rt-1", id: "1" });
		await temp.store.saveReserve([credential("2")]);
		oracle.answer("at-1", { ratio: 0.25 }).answer("at-2", { ratio: 0.1 });
		const io = createFakeIO();

		expect(await runCli(["check", "--all"], { io, coordinator })).toBe(EXIT_OK);
		expect(io.stdout).toEqual([
			"Active 1: Used: 25.0%, remaining: 75.0%",
			"2               Used: 10.0%, remaining: 90.0%",
		]);
	});

	it("checks only the selected ids", async () => {
		await temp.store.saveReserve([credential("2"), credential("3")]);
		const io = createFakeIO();

		expect(await runCli(["check", "3"], { io, coordinator })).toBe(EXIT_OK);
		expect(io.stdout).toEqual(["3               query failed"]);
	});

	it("switches after confirmation", async () => {
		await temp.store.saveReserve([credential("7")]);
		oracle.answer("at-7", { ratio: 0.1 });
		const confirm = vi.fn(async () => true);
		const io = createFakeIO({ interactive: true, confirm });

		expect(await runCli(["switch", "7"], { io, coordinator })).toBe(EXIT_OK);
		expect(confirm).toHaveBeenCalledWith("Switch to 7? Used: 10.0%, remaining: 90.0%");
		expect(io.stdout).toEqual(["Switched to 7 (Used: 10.0%, remaining: 90.0%)"]);
	});

	it("refuses to prompt without a terminal unless --yes is given", async () => {
		await temp.store.saveReserve([credential("7")]);
		oracle.answer("at-7", { ratio: 0.1 });
		const io = createFakeIO();

		expect(await runCli(["switch", "7"], { io, coordinator })).toBe(EXIT_FAILURE);
		expect(io.stderr).toEqual(["Confirmation needed; pass --yes to run without a prompt", "Switch cancelled"]);
		expect(await temp.store.loadActive()).toBeNull();
	});

	it("reports a switch to an unknown id", async () => {
		const io = createFakeIO();
		expect(await runCli(["switch", "9", "--yes"], { io, coordinator })).toBe(EXIT_FAILURE);
		expect(io.stderr).toEqual(["No reserve credential with id 9"]);
	});

	it("auto-switches to the best candidate", async () => {
		await temp.writeActive({ access_token: "at-0", refresh_token: "rt-0", id: "0" });
		await temp.store.saveReserve([credential("3")]);
		oracle.answer("at-3", { ratio: 0 });
		const io = createFakeIO();

		expect(await runCli(["auto-switch"], { io, coordinator })).toBe(EXIT_OK);
		expect(io.stdout).toEqual([
			"Switched to 3 (Used: 0.0%, remaining: 100.0%)",
			"Previous credential 0 returned to the reserve pool",
		]);
	});

	it("reports an empty pool on auto-switch", async () => {
		const io = createFakeIO();
		expect(await runCli(["auto-switch"], { io, coordinator })).toBe(EXIT_FAILURE);
		expect(io.stderr).toEqual(["No usable backup credential in the reserve pool"]);
	});

	it("deletes with --yes", async () => {
		await temp.store.saveReserve([credential("1"), credential("2")]);
		const io = createFakeIO();

		expect(await runCli(["delete", "1", "--yes"], { io, coordinator })).toBe(EXIT_OK);
		expect(io.stdout).toEqual(["Deleted 1 credential(s)"]);
		expect(await temp.store.loadReserve()).toEqual([credential("2")]);
	});

	it("reports a delete that matched nothing", async () => {
		const io = createFakeIO();
		expect(await runCli(["delete", "9", "-y"], { io, coordinator })).toBe(EXIT_FAILURE);
		expect(io.stderr).toEqual(["No matching reserve credentials"]);
	});

	it("reconciles the active credential", async () => {
		await temp.writeActive({ access_token: "at-2", refresh_token: "rt-2" });
		await temp.store.saveReserve([credential("2")]);
		const io = createFakeIO();

		expect(await runCli(["reconcile"], { io, coordinator })).toBe(EXIT_OK);
		expect(io.stdout).toEqual([
			"Active credential now has id 2",
			"Synced active credential 2 into the reserve pool",
		]);
	});

	it("refuses to run while another process holds the lock", async () => {
		const held = await acquireInstanceLock(temp.reservePath);
		const io = createFakeIO();
		try {
			expect(await runCli(["reconcile"], { io, coordinator })).toBe(EXIT_FAILURE);
			expect(io.stderr[0]?.startsWith("Another credential-reserve process is already running")).toBe(true);
		} finally {
			await held.release();
		}
	});

	it("watches until asked to stop, then syncs and clears the slot", async () => {
		await temp.writeActive({ access_token: "at-5", refresh_token: "rt-5", id: "5" });
		oracle.answer("at-5", { ratio: 0.2 });
		const firstCheck = new Promise((resolve) => {
			coordinator.on("result", (report) => {
				if (report.operation === "active-check") resolve(report);
			});
		});
		const io = createFakeIO({ waitForExit: async () => {
			await firstCheck;
		} });

		expect(await runCli(["watch", "--no-log-watch", "--clear-active-on-exit"], { io, coordinator })).toBe(EXIT_OK);
		expect(io.stdout).toContain("Active credential cleared");
		expect(await temp.readActiveRaw()).toEqual({});
		expect(await temp.store.loadReserve()).toEqual([credential("5", { lastKnownRatio: 0.2 })]);
	});

	it("exits with a failure when monitoring cannot start", async () => {
		const config = testConfig(temp);
		const local = new Coordinator({
			config: { ...config, logWatch: { ...config.logWatch, pattern: "Reload (tokens" } },
			store: temp.store,
			oracle,
		});
		const waitForExit = vi.fn(async () => undefined);
		const io = createFakeIO({ waitForExit });

		expect(await runCli(["watch"], { io, coordinator: local })).toBe(EXIT_FAILURE);
		expect(io.stderr[0]?.startsWith("Could not start monitoring: ")).toBe(true);
		expect(local.isMonitoring).toBe(false);
		expect(waitForExit).not.toHaveBeenCalled();
	});
});
