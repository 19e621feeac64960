import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { FailoverEngine } from "../lib/failover.js";
import { FakeOracle } from "./helpers/oracle.js";
import { createTempStore, credential, type TempStore } from "./helpers/store.js";

describe("FailoverEngine", () => {
	let temp: TempStore;
	let oracle: FakeOracle;
	let engine: FailoverEngine;

	beforeEach(async () => {
		temp = await createTempStore();
		oracle = new FakeOracle();
		engine = new FailoverEngine({ store: temp.store, oracle });
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await temp.cleanup();
	});

	describe("promote", () => {
		it("swaps the active credential with the reserve entry", async () => {
			await temp.writeActive({ access_token: "at-5", refresh_token: "rt-5", id: "5" });
			await temp.store.saveReserve([credential("7")]);
			oracle.answer("at-7", { ratio: 0.2, info: { total: 100, used: 20, remaining: 80 } });

			const result = await engine.promote("7");

			expect(result).toEqual({
				type: "switched",
				id: "7",
				previousId: "5",
				ratio: 0.2,
				info: { total: 100, used: 20, remaining: 80 },
			});
			expect(await temp.store.loadActive()).toEqual({ id: "7", accessToken: "at-7", refreshToken: "rt-7" });
			expect(await temp.store.loadReserve()).toEqual([credential("5")]);
		});

		it("merges the previous active credential into its existing entry", async () => {
			await temp.writeActive({ access_token: "at-5-new", refresh_token: "rt-5-new", id: "5" });
			await temp.store.saveReserve([
				credential("7"),
				credential("5", { lastKnownRatio: 0.5 }),
				credential("8"),
			]);
			oracle.answer("at-7", { ratio: 0.1 });

			await engine.promote("7", { demotedRatio: 0.95 });

			expect(await temp.store.loadReserve()).toEqual([
				{ id: "5", accessToken: "at-5-new", refreshToken: "rt-5-new", status: "low-quota", lastKnownRatio: 0.95 },
				credential("8"),
			]);
		});

		it("reuses the id of the pool entry sharing an id-less active credential's refresh token", async () => {
			await temp.writeActive({ access_token: "at-x", refresh_token: "rt-3" });
			await temp.store.saveReserve([credential("3"), credential("7")]);
			oracle.answer("at-7", { ratio: 0.1 });

			const result = await engine.promote("7");

			expect(result.type === "switched" && result.previousId).toBe("3");
			expect(await temp.store.loadReserve()).toEqual([
				{ id: "3", accessToken: "at-x", refreshToken: "rt-3", status: "active" },
			]);
		});

		it("mints an id for an id-less active credential with no match", async () => {
			await temp.writeActive({ access_token: "at-x", refresh_token: "rt-x" });
			await temp.store.saveReserve([credential("7")]);
			oracle.answer("at-7", { ratio: 0.1 });

			const result = await engine.promote("7");
			const pool = await temp.store.loadReserve();

			expect(pool).toHaveLength(1);
			expect(pool[0]?.refreshToken).toBe("rt-x");
			expect(result.type === "switched" && result.previousId).toBe(pool[0]?.id);
		});

		it("promotes without demoting when the slot is empty", async () => {
			await temp.store.saveReserve([credential("7"), credential("8")]);
			oracle.answer("at-7", { ratio: 0 });

			const result = await engine.promote("7");

			expect(result).toEqual({ type: "switched", id: "7", ratio: 0 });
			expect(await temp.store.loadReserve()).toEqual([credential("8")]);
		});

		it("activates the refreshed tokens and stores them on nothing else", async () => {
			await temp.writeActive({ access_token: "at-5", refresh_token: "rt-5", id: "5" });
			await temp.store.saveReserve([credential("7")]);
			oracle.answer("at-7", { ratio: 0.3, refreshedTokens: { accessToken: "at-7b", refreshToken: "rt-7b" } });

			await engine.promote("7");

			expect(await temp.readActiveRaw()).toEqual({ access_token: "at-7b", refresh_token: "rt-7b", id: "7" });
			expect(await temp.store.loadReserve()).toEqual([credential("5")]);
		});

		it("returns not-found for an unknown id", async () => {
			await temp.store.saveReserve([credential("1")]);
			expect(await engine.promote("9")).toEqual({ type: "not-found", id: "9" });
			expect(oracle.calls).toEqual([]);
		});

		it("blocks promotion when the query fails and marks the entry invalid", async () => {
			await temp.writeActive({ access_token: "at-5", refresh_token: "rt-5", id: "5" });
			await temp.store.saveReserve([credential("7")]);

			expect(await engine.promote("7")).toEqual({ type: "query-failed", id: "7" });
			expect(await temp.store.loadActive()).toEqual({ id: "5", accessToken: "at-5", refreshToken: "rt-5" });
			expect(await temp.store.loadReserve()).toEqual([credential("7", { status: "invalid", lastKnownRatio: -1 })]);
		});

		it("blocks promotion of an exhausted credential but keeps its refreshed tokens", async () => {
			await temp.store.saveReserve([credential("7")]);
			oracle.answer("at-7", { ratio: 1, refreshedTokens: { accessToken: "at-7b", refreshToken: "rt-7b" } });

			expect(await engine.promote("7")).toEqual({ type: "exhausted", id: "7", ratio: 1 });
			expect(await temp.store.loadActive()).toBeNull();
			expect(await temp.store.loadReserve()).toEqual([
				{ id: "7", accessToken: "at-7b", refreshToken: "rt-7b", status: "low-quota", lastKnownRatio: 1 },
			]);
		});

		it("leaves everything but the fresh ratio alone when the user cancels", async () => {
			await temp.writeActive({ access_token: "at-5", refresh_token: "rt-5", id: "5" });
			await temp.store.saveReserve([credential("7")]);
			oracle.answer("at-7", { ratio: 0.4 });
			const confirm = vi.fn(async () => false);

			expect(await engine.promote("7", { confirm })).toEqual({ type: "cancelled", id: "7" });
			expect(confirm).toHaveBeenCalledWith(credential("7"), { ratio: 0.4 });
			expect(await temp.store.loadActive()).toEqual({ id: "5", accessToken: "at-5", refreshToken: "rt-5" });
			expect(await temp.store.loadReserve()).toEqual([credential("7", { lastKnownRatio: 0.4 })]);
		});

		it("reports persist-failed when the active document cannot be written", async () => {
			await temp.store.saveReserve([credential("7")]);
			oracle.answer("at-7", { ratio: 0.1 });
			vi.spyOn(temp.store, "saveActive").mockResolvedValue(false);

			expect(await engine.promote("7")).toEqual({ type: "persist-failed", id: "7", target: "active" });
			expect((await temp.store.loadReserve()).map((entry) => entry.id)).toEqual(["7"]);
		});
	});

	describe("autoFailover", () => {
		it("promotes the entry with the most headroom", async () => {
			await temp.writeActive({ access_token: "at-0", refresh_token: "rt-0", id: "0" });
			await temp.store.saveReserve([
				credential("1", { lastKnownRatio: 0.95, status: "low-quota" }),
				credential("2", { lastKnownRatio: 0.3 }),
				credential("3"),
			]);
			oracle.answer("at-3", { ratio: 0.05 });

			const result = await engine.autoFailover();

			expect(result).toEqual({ type: "switched", id: "3", previousId: "0", ratio: 0.05 });
			expect((await temp.store.loadReserve()).map((entry) => entry.id)).toEqual(["0", "1", "2"]);
		});

		it("reports none-available when every entry is at the warn threshold", async () => {
			await temp.store.saveReserve([credential("1", { lastKnownRatio: 0.92 })]);
			expect(await engine.autoFailover()).toEqual({ type: "none-available" });
			expect(oracle.calls).toEqual([]);
		});

		it("does not try a second candidate after a failed admission query", async () => {
			await temp.store.saveReserve([credential("1"), credential("2", { lastKnownRatio: 0.1 })]);

			const result = await engine.autoFailover();

			expect(result).toEqual({ type: "failed", failure: { type: "query-failed", id: "1" } });
			expect(oracle.calls.map((call) => call.tokens.accessToken)).toEqual(["at-1"]);
		});

		it("skips the active credential's own pool entry", async () => {
			await temp.writeActive({ access_token: "at-5", refresh_token: "rt-5", id: "5" });
			await temp.store.saveReserve([credential("5"), credential("6", { lastKnownRatio: 0.5 })]);
			oracle.answer("at-6", { ratio: 0.5 });

			const result = await engine.autoFailover();

			expect(result.type === "switched" && result.id).toBe("6");
			expect(await temp.store.loadReserve()).toEqual([credential("5")]);
		});
	});
});
