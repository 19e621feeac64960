import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { promises as fs, existsSync } from "node:fs";
import { join } from "node:path";
import {
	StorageError,
	formatStorageErrorHint,
	generateCredentialId,
	normalizeReserveDocument,
	parseActiveDocument,
	writeJsonAtomic,
} from "../lib/storage.js";
import { createTempStore, credential, type TempStore } from "./helpers/store.js";

describe("storage", () => {
	let temp: TempStore;

	beforeEach(async () => {
		temp = await createTempStore();
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await temp.cleanup();
	});

	describe("loadActive", () => {
		it("returns null when the document is missing", async () => {
			expect(await temp.store.loadActive()).toBeNull();
		});

		it("returns null for malformed JSON", async () => {
			await fs.mkdir(join(temp.activePath, ".."), { recursive: true });
			await fs.writeFile(temp.activePath, "{not json", "utf-8");
			expect(await temp.store.loadActive()).toBeNull();
		});

		it("reads tokens and converts a numeric id to a string", async () => {
			await temp.writeActive({ access_token: "at-a", refresh_token: "rt-a", id: 1700000000000 });
			expect(await temp.store.loadActive()).toEqual({
				accessToken: "at-a",
				refreshToken: "rt-a",
				id: "1700000000000",
			});
		});

		it("strips a UTF-8 BOM before parsing", async () => {
			await fs.mkdir(join(temp.activePath, ".."), { recursive: true });
			await fs.writeFile(temp.activePath, `\uFEFF${JSON.stringify({ access_token: "at", refresh_token: "rt" })}`);
			expect(await temp.store.loadActive()).toEqual({ accessToken: "at", refreshToken: "rt" });
		});

		it("treats a document without tokens as absent", async () => {
			await temp.writeActive({});
			expect(await temp.store.loadActive()).toBeNull();
		});
	});

	describe("saveActive", () => {
		it("merges into the existing document without dropping other keys", async () => {
			await temp.writeActive({ access_token: "old", refresh_token: "old-rt", user: { name: "someone" } });

			const ok = await temp.store.saveActive({ id: "7", accessToken: "at-7", refreshToken: "rt-7" });

			expect(ok).toBe(true);
			expect(await temp.readActiveRaw()).toEqual({
				access_token: "at-7",
				refresh_token: "rt-7",
				id: "7",
				user: { name: "someone" },
			});
		});

		it("removes a stale id when the credential has none", async () => {
			await temp.writeActive({ access_token: "a", refresh_token: "r", id: "5" });
			await temp.store.saveActive({ accessToken: "b", refreshToken: "s" });
			expect(await temp.readActiveRaw()).toEqual({ access_token: "b", refresh_token: "s" });
		});

		it("creates the parent directory", async () => {
			expect(await temp.store.saveActive({ id: "1", accessToken: "a", refreshToken: "r" })).toBe(true);
			expect(existsSync(temp.activePath)).toBe(true);
		});
	});

	describe("clearActive", () => {
		it("replaces the document with an empty object", async () => {
			await temp.writeActive({ access_token: "a", refresh_token: "r", id: "1" });
			expect(await temp.store.clearActive()).toBe(true);
			expect(await temp.readActiveRaw()).toEqual({});
			expect(await temp.store.loadActive()).toBeNull();
		});
	});

	describe("loadReserve", () => {
		it("initializes a missing document to an empty pool on disk", async () => {
			expect(await temp.store.loadReserve()).toEqual([]);
			expect(await temp.readReserveRaw()).toEqual([]);
		});

		it("returns an empty pool for a corrupt document and leaves it untouched", async () => {
			await fs.mkdir(join(temp.reservePath, ".."), { recursive: true });
			await fs.writeFile(temp.reservePath, "[{broken", "utf-8");

			expect(await temp.store.loadReserve()).toEqual([]);
			expect(await fs.readFile(temp.reservePath, "utf-8")).toBe("[{broken");
		});

		it("accepts the wrapped { tokens } form", async () => {
			await temp.writeReserve({
				tokens: [{ id: "1", access_token: "at-1", refresh_token: "rt-1", status: "active", ratio: 0.25 }],
			});
			expect(await temp.store.loadReserve()).toEqual([
				{ id: "1", accessToken: "at-1", refreshToken: "rt-1", status: "active", lastKnownRatio: 0.25 },
			]);
		});

		it("assigns ids to entries without one and persists them", async () => {
			await temp.writeReserve([{ access_token: "at-x", refresh_token: "rt-x" }]);

			const pool = await temp.store.loadReserve();

			expect(pool).toHaveLength(1);
			expect(pool[0]?.id).toMatch(/^\d+$/);
			expect(await temp.readReserveRaw()).toEqual([
				{ id: pool[0]?.id, access_token: "at-x", refresh_token: "rt-x", status: "active" },
			]);
		});
	});

	describe("saveReserve", () => {
		it("writes a bare array in snake_case", async () => {
			const ok = await temp.store.saveReserve([
				credential("1", { lastKnownRatio: -1, status: "invalid" }),
				credential("2"),
			]);

			expect(ok).toBe(true);
			expect(await temp.readReserveRaw()).toEqual([
				{ id: "1", refresh_token: "rt-1", access_token: "at-1", status: "invalid", ratio: -1 },
				{ id: "2", refresh_token: "rt-2", access_token: "at-2", status: "active" },
			]);
		});

		it("round-trips the same ids, tokens and statuses from either document shape", async () => {
			const pool = [credential("1", { lastKnownRatio: 0.5 }), credential("2", { status: "low-quota", lastKnownRatio: 0.95 })];
			await temp.store.saveReserve(pool);
			const fromBare = await temp.store.loadReserve();

			await temp.writeReserve({ tokens: await temp.readReserveRaw() });
			const fromWrapped = await temp.store.loadReserve();

			expect(fromBare).toEqual(pool);
			expect(fromWrapped).toEqual(pool);
		});

		it("returns false and keeps the original document when the rename fails", async () => {
			await temp.store.saveReserve([credential("1")]);
			const before = await fs.readFile(temp.reservePath, "utf-8");

			vi.spyOn(fs, "rename").mockRejectedValue(Object.assign(new Error("disk gone"), { code: "EIO" }));
			const ok = await temp.store.saveReserve([credential("2")]);

			expect(ok).toBe(false);
			expect(await fs.readFile(temp.reservePath, "utf-8")).toBe(before);
			const leftovers = (await fs.readdir(join(temp.reservePath, ".."))).filter((name) => name.endsWith(".tmp"));
			expect(leftovers).toEqual([]);
		});
	});

	describe("writeJsonAtomic", () => {
		it("wraps failures in a StorageError carrying code and hint", async () => {
			const target = join(temp.dir, "doc.json");
			vi.spyOn(fs, "rename").mockRejectedValue(Object.assign(new Error("busy"), { code: "ENOSPC" }));

			const error = await writeJsonAtomic(target, { a: 1 }).catch((caught: unknown) => caught);

			expect(error).toBeInstanceOf(StorageError);
			if (error instanceof StorageError) {
				expect(error.code).toBe("ENOSPC");
				expect(error.path).toBe(target);
				expect(error.hint).toBe(`Disk is full. Free up space and try again. Path: ${target}`);
			}
		});
	});

	describe("formatStorageErrorHint", () => {
		it("explains a locked file", () => {
			const error = Object.assign(new Error("busy"), { code: "EBUSY" });
			expect(formatStorageErrorHint(error, "/tmp/x.json")).toBe(
				"File is locked at /tmp/x.json. The file may be open in another program. Close any editors or processes accessing it.",
			);
		});
	});

	describe("normalizeReserveDocument", () => {
		it("normalizes statuses, ratios and ids", () => {
			const { credentials, mintedIds } = normalizeReserveDocument(
				[
					{ id: 42, access_token: "a", refresh_token: "r", status: "weird", ratio: 1.5 },
					{ id: "43", access_token: "b", refresh_token: "s", status: "low-quota", ratio: -1 },
					{ id: "44", access_token: "", refresh_token: "" },
					"not an object",
				],
				1000,
			);

			expect(mintedIds).toBe(0);
			expect(credentials).toEqual([
				{ id: "42", accessToken: "a", refreshToken: "r", status: "active" },
				{ id: "43", accessToken: "b", refreshToken: "s", status: "low-quota", lastKnownRatio: -1 },
			]);
		});

		it("mints ids that avoid the ones already present", () => {
			const { credentials, mintedIds } = normalizeReserveDocument(
				[
					{ id: "1000", access_token: "a", refresh_token: "r" },
					{ access_token: "b", refresh_token: "s" },
					{ access_token: "c", refresh_token: "t" },
				],
				1000,
			);
			expect(mintedIds).toBe(2);
			expect(credentials.map((entry) => entry.id)).toEqual(["1000", "1001", "1002"]);
		});

		it("returns nothing for documents of the wrong shape", () => {
			expect(normalizeReserveDocument({ other: [] }).credentials).toEqual([]);
			expect(normalizeReserveDocument(null).credentials).toEqual([]);
		});
	});

	describe("generateCredentialId", () => {
		it("bumps the clock value past taken ids", () => {
			expect(generateCredentialId(5, new Set(["5", "6"]))).toBe("7");
			expect(generateCredentialId(5.9)).toBe("5");
		});
	});

	describe("parseActiveDocument", () => {
		it("rejects arrays", () => {
			expect(parseActiveDocument([{ access_token: "a" }])).toBeNull();
		});
	});
});
