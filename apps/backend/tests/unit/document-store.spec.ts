import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
	StoreReadError,
	createInMemoryDocumentStore,
	createJsonFileDocumentStore
} from "../../src/infra/storage/document-store.js";

interface Counter {
	count: number;
}

describe("JsonFileDocumentStore", () => {
	let directory: string;

	beforeEach(async () => {
		directory = await mkdtemp(path.join(tmpdir(), "tutor-store-"));
	});

	afterEach(async () => {
		await rm(directory, { recursive: true, force: true });
	});

	it("returns undefined when nothing has been written", async () => {
		const store = createJsonFileDocumentStore<Counter>(path.join(directory, "missing.json"));

		await expect(store.read()).resolves.toBeUndefined();
	});

	it("creates parent directories and round-trips the document", async () => {
		const filePath = path.join(directory, "nested", "counter.json");
		const store = createJsonFileDocumentStore<Counter>(filePath);

		await store.write({ count: 2 });

		await expect(store.read()).resolves.toEqual({ count: 2 });
		await expect(readFile(filePath, "utf-8")).resolves.toBe('{\n  "count": 2\n}\n');
	});

	it("applies concurrent writes in call order", async () => {
		const store = createJsonFileDocumentStore<Counter>(path.join(directory, "counter.json"));

		await Promise.all([store.write({ count: 1 }), store.write({ count: 2 }), store.write({ count: 3 })]);

		await expect(store.read()).resolves.toEqual({ count: 3 });
	});

	it("raises a read error for corrupt JSON", async () => {
		const filePath = path.join(directory, "corrupt.json");
		await writeFile(filePath, "{ not json", "utf-8");
		const store = createJsonFileDocumentStore<Counter>(filePath);

		await expect(store.read()).rejects.toBeInstanceOf(StoreReadError);
	});

	it("removes the file on clear", async () => {
		const store = createJsonFileDocumentStore<Counter>(path.join(directory, "counter.json"));
		await store.write({ count: 1 });

		await store.clear();

		await expect(store.read()).resolves.toBeUndefined();
	});
});

describe("createInMemoryDocumentStore", () => {
	it("hands out copies so callers cannot mutate stored state", async () => {
		const store = createInMemoryDocumentStore<Counter>({ count: 1 });

		const first = await store.read();
		if (typeof first === "object" && first !== null && "count" in first) {
			first.count = 99;
		}

		expect(store.peek()).toEqual({ count: 1 });
	});
});
