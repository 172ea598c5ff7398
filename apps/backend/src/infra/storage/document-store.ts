import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

/**
 * Persistence for a single JSON document. `read` returns the raw stored value
 * (or undefined when nothing is stored); owners validate its shape.
 */
export interface DocumentStore<T> {
	read(): Promise<unknown>;
	write(value: T): Promise<void>;
	clear?(): Promise<void>;
}

export class StoreReadError extends Error {
	readonly code = "STORE_READ_ERROR" as const;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "StoreReadError";
	}
}

export class StoreWriteError extends Error {
	readonly code = "STORE_WRITE_ERROR" as const;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "StoreWriteError";
	}
}

export function createInMemoryDocumentStore<T>(initial?: T): DocumentStore<T> & { peek(): T | undefined } {
	let data: T | undefined = initial === undefined ? undefined : structuredClone(initial);

	return {
		read: () => Promise.resolve(data === undefined ? undefined : structuredClone(data)),
		write: (value: T) => {
			data = structuredClone(value);
			return Promise.resolve();
		},
		clear: () => {
			data = undefined;
			return Promise.resolve();
		},
		peek: () => data
	};
}

/**
 * Whole-document JSON persistence. Writes are serialized and land through a
 * temporary file and a rename, so readers never see a partial document.
 */
export class JsonFileDocumentStore<T> implements DocumentStore<T> {
	private readonly filePath: string;
	private queue: Promise<void> = Promise.resolve();

	constructor(filePath: string) {
		this.filePath = filePath;
	}

	get location(): string {
		return this.filePath;
	}

	async read(): Promise<unknown> {
		await this.queue;

		let raw: string;
		try {
			raw = await readFile(this.filePath, "utf-8");
		} catch (error) {
			if (isMissingFileError(error)) {
				return undefined;
			}
			throw new StoreReadError(`Failed to read ${this.filePath}`, { cause: error });
		}

		try {
			return JSON.parse(raw) as unknown;
		} catch (error) {
			throw new StoreReadError(`${this.filePath} does not contain valid JSON`, { cause: error });
		}
	}

	write(value: T): Promise<void> {
		const serialized = `${JSON.stringify(value, null, 2)}\n`;
		const next = this.queue.then(() => this.persist(serialized));
		this.queue = next.catch(() => undefined);
		return next;
	}

	async clear(): Promise<void> {
		await this.queue;
		await rm(this.filePath, { force: true });
	}

	private async persist(serialized: string): Promise<void> {
		const temporaryPath = `${this.filePath}.${process.pid}.tmp`;
		try {
			await mkdir(path.dirname(this.filePath), { recursive: true });
			await writeFile(temporaryPath, serialized, "utf-8");
			await rename(temporaryPath, this.filePath);
		} catch (error) {
			throw new StoreWriteError(`Failed to write ${this.filePath}`, { cause: error });
		}
	}
}

export function createJsonFileDocumentStore<T>(filePath: string): JsonFileDocumentStore<T> {
	return new JsonFileDocumentStore<T>(filePath);
}

function isMissingFileError(error: unknown): boolean {
	return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
