import { createLinkedAbort, isRecord, sleep, trimTrailingSlash } from "../llm/provider-http.js";

export interface Embedder {
	readonly model: string;
	embed(texts: string[]): Promise<number[][]>;
}

export const DEFAULT_HASHING_DIMENSION = 256;

/**
 * Deterministic feature-hashing embedder. Words and character trigrams are
 * hashed into a fixed number of signed buckets, so texts in scripts without
 * word spacing still share features. Identical texts always map to identical
 * unit vectors.
 */
export class HashingEmbedder implements Embedder {
	readonly model: string;
	private readonly dimension: number;

	constructor(dimension = DEFAULT_HASHING_DIMENSION) {
		this.dimension = dimension;
		this.model = `hashing-${dimension}`;
	}

	embed(texts: string[]): Promise<number[][]> {
		return Promise.resolve(texts.map((text) => this.embedOne(text)));
	}

	private embedOne(text: string): number[] {
		const vector = new Array<number>(this.dimension).fill(0);
		const normalized = text.normalize("NFKC").toLowerCase();

		for (const token of tokenize(normalized)) {
			this.addFeature(vector, `w:${token}`, 1);
		}

		const compact = Array.from(normalized.replace(/[^\p{L}\p{N}]+/gu, " ").trim());
		for (let index = 0; index + 3 <= compact.length; index += 1) {
			this.addFeature(vector, `c:${compact.slice(index, index + 3).join("")}`, 0.5);
		}

		return unitNormalize(vector);
	}

	private addFeature(vector: number[], feature: string, weight: number): void {
		const hash = fnv1a(feature);
		const bucket = hash % this.dimension;
		const sign = (hash >>> 31) === 0 ? 1 : -1;
		vector[bucket] = (vector[bucket] ?? 0) + sign * weight;
	}
}

export interface HttpEmbedderOptions {
	url: string;
	model: string;
	apiKey?: string;
	timeoutMs?: number;
	maxRetries?: number;
	fetchImpl?: typeof fetch;
	sleep?: (ms: number) => Promise<void>;
}

/**
 * Client for an OpenAI-compatible `/embeddings` endpoint.
 */
export class HttpEmbedder implements Embedder {
	readonly model: string;
	private readonly url: string;
	private readonly apiKey: string;
	private readonly timeoutMs: number;
	private readonly maxRetries: number;
	private readonly fetchImpl: typeof fetch;
	private readonly sleep: (ms: number) => Promise<void>;

	constructor(options: HttpEmbedderOptions) {
		this.url = trimTrailingSlash(options.url);
		this.model = options.model;
		this.apiKey = options.apiKey?.trim() ?? "";
		this.timeoutMs = options.timeoutMs ?? 8_000;
		this.maxRetries = options.maxRetries ?? 3;
		this.fetchImpl = options.fetchImpl ?? globalThis.fetch.bind(globalThis);
		this.sleep = options.sleep ?? ((ms) => sleep(ms));
	}

	async embed(texts: string[]): Promise<number[][]> {
		if (texts.length === 0) {
			return [];
		}

		let lastError: unknown = null;
		for (let attempt = 0; attempt <= this.maxRetries; attempt += 1) {
			if (attempt > 0) {
				await this.sleep(backoffMs(attempt - 1));
			}

			try {
				const vectors = await this.request(texts);
				return vectors.map(unitNormalize);
			} catch (error) {
				lastError = error;
			}
		}

		throw new Error(`Embedding request failed after ${this.maxRetries + 1} attempts`, { cause: lastError });
	}

	private async request(texts: string[]): Promise<number[][]> {
		const abort = createLinkedAbort(this.timeoutMs);
		try {
			const response = await this.fetchImpl(this.url, {
				method: "POST",
				headers: {
					"content-type": "application/json",
					...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {})
				},
				body: JSON.stringify({ model: this.model, input: texts }),
				signal: abort.signal
			});

			if (!response.ok) {
				const body = await response.text();
				throw new Error(`HTTP ${response.status}: ${body.slice(0, 200)}`);
			}

			return parseEmbeddingResponse(await response.json(), texts.length);
		} finally {
			abort.dispose();
		}
	}
}

function parseEmbeddingResponse(payload: unknown, expected: number): number[][] {
	const data = isRecord(payload) && Array.isArray(payload.data) ? payload.data : null;
	if (!data || data.length !== expected) {
		throw new Error("Malformed embedding response: missing or mismatched data");
	}

	const ordered = new Array<number[]>(expected);
	data.forEach((entry, position) => {
		if (!isRecord(entry) || !Array.isArray(entry.embedding)) {
			throw new Error("Malformed embedding response: entry without embedding");
		}
		const values = entry.embedding.filter((value): value is number => typeof value === "number");
		if (values.length !== entry.embedding.length || values.length === 0) {
			throw new Error("Malformed embedding response: non-numeric embedding");
		}
		const index = typeof entry.index === "number" ? entry.index : position;
		ordered[index] = values;
	});

	return ordered;
}

export function cosineSimilarity(left: readonly number[], right: readonly number[]): number {
	const length = Math.min(left.length, right.length);
	let dot = 0;
	let leftNorm = 0;
	let rightNorm = 0;

	for (let index = 0; index < length; index += 1) {
		const a = left[index] ?? 0;
		const b = right[index] ?? 0;
		dot += a * b;
		leftNorm += a * a;
		rightNorm += b * b;
	}

	if (leftNorm === 0 || rightNorm === 0) {
		return 0;
	}
	return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
}

export function unitNormalize(vector: number[]): number[] {
	const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
	return norm === 0 ? vector : vector.map((value) => value / norm);
}

function tokenize(text: string): string[] {
	return text
		.split(/[^\p{L}\p{N}']+/u)
		.filter((token) => token.length > 0)
		.slice(0, 2048);
}

function backoffMs(attempt: number): number {
	const jitter = Math.floor(Math.random() * 100);
	return Math.min(2000, 150 * 2 ** attempt) + jitter;
}

// 32-bit FNV-1a over UTF-16 code units.
function fnv1a(input: string): number {
	let hash = 0x811c9dc5;
	for (let index = 0; index < input.length; index += 1) {
		hash ^= input.charCodeAt(index);
		hash = Math.imul(hash, 0x01000193);
	}
	return hash >>> 0;
}
