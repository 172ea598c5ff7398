import { SUPPORTED_LANGUAGES } from "@polyglot-tutor/shared/tutor";
import { readFile } from "node:fs/promises";
import { z } from "zod";

import type { DocumentStore } from "../../infra/storage/document-store.js";
import { recordDiagnostics, type DiagnosticsRecorder } from "../../infra/logging/index.js";
import { cosineSimilarity, type Embedder } from "./embedder.js";

export const GENERAL_LANGUAGE = "General" as const;

export const RetrievalLanguageSchema = z.enum([...SUPPORTED_LANGUAGES, GENERAL_LANGUAGE]);
export type RetrievalLanguage = z.infer<typeof RetrievalLanguageSchema>;

export const RetrievalCategorySchema = z.enum(["grammar", "vocabulary", "example"]);
export type RetrievalCategory = z.infer<typeof RetrievalCategorySchema>;

export const RetrievalDocumentSchema = z.object({
	id: z.string().min(1),
	text: z.string().trim().min(1),
	language: RetrievalLanguageSchema,
	category: RetrievalCategorySchema
});
export type RetrievalDocument = z.infer<typeof RetrievalDocumentSchema>;

const PersistedCollectionSchema = z.object({
	embeddingModel: z.string(),
	documents: z.array(
		RetrievalDocumentSchema.extend({
			embedding: z.array(z.number())
		})
	)
});
export type PersistedCollection = z.infer<typeof PersistedCollectionSchema>;

const SeedFileSchema = z.object({
	documents: z.array(RetrievalDocumentSchema)
});

export interface ScoredDocument {
	document: RetrievalDocument;
	score: number;
}

interface IndexedDocument {
	document: RetrievalDocument;
	embedding: number[];
}

export interface RetrievalStoreOptions {
	embedder: Embedder;
	persistence?: DocumentStore<PersistedCollection> | null;
	diagnosticsRecorder?: DiagnosticsRecorder | null;
	now?: () => number;
}

const CATEGORY_LABELS: Record<RetrievalCategory, string> = {
	grammar: "Grammar",
	vocabulary: "Vocabulary",
	example: "Example"
};

/**
 * In-process vector index over short tutoring documents. Retrieval enriches
 * prompts but never blocks generation: every query failure yields an empty
 * result.
 */
export class RetrievalStore {
	private readonly embedder: Embedder;
	private readonly persistence: DocumentStore<PersistedCollection> | null;
	private readonly diagnosticsRecorder: DiagnosticsRecorder | null;
	private readonly now: () => number;
	// Map iteration order is insertion order, which breaks score ties.
	private readonly documents = new Map<string, IndexedDocument>();
	private healthy = true;

	constructor(options: RetrievalStoreOptions) {
		this.embedder = options.embedder;
		this.persistence = options.persistence ?? null;
		this.diagnosticsRecorder = options.diagnosticsRecorder ?? null;
		this.now = options.now ?? (() => Date.now());
	}

	/**
	 * Loads the persisted collection and seeds it when empty. A collection built
	 * with a different embedding model is discarded and rebuilt.
	 */
	async initialize(seed: readonly RetrievalDocument[] = []): Promise<void> {
		await this.load();

		if (this.documents.size === 0 && seed.length > 0) {
			await this.upsertMany(seed);
		}
	}

	count(): number {
		return this.documents.size;
	}

	isHealthy(): boolean {
		return this.healthy;
	}

	async upsert(document: RetrievalDocument): Promise<void> {
		await this.upsertMany([document]);
	}

	async upsertMany(documents: readonly RetrievalDocument[]): Promise<void> {
		if (documents.length === 0) {
			return;
		}

		const parsed = documents.map((document) => RetrievalDocumentSchema.parse(document));
		const embeddings = await this.embedder.embed(parsed.map((document) => document.text));

		parsed.forEach((document, index) => {
			const embedding = embeddings[index];
			if (!embedding) {
				throw new Error(`Embedder returned no vector for document ${document.id}`);
			}
			this.documents.set(document.id, { document: { ...document }, embedding });
		});

		await this.persist();
	}

	async query(text: string, language: string, k: number): Promise<ScoredDocument[]> {
		if (this.documents.size === 0 || k <= 0 || text.trim().length === 0) {
			return [];
		}

		try {
			const [queryEmbedding] = await this.embedder.embed([text]);
			if (!queryEmbedding) {
				return [];
			}

			const ranked: ScoredDocument[] = [];
			for (const { document, embedding } of this.documents.values()) {
				if (document.language !== language && document.language !== GENERAL_LANGUAGE) {
					continue;
				}
				ranked.push({ document: { ...document }, score: cosineSimilarity(queryEmbedding, embedding) });
			}

			// Array.prototype.sort is stable, so equal scores keep insertion order.
			ranked.sort((left, right) => right.score - left.score);
			this.healthy = true;
			return ranked.slice(0, k);
		} catch (error) {
			this.healthy = false;
			await this.recordDegraded("query", error);
			return [];
		}
	}

	/**
	 * Formats the most relevant snippets for a prompt: up to `k` grammar and
	 * vocabulary entries, then up to `floor(k / 2)` example sentences.
	 */
	async searchContext(text: string, language: string, k = 3): Promise<string[]> {
		const candidates = await this.query(text, language, this.documents.size);
		const references = candidates
			.filter(({ document }) => document.category !== "example")
			.slice(0, k);
		const examples = candidates
			.filter(({ document }) => document.category === "example")
			.slice(0, Math.floor(k / 2));

		return [...references, ...examples].map(
			({ document }) => `${CATEGORY_LABELS[document.category]}: ${document.text}`
		);
	}

	private async load(): Promise<void> {
		if (!this.persistence) {
			return;
		}

		try {
			const stored = await this.persistence.read();
			if (stored === undefined) {
				return;
			}

			const collection = PersistedCollectionSchema.parse(stored);
			if (collection.embeddingModel !== this.embedder.model) {
				await this.recordDegraded(
					"load",
					new Error(`Stored collection uses ${collection.embeddingModel}; rebuilding for ${this.embedder.model}`)
				);
				return;
			}

			for (const { embedding, ...document } of collection.documents) {
				this.documents.set(document.id, { document, embedding });
			}
		} catch (error) {
			this.healthy = false;
			await this.recordDegraded("load", error);
		}
	}

	private async persist(): Promise<void> {
		if (!this.persistence) {
			return;
		}

		const collection: PersistedCollection = {
			embeddingModel: this.embedder.model,
			documents: [...this.documents.values()].map(({ document, embedding }) => ({ ...document, embedding }))
		};

		try {
			await this.persistence.write(collection);
		} catch (error) {
			await this.recordDegraded("persist", error);
		}
	}

	private async recordDegraded(operation: "query" | "upsert" | "load" | "persist", error: unknown): Promise<void> {
		await recordDiagnostics(this.diagnosticsRecorder, {
			type: "retrieval_degraded",
			operation,
			message: error instanceof Error ? error.message : String(error),
			timestamp: this.now()
		});
	}
}

export async function loadSeedDocuments(filePath: string): Promise<RetrievalDocument[]> {
	const raw: unknown = JSON.parse(await readFile(filePath, "utf-8"));
	return SeedFileSchema.parse(raw).documents;
}
