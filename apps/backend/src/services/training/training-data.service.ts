import {
	TrainingDatasetSchema,
	TrainingExampleInputSchema,
	type CreateDatasetRequest,
	type ExportFormat,
	type ExportRequest,
	type ExportResult,
	type TrainingDataset,
	type TrainingDatasetSummary,
	type TrainingExample,
	type TrainingExampleInput,
	type TrainingExampleUpdate,
	type UpdateDatasetRequest
} from "@polyglot-tutor/shared/training";
import { randomUUID } from "node:crypto";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { z, ZodError } from "zod";

import { recordDiagnostics, type DiagnosticsRecorder } from "../../infra/logging/index.js";
import { StoreReadError, type DocumentStore } from "../../infra/storage/document-store.js";
import type { CollectedInteraction, InteractionCollector } from "../tutor/tutor.service.js";

export const DEFAULT_DATASET_NAME = "Default Dataset" as const;
const DEFAULT_DATASET_DESCRIPTION = "Examples collected from tutoring sessions";
export const DEFAULT_INSTRUCTION = "You are a helpful language tutor." as const;

const DatasetsDocumentSchema = z.object({
	datasets: z.array(TrainingDatasetSchema)
});
export type DatasetsDocument = z.infer<typeof DatasetsDocumentSchema>;

export class DatasetNotFoundError extends Error {
	readonly code = "DATASET_NOT_FOUND" as const;

	constructor(public readonly datasetId: string) {
		super(`Dataset with id ${datasetId} not found`);
		this.name = "DatasetNotFoundError";
	}
}

export class ExampleNotFoundError extends Error {
	readonly code = "EXAMPLE_NOT_FOUND" as const;

	constructor(public readonly exampleId: string) {
		super(`Example with id ${exampleId} not found`);
		this.name = "ExampleNotFoundError";
	}
}

export class NoExamplesToExportError extends Error {
	readonly code = "NO_EXAMPLES_TO_EXPORT" as const;

	constructor(message = "No examples match the export criteria") {
		super(message);
		this.name = "NoExamplesToExportError";
	}
}

export interface TrainingDataServiceOptions {
	store: DocumentStore<DatasetsDocument>;
	exportDir: string;
	diagnosticsRecorder?: DiagnosticsRecorder | null;
	createId?: () => string;
	now?: () => number;
}

const EXPORT_SUFFIX: Record<ExportFormat, string> = {
	jsonl: ".jsonl",
	alpaca: "_alpaca.json",
	sharegpt: "_sharegpt.json"
};

/**
 * Datasets and examples for fine-tuning. State lives in memory after the first
 * load; every mutation is applied synchronously and then written back as a
 * whole document.
 */
export class TrainingDataService implements InteractionCollector {
	private readonly store: DocumentStore<DatasetsDocument>;
	private readonly exportDir: string;
	private readonly diagnosticsRecorder: DiagnosticsRecorder | null;
	private readonly createId: () => string;
	private readonly now: () => number;
	private loading: Promise<TrainingDataset[]> | null = null;

	constructor(options: TrainingDataServiceOptions) {
		this.store = options.store;
		this.exportDir = options.exportDir;
		this.diagnosticsRecorder = options.diagnosticsRecorder ?? null;
		this.createId = options.createId ?? (() => randomUUID());
		this.now = options.now ?? (() => Date.now());
	}

	async listDatasets(): Promise<TrainingDatasetSummary[]> {
		const datasets = await this.datasets();
		return datasets.map(summarize);
	}

	async getDataset(id: string): Promise<TrainingDataset> {
		const datasets = await this.datasets();
		return structuredClone(requireDataset(datasets, id));
	}

	async createDataset(request: CreateDatasetRequest): Promise<TrainingDataset> {
		const datasets = await this.datasets();
		const dataset = this.newDataset(request.name, request.description);
		datasets.push(dataset);
		await this.persist(datasets);
		return structuredClone(dataset);
	}

	async updateDataset(id: string, request: UpdateDatasetRequest): Promise<TrainingDataset> {
		const datasets = await this.datasets();
		const dataset = requireDataset(datasets, id);
		if (request.name !== undefined) {
			dataset.name = request.name;
		}
		if (request.description !== undefined) {
			dataset.description = request.description;
		}
		dataset.updated_at = this.timestamp();
		await this.persist(datasets);
		return structuredClone(dataset);
	}

	async deleteDataset(id: string): Promise<void> {
		const datasets = await this.datasets();
		const index = datasets.findIndex((dataset) => dataset.id === id);
		if (index === -1) {
			throw new DatasetNotFoundError(id);
		}
		datasets.splice(index, 1);
		await this.persist(datasets);
	}

	async addExample(datasetId: string, input: TrainingExampleInput): Promise<TrainingExample> {
		const datasets = await this.datasets();
		const dataset = requireDataset(datasets, datasetId);
		const example: TrainingExample = {
			id: this.createId(),
			created_at: this.timestamp(),
			system_prompt: input.system_prompt,
			user_input: input.user_input,
			assistant_output: input.assistant_output,
			category: input.category,
			language: input.language,
			quality_rating: null,
			is_approved: input.is_approved
		};
		dataset.examples.push(example);
		dataset.updated_at = example.created_at;
		await this.persist(datasets);
		return { ...example };
	}

	async updateExample(datasetId: string, exampleId: string, update: TrainingExampleUpdate): Promise<TrainingExample> {
		return this.mutateExample(datasetId, exampleId, (example) => ({
			...example,
			system_prompt: update.system_prompt ?? example.system_prompt,
			user_input: update.user_input ?? example.user_input,
			assistant_output: update.assistant_output ?? example.assistant_output,
			category: update.category ?? example.category,
			language: update.language ?? example.language,
			quality_rating: update.quality_rating === undefined ? example.quality_rating : update.quality_rating,
			is_approved: update.is_approved ?? example.is_approved
		}));
	}

	async deleteExample(datasetId: string, exampleId: string): Promise<void> {
		const datasets = await this.datasets();
		const dataset = requireDataset(datasets, datasetId);
		const index = dataset.examples.findIndex((example) => example.id === exampleId);
		if (index === -1) {
			throw new ExampleNotFoundError(exampleId);
		}
		dataset.examples.splice(index, 1);
		dataset.updated_at = this.timestamp();
		await this.persist(datasets);
	}

	async approveExample(datasetId: string, exampleId: string, approved = true): Promise<TrainingExample> {
		return this.mutateExample(datasetId, exampleId, (example) => ({ ...example, is_approved: approved }));
	}

	async rateExample(datasetId: string, exampleId: string, rating: number): Promise<TrainingExample> {
		return this.mutateExample(datasetId, exampleId, (example) => ({ ...example, quality_rating: rating }));
	}

	/** Approved examples of one dataset, or of every dataset when no id is given. */
	async getApprovedExamples(datasetId?: string | null): Promise<TrainingExample[]> {
		const datasets = await this.datasets();
		const scope = datasetId ? [requireDataset(datasets, datasetId)] : datasets;
		return scope.flatMap((dataset) => dataset.examples.filter((example) => example.is_approved)).map((example) => ({
			...example
		}));
	}

	async exportDataset(request: ExportRequest): Promise<ExportResult> {
		const datasets = await this.datasets();
		const scope = request.dataset_id ? [requireDataset(datasets, request.dataset_id)] : datasets;
		const examples = scope
			.flatMap((dataset) => dataset.examples)
			.filter((example) => !request.only_approved || example.is_approved);

		if (examples.length === 0) {
			throw new NoExamplesToExportError(
				request.only_approved ? "No approved examples to export" : "No examples to export"
			);
		}

		const filePath = path.join(this.exportDir, `training_${formatExportStamp(this.now())}${EXPORT_SUFFIX[request.format]}`);
		await mkdir(this.exportDir, { recursive: true });
		await writeFile(filePath, serializeExamples(examples, request.format), "utf-8");

		await recordDiagnostics(this.diagnosticsRecorder, {
			type: "training_dataset_exported",
			datasetId: request.dataset_id ?? null,
			format: request.format,
			count: examples.length,
			filePath,
			timestamp: this.now()
		});

		return { file_path: filePath, count: examples.length, format: request.format };
	}

	/** Adds a finished chat turn to the default dataset as an unapproved example. */
	async collectInteraction(interaction: CollectedInteraction): Promise<TrainingExample> {
		const datasets = await this.datasets();
		let target = datasets.find((dataset) => dataset.name === DEFAULT_DATASET_NAME) ?? datasets[0];
		if (!target) {
			target = this.newDataset(DEFAULT_DATASET_NAME, DEFAULT_DATASET_DESCRIPTION);
			datasets.push(target);
		}

		const input = TrainingExampleInputSchema.parse({
			user_input: interaction.userMessage,
			assistant_output: interaction.assistantResponse,
			category: "conversation",
			language: interaction.language
		});
		return this.addExample(target.id, input);
	}

	private async mutateExample(
		datasetId: string,
		exampleId: string,
		mutate: (example: TrainingExample) => TrainingExample
	): Promise<TrainingExample> {
		const datasets = await this.datasets();
		const dataset = requireDataset(datasets, datasetId);
		const index = dataset.examples.findIndex((example) => example.id === exampleId);
		const current = dataset.examples[index];
		if (!current) {
			throw new ExampleNotFoundError(exampleId);
		}

		const updated = mutate(current);
		dataset.examples[index] = updated;
		dataset.updated_at = this.timestamp();
		await this.persist(datasets);
		return { ...updated };
	}

	private datasets(): Promise<TrainingDataset[]> {
		if (!this.loading) {
			const loading = this.load();
			this.loading = loading;
			// A failed load is retried by the next call.
			loading.catch(() => {
				if (this.loading === loading) {
					this.loading = null;
				}
			});
		}
		return this.loading;
	}

	private async load(): Promise<TrainingDataset[]> {
		const stored = await this.store.read();
		let datasets: TrainingDataset[] = [];

		if (stored !== undefined) {
			try {
				datasets = DatasetsDocumentSchema.parse(stored).datasets;
			} catch (error) {
				if (error instanceof ZodError) {
					throw new StoreReadError(`Stored datasets are invalid: ${error.issues[0]?.message ?? "unknown"}`, {
						cause: error
					});
				}
				throw error;
			}
		}

		if (datasets.length === 0) {
			datasets.push(this.newDataset(DEFAULT_DATASET_NAME, DEFAULT_DATASET_DESCRIPTION));
			await this.persist(datasets);
		}

		return datasets;
	}

	private persist(datasets: TrainingDataset[]): Promise<void> {
		return this.store.write({ datasets: structuredClone(datasets) });
	}

	private newDataset(name: string, description: string): TrainingDataset {
		const timestamp = this.timestamp();
		return {
			id: this.createId(),
			name,
			description,
			created_at: timestamp,
			updated_at: timestamp,
			examples: []
		};
	}

	private timestamp(): string {
		return new Date(this.now()).toISOString();
	}
}

function requireDataset(datasets: TrainingDataset[], id: string): TrainingDataset {
	const dataset = datasets.find((candidate) => candidate.id === id);
	if (!dataset) {
		throw new DatasetNotFoundError(id);
	}
	return dataset;
}

function summarize(dataset: TrainingDataset): TrainingDatasetSummary {
	const { examples, ...rest } = dataset;
	return {
		...rest,
		example_count: examples.length,
		approved_count: examples.filter((example) => example.is_approved).length
	};
}

function pad(value: number, width = 2): string {
	return String(value).padStart(width, "0");
}

/** `YYYYMMDD_HHMMSS_mmm` in UTC. */
export function formatExportStamp(epochMs: number): string {
	const date = new Date(epochMs);
	return (
		`${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
		`_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}` +
		`_${pad(date.getUTCMilliseconds(), 3)}`
	);
}

export function serializeExamples(examples: readonly TrainingExample[], format: ExportFormat): string {
	switch (format) {
		case "jsonl":
			return `${examples.map((example) => JSON.stringify({ messages: toChatMessages(example) })).join("\n")}\n`;
		case "alpaca":
			return JSON.stringify(
				examples.map((example) => ({
					instruction: example.system_prompt || DEFAULT_INSTRUCTION,
					input: example.user_input,
					output: example.assistant_output
				})),
				null,
				2
			);
		case "sharegpt":
			return JSON.stringify(
				examples.map((example) => ({
					conversations: toChatMessages(example).map((message) => ({
						from: SHAREGPT_ROLES[message.role],
						value: message.content
					}))
				})),
				null,
				2
			);
	}
}

const SHAREGPT_ROLES = {
	system: "system",
	user: "human",
	assistant: "gpt"
} as const;

function toChatMessages(
	example: TrainingExample
): Array<{ role: keyof typeof SHAREGPT_ROLES; content: string }> {
	const messages: Array<{ role: keyof typeof SHAREGPT_ROLES; content: string }> = [];
	if (example.system_prompt) {
		messages.push({ role: "system", content: example.system_prompt });
	}
	messages.push({ role: "user", content: example.user_input });
	messages.push({ role: "assistant", content: example.assistant_output });
	return messages;
}
