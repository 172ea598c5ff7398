import {
	ACTIVE_JOB_STATUSES,
	BaseModelSchema,
	TrainingConfigSchema,
	TrainingJobSchema,
	type BaseModel,
	type CreateJobRequest,
	type ExportRequest,
	type ExportResult,
	type TrainedModel,
	type TrainingDataset,
	type TrainingExample,
	type TrainingJob,
	type TrainingJobStatus
} from "@polyglot-tutor/shared/training";
import { randomUUID } from "node:crypto";
import type { Dirent } from "node:fs";
import { readFile, readdir, stat } from "node:fs/promises";
import path from "node:path";
import { z, ZodError } from "zod";

import { recordDiagnostics, type DiagnosticsRecorder } from "../../infra/logging/index.js";
import { StoreReadError, type DocumentStore } from "../../infra/storage/document-store.js";
import { ResourceBusyError } from "../llm/provider.js";
import type { FineTuneProgress, FineTuneRunner } from "./fine-tune-runner.js";

const JobsDocumentSchema = z.object({
	jobs: z.array(TrainingJobSchema)
});
export type JobsDocument = z.infer<typeof JobsDocumentSchema>;

const INTERRUPTED_MESSAGE = "Interrupted by a server restart";
const STARTABLE_STATUSES: readonly TrainingJobStatus[] = ["pending", "failed"];

export class JobNotFoundError extends Error {
	readonly code = "JOB_NOT_FOUND" as const;

	constructor(public readonly jobId: string) {
		super(`Training job with id ${jobId} not found`);
		this.name = "JobNotFoundError";
	}
}

export class InvalidJobTransitionError extends Error {
	readonly code = "INVALID_JOB_TRANSITION" as const;

	constructor(
		public readonly jobId: string,
		public readonly from: TrainingJobStatus,
		message: string
	) {
		super(message);
		this.name = "InvalidJobTransitionError";
	}
}

/** The parts of the training data service a job needs. */
export interface TrainingDataSource {
	getDataset(id: string): Promise<TrainingDataset>;
	getApprovedExamples(datasetId?: string | null): Promise<TrainingExample[]>;
	exportDataset(request: ExportRequest): Promise<ExportResult>;
}

export interface TrainingJobServiceOptions {
	store: DocumentStore<JobsDocument>;
	data: TrainingDataSource;
	runner: FineTuneRunner;
	modelsDir: string;
	baseModelsFile: string;
	diagnosticsRecorder?: DiagnosticsRecorder | null;
	createId?: () => string;
	now?: () => number;
}

function isActive(status: TrainingJobStatus): boolean {
	return ACTIVE_JOB_STATUSES.includes(status);
}

/**
 * Job lifecycle `pending -> preparing -> training -> completed | failed |
 * cancelled`. Every transition mutates the in-memory job in one step before
 * the jobs document is written.
 */
export class TrainingJobService {
	private readonly store: DocumentStore<JobsDocument>;
	private readonly data: TrainingDataSource;
	private readonly runner: FineTuneRunner;
	private readonly modelsDir: string;
	private readonly baseModelsFile: string;
	private readonly diagnosticsRecorder: DiagnosticsRecorder | null;
	private readonly createId: () => string;
	private readonly now: () => number;
	private loading: Promise<TrainingJob[]> | null = null;
	private loadedJobs: TrainingJob[] | null = null;
	private readonly controllers = new Map<string, AbortController>();
	private readonly running = new Map<string, Promise<void>>();

	constructor(options: TrainingJobServiceOptions) {
		this.store = options.store;
		this.data = options.data;
		this.runner = options.runner;
		this.modelsDir = options.modelsDir;
		this.baseModelsFile = options.baseModelsFile;
		this.diagnosticsRecorder = options.diagnosticsRecorder ?? null;
		this.createId = options.createId ?? (() => randomUUID());
		this.now = options.now ?? (() => Date.now());
	}

	async listJobs(): Promise<TrainingJob[]> {
		const jobs = await this.jobs();
		return jobs.map((job) => structuredClone(job));
	}

	async getJob(id: string): Promise<TrainingJob> {
		const jobs = await this.jobs();
		return structuredClone(requireJob(jobs, id));
	}

	async createJob(request: CreateJobRequest): Promise<TrainingJob> {
		if (request.dataset_id) {
			await this.data.getDataset(request.dataset_id);
		}

		const jobs = await this.jobs();
		const job: TrainingJob = {
			id: this.createId(),
			dataset_id: request.dataset_id ?? null,
			status: "pending",
			progress: 0,
			current_step: 0,
			total_steps: 0,
			created_at: this.timestamp(),
			started_at: null,
			completed_at: null,
			config: TrainingConfigSchema.parse(request.config),
			output_path: null,
			error_message: null,
			metrics: {}
		};
		jobs.push(job);
		await this.persist(jobs);
		return structuredClone(job);
	}

	/**
	 * Moves a pending (or failed) job to `preparing` and runs it in the
	 * background. The job is left untouched when the checks fail.
	 */
	async startJob(id: string): Promise<TrainingJob> {
		const jobs = await this.jobs();
		const datasetId = requireJob(jobs, id).dataset_id;
		const approved = await this.data.getApprovedExamples(datasetId);

		// Re-read after the await; another request may have moved the job.
		const job = requireJob(jobs, id);
		if (!STARTABLE_STATUSES.includes(job.status)) {
			throw new InvalidJobTransitionError(job.id, job.status, `Job ${job.id} is ${job.status} and cannot be started`);
		}

		if (approved.length === 0) {
			throw new InvalidJobTransitionError(
				job.id,
				job.status,
				datasetId
					? `Dataset ${datasetId} has no approved examples to train on`
					: "No dataset has approved examples to train on"
			);
		}

		const conflicting = jobs.find(
			(other) => other.id !== job.id && isActive(other.status) && other.config.base_model === job.config.base_model
		);
		if (conflicting) {
			throw new ResourceBusyError(
				`Job ${conflicting.id} is already training ${job.config.base_model}`,
				30
			);
		}

		const from = job.status;
		Object.assign(job, {
			status: "preparing",
			progress: 0,
			current_step: 0,
			total_steps: 0,
			started_at: this.timestamp(),
			completed_at: null,
			output_path: null,
			error_message: null,
			metrics: {}
		} satisfies Partial<TrainingJob>);

		const controller = new AbortController();
		this.controllers.set(job.id, controller);
		await this.recordTransition(job.id, from, "preparing");
		await this.persist(jobs);

		const task = this.execute(job.id, controller.signal).finally(() => {
			this.controllers.delete(job.id);
			this.running.delete(job.id);
		});
		this.running.set(job.id, task);

		return structuredClone(job);
	}

	async cancelJob(id: string): Promise<TrainingJob> {
		const jobs = await this.jobs();
		const job = requireJob(jobs, id);
		if (!isActive(job.status)) {
			throw new InvalidJobTransitionError(job.id, job.status, `Job ${job.id} is ${job.status} and cannot be cancelled`);
		}

		const from = job.status;
		job.status = "cancelled";
		job.completed_at = this.timestamp();
		this.controllers.get(job.id)?.abort();

		await this.recordTransition(job.id, from, "cancelled");
		await this.persist(jobs);
		return structuredClone(job);
	}

	async deleteJob(id: string): Promise<void> {
		const jobs = await this.jobs();
		const job = requireJob(jobs, id);
		if (isActive(job.status)) {
			throw new InvalidJobTransitionError(job.id, job.status, `Job ${job.id} is ${job.status}; cancel it before deleting`);
		}

		jobs.splice(jobs.indexOf(job), 1);
		await this.persist(jobs);
	}

	/** Resolves once the background run of `id` has finished, if one is running. */
	async waitForJob(id: string): Promise<void> {
		await this.running.get(id);
	}

	async shutdown(): Promise<void> {
		for (const controller of this.controllers.values()) {
			controller.abort();
		}
		await Promise.all([...this.running.values()]);
	}

	async listBaseModels(): Promise<BaseModel[]> {
		const raw: unknown = JSON.parse(await readFile(this.baseModelsFile, "utf-8"));
		return z.array(BaseModelSchema).parse(raw);
	}

	/** LoRA adapter directories and GGUF files found under the models directory. */
	async listTrainedModels(): Promise<TrainedModel[]> {
		let entries: Dirent[];
		try {
			entries = await readdir(this.modelsDir, { withFileTypes: true });
		} catch (error) {
			if (isMissingPath(error)) {
				return [];
			}
			throw error;
		}

		const models: TrainedModel[] = [];
		for (const entry of entries) {
			const entryPath = path.join(this.modelsDir, entry.name);
			if (entry.isDirectory()) {
				const adapterConfig = await statIfExists(path.join(entryPath, "adapter_config.json"));
				if (adapterConfig) {
					const info = await stat(entryPath);
					models.push({
						name: entry.name,
						path: entryPath,
						type: "lora",
						created_at: info.mtime.toISOString()
					});
				}
			} else if (entry.isFile() && entry.name.toLowerCase().endsWith(".gguf")) {
				const info = await stat(entryPath);
				models.push({
					name: entry.name,
					path: entryPath,
					type: "gguf",
					size_mb: Math.round((info.size / (1024 * 1024)) * 100) / 100,
					created_at: info.mtime.toISOString()
				});
			}
		}

		return models.sort((left, right) => left.name.localeCompare(right.name));
	}

	private async execute(jobId: string, signal: AbortSignal): Promise<void> {
		try {
			await this.runJob(jobId, signal);
		} catch (error) {
			console.error(`Training job ${jobId} could not record its outcome`, error);
		}
	}

	private async runJob(jobId: string, signal: AbortSignal): Promise<void> {
		const snapshot = await this.getJob(jobId);

		try {
			const exported = await this.data.exportDataset({
				dataset_id: snapshot.dataset_id ?? undefined,
				format: "jsonl",
				only_approved: true
			});
			if (signal.aborted) {
				return;
			}

			await this.transition(jobId, "training");

			const result = await this.runner.run({
				jobId,
				config: snapshot.config,
				dataFile: exported.file_path,
				outputDir: path.join(this.modelsDir, snapshot.config.output_name),
				signal,
				onProgress: (progress) => this.applyProgress(jobId, progress)
			});
			if (signal.aborted) {
				return;
			}

			await this.transition(jobId, "completed", (job) => {
				job.output_path = result.outputPath;
				job.progress = 100;
			});
		} catch (error) {
			if (signal.aborted) {
				return;
			}
			const message = error instanceof Error ? error.message : String(error);
			await this.transition(jobId, "failed", (job) => {
				job.error_message = message;
			});
		}
	}

	private async transition(
		jobId: string,
		to: TrainingJobStatus,
		mutate?: (job: TrainingJob) => void
	): Promise<void> {
		const jobs = await this.jobs();
		const job = jobs.find((candidate) => candidate.id === jobId);
		if (!job || !isActive(job.status)) {
			return;
		}

		const from = job.status;
		job.status = to;
		if (to === "completed" || to === "failed") {
			job.completed_at = this.timestamp();
		}
		mutate?.(job);

		await this.recordTransition(jobId, from, to, job.error_message ?? undefined);
		await this.persist(jobs);
	}

	private applyProgress(jobId: string, progress: FineTuneProgress): void {
		const jobs = this.loadedJobs;
		const job = jobs?.find((candidate) => candidate.id === jobId);
		if (!jobs || !job || job.status !== "training") {
			return;
		}

		const totalSteps = Math.max(progress.totalSteps, 0);
		const currentStep = totalSteps > 0 ? Math.min(progress.step, totalSteps) : progress.step;
		job.total_steps = totalSteps;
		job.current_step = currentStep;
		job.progress = totalSteps > 0 ? Math.round((currentStep / totalSteps) * 100) : 0;
		job.metrics = { ...job.metrics, ...progress.metrics };

		void this.persist(jobs).catch((error: unknown) => {
			console.warn(`Failed to persist progress of training job ${jobId}`, error);
		});
	}

	private async recordTransition(
		jobId: string,
		from: TrainingJobStatus,
		to: TrainingJobStatus,
		errorMessage?: string
	): Promise<void> {
		await recordDiagnostics(this.diagnosticsRecorder, {
			type: "training_job_transition",
			jobId,
			from,
			to,
			...(errorMessage === undefined ? {} : { errorMessage }),
			timestamp: this.now()
		});
	}

	private jobs(): Promise<TrainingJob[]> {
		if (!this.loading) {
			const loading = this.load();
			this.loading = loading;
			loading.catch(() => {
				if (this.loading === loading) {
					this.loading = null;
				}
			});
		}
		return this.loading;
	}

	private async load(): Promise<TrainingJob[]> {
		const stored = await this.store.read();
		let jobs: TrainingJob[] = [];

		if (stored !== undefined) {
			try {
				jobs = JobsDocumentSchema.parse(stored).jobs;
			} catch (error) {
				if (error instanceof ZodError) {
					throw new StoreReadError(`Stored training jobs are invalid: ${error.issues[0]?.message ?? "unknown"}`, {
						cause: error
					});
				}
				throw error;
			}
		}

		// No runner survives a restart; jobs that were mid-flight are failed.
		const interrupted = jobs.filter((job) => isActive(job.status));
		for (const job of interrupted) {
			job.status = "failed";
			job.error_message = INTERRUPTED_MESSAGE;
			job.completed_at = this.timestamp();
		}
		if (interrupted.length > 0) {
			await this.persist(jobs);
		}

		this.loadedJobs = jobs;
		return jobs;
	}

	private persist(jobs: TrainingJob[]): Promise<void> {
		return this.store.write({ jobs: structuredClone(jobs) });
	}

	private timestamp(): string {
		return new Date(this.now()).toISOString();
	}
}

function requireJob(jobs: TrainingJob[], id: string): TrainingJob {
	const job = jobs.find((candidate) => candidate.id === id);
	if (!job) {
		throw new JobNotFoundError(id);
	}
	return job;
}

async function statIfExists(filePath: string): Promise<boolean> {
	try {
		await stat(filePath);
		return true;
	} catch (error) {
		if (isMissingPath(error)) {
			return false;
		}
		throw error;
	}
}

function isMissingPath(error: unknown): boolean {
	return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}
