import { TrainingConfigSchema, TrainingExampleInputSchema, type TrainingJob } from "@polyglot-tutor/shared/training";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { resolveAssetsDir } from "../../../src/config/tutor.js";
import type { DiagnosticsEvent } from "../../../src/infra/logging/index.js";
import { StoreReadError, createInMemoryDocumentStore } from "../../../src/infra/storage/document-store.js";
import { ResourceBusyError } from "../../../src/services/llm/provider.js";
import type { FineTuneProgress, FineTuneRequest, FineTuneResult, FineTuneRunner } from "../../../src/services/training/fine-tune-runner.js";
import {
	DatasetNotFoundError,
	TrainingDataService,
	type DatasetsDocument
} from "../../../src/services/training/training-data.service.js";
import {
	InvalidJobTransitionError,
	JobNotFoundError,
	TrainingJobService,
	type JobsDocument
} from "../../../src/services/training/training-job.service.js";

const FIXED_NOW = Date.UTC(2026, 0, 5, 10, 0, 0, 123);
const FIXED_ISO = "2026-01-05T10:00:00.123Z";

interface RunnerStep {
	progress?: FineTuneProgress[];
	outputPath?: string;
	failWith?: Error;
	holdUntilAborted?: boolean;
}

class ScriptedRunner implements FineTuneRunner {
	readonly requests: FineTuneRequest[] = [];
	private readonly steps: RunnerStep[] = [];
	private readonly pendingRuns: Array<(request: FineTuneRequest) => void> = [];

	script(...steps: RunnerStep[]): void {
		this.steps.push(...steps);
	}

	/** Resolves when the runner is next invoked. */
	nextRun(): Promise<FineTuneRequest> {
		return new Promise((resolve) => {
			this.pendingRuns.push(resolve);
		});
	}

	async run(request: FineTuneRequest): Promise<FineTuneResult> {
		this.requests.push(request);
		this.pendingRuns.shift()?.(request);
		const step = this.steps.shift() ?? {};

		for (const progress of step.progress ?? []) {
			request.onProgress(progress);
		}

		if (step.holdUntilAborted) {
			await new Promise<void>((resolve) => {
				if (request.signal.aborted) {
					resolve();
					return;
				}
				request.signal.addEventListener("abort", () => resolve(), { once: true });
			});
			throw new Error("Training was cancelled");
		}

		if (step.failWith) {
			throw step.failWith;
		}

		return { outputPath: step.outputPath ?? request.outputDir };
	}
}

describe("TrainingJobService", () => {
	let rootDir: string;
	let exportDir: string;
	let modelsDir: string;

	beforeEach(async () => {
		rootDir = await mkdtemp(path.join(tmpdir(), "tutor-jobs-"));
		exportDir = path.join(rootDir, "exports");
		modelsDir = path.join(rootDir, "models");
	});

	afterEach(async () => {
		await rm(rootDir, { recursive: true, force: true });
	});

	function createHarness(initialJobs?: JobsDocument) {
		let nextDataId = 0;
		const data = new TrainingDataService({
			store: createInMemoryDocumentStore<DatasetsDocument>(),
			exportDir,
			createId: () => {
				nextDataId += 1;
				return `id-${nextDataId}`;
			},
			now: () => FIXED_NOW
		});

		const store = createInMemoryDocumentStore<JobsDocument>(initialJobs);
		const runner = new ScriptedRunner();
		const events: DiagnosticsEvent[] = [];
		let nextJobId = 0;
		const service = new TrainingJobService({
			store,
			data,
			runner,
			modelsDir,
			baseModelsFile: path.join(resolveAssetsDir({}), "base-models.json"),
			diagnosticsRecorder: { record: (event) => void events.push(event) },
			createId: () => {
				nextJobId += 1;
				return `job-${nextJobId}`;
			},
			now: () => FIXED_NOW
		});

		const addApprovedExample = async (datasetId?: string): Promise<void> => {
			const targetId = datasetId ?? (await data.listDatasets())[0]?.id ?? "";
			const example = await data.addExample(
				targetId,
				TrainingExampleInputSchema.parse({ user_input: "Say hello in French", assistant_output: "Bonjour !" })
			);
			await data.approveExample(targetId, example.id);
		};

		return { service, data, store, runner, events, addApprovedExample };
	}

	it("creates pending jobs with default training settings", async () => {
		const { service } = createHarness();

		const job = await service.createJob({ config: { epochs: 5 } });

		expect(job).toEqual({
			id: "job-1",
			dataset_id: null,
			status: "pending",
			progress: 0,
			current_step: 0,
			total_steps: 0,
			created_at: FIXED_ISO,
			started_at: null,
			completed_at: null,
			config: TrainingConfigSchema.parse({ epochs: 5 }),
			output_path: null,
			error_message: null,
			metrics: {}
		});
		await expect(service.listJobs()).resolves.toHaveLength(1);
	});

	it("rejects jobs for unknown datasets", async () => {
		const { service } = createHarness();

		await expect(service.createJob({ dataset_id: "missing", config: {} })).rejects.toBeInstanceOf(DatasetNotFoundError);
		await expect(service.listJobs()).resolves.toEqual([]);
	});

	it("refuses to start without approved examples and leaves the job pending", async () => {
		const { service, data } = createHarness();
		const dataset = await data.createDataset({ name: "Empty", description: "" });
		const unscoped = await service.createJob({ config: {} });
		const scoped = await service.createJob({ dataset_id: dataset.id, config: {} });

		await expect(service.startJob(unscoped.id)).rejects.toThrow("No dataset has approved examples to train on");
		await expect(service.startJob(scoped.id)).rejects.toThrow(`Dataset ${dataset.id} has no approved examples to train on`);
		await expect(service.startJob(scoped.id)).rejects.toBeInstanceOf(InvalidJobTransitionError);

		await expect(service.getJob(unscoped.id)).resolves.toMatchObject({ status: "pending", started_at: null });
	});

	it("runs a job through preparing and training to completion", async () => {
		const { service, runner, events, addApprovedExample } = createHarness();
		await addApprovedExample();
		runner.script({
			progress: [{ step: 5, totalSteps: 10, metrics: { loss: 1.25 } }],
			outputPath: "/models/tutor-lora"
		});
		const job = await service.createJob({ config: {} });

		const started = await service.startJob(job.id);
		expect(started).toMatchObject({ status: "preparing", started_at: FIXED_ISO });

		await service.waitForJob(job.id);

		const finished = await service.getJob(job.id);
		expect(finished).toMatchObject({
			status: "completed",
			progress: 100,
			current_step: 5,
			total_steps: 10,
			completed_at: FIXED_ISO,
			output_path: "/models/tutor-lora",
			error_message: null,
			metrics: { loss: 1.25 }
		});

		const request = runner.requests[0];
		expect(request?.outputDir).toBe(path.join(modelsDir, "language-tutor-lora"));
		expect(path.dirname(request?.dataFile ?? "")).toBe(exportDir);
		expect(events).toEqual([
			{ type: "training_job_transition", jobId: job.id, from: "pending", to: "preparing", timestamp: FIXED_NOW },
			{ type: "training_job_transition", jobId: job.id, from: "preparing", to: "training", timestamp: FIXED_NOW },
			{ type: "training_job_transition", jobId: job.id, from: "training", to: "completed", timestamp: FIXED_NOW }
		]);
	});

	it("records runner failures and allows a failed job to be restarted", async () => {
		const { service, runner, events, addApprovedExample } = createHarness();
		await addApprovedExample();
		runner.script({ failWith: new Error("CUDA out of memory") }, {});
		const job = await service.createJob({ config: {} });

		await service.startJob(job.id);
		await service.waitForJob(job.id);

		await expect(service.getJob(job.id)).resolves.toMatchObject({
			status: "failed",
			error_message: "CUDA out of memory",
			completed_at: FIXED_ISO
		});
		expect(events.at(-1)).toEqual({
			type: "training_job_transition",
			jobId: job.id,
			from: "training",
			to: "failed",
			errorMessage: "CUDA out of memory",
			timestamp: FIXED_NOW
		});

		const restarted = await service.startJob(job.id);
		expect(restarted).toMatchObject({ status: "preparing", error_message: null, completed_at: null });
		await service.waitForJob(job.id);

		await expect(service.getJob(job.id)).resolves.toMatchObject({ status: "completed", error_message: null });
	});

	it("allows one active job per base model", async () => {
		const { service, runner, addApprovedExample } = createHarness();
		await addApprovedExample();
		runner.script({ holdUntilAborted: true }, {});
		const first = await service.createJob({ config: {} });
		const second = await service.createJob({ config: {} });

		const running = runner.nextRun();
		await service.startJob(first.id);
		await running;

		const busy = service.startJob(second.id);
		await expect(busy).rejects.toBeInstanceOf(ResourceBusyError);
		await expect(busy).rejects.toMatchObject({ retryAfterSeconds: 30 });
		await expect(service.getJob(second.id)).resolves.toMatchObject({ status: "pending" });

		await service.cancelJob(first.id);
		await service.waitForJob(first.id);

		await service.startJob(second.id);
		await service.waitForJob(second.id);
		await expect(service.getJob(second.id)).resolves.toMatchObject({ status: "completed" });
	});

	it("cancels an active job and keeps it cancelled after the runner stops", async () => {
		const { service, runner, addApprovedExample } = createHarness();
		await addApprovedExample();
		runner.script({ holdUntilAborted: true });
		const job = await service.createJob({ config: {} });
		const running = runner.nextRun();
		await service.startJob(job.id);
		await running;

		await expect(service.getJob(job.id)).resolves.toMatchObject({ status: "training" });

		const cancelled = await service.cancelJob(job.id);
		expect(cancelled).toMatchObject({ status: "cancelled", completed_at: FIXED_ISO });
		expect(runner.requests[0]?.signal.aborted).toBe(true);

		await service.waitForJob(job.id);
		await expect(service.getJob(job.id)).resolves.toMatchObject({ status: "cancelled", error_message: null });
		await expect(service.cancelJob(job.id)).rejects.toThrow(`Job ${job.id} is cancelled and cannot be cancelled`);
	});

	it("only deletes jobs that are not running", async () => {
		const { service, runner, addApprovedExample } = createHarness();
		await addApprovedExample();
		runner.script({ holdUntilAborted: true });
		const job = await service.createJob({ config: {} });
		const running = runner.nextRun();
		await service.startJob(job.id);
		await running;

		await expect(service.deleteJob(job.id)).rejects.toBeInstanceOf(InvalidJobTransitionError);

		await service.cancelJob(job.id);
		await service.waitForJob(job.id);
		await service.deleteJob(job.id);

		await expect(service.getJob(job.id)).rejects.toBeInstanceOf(JobNotFoundError);
		await expect(service.deleteJob(job.id)).rejects.toThrow(`Training job with id ${job.id} not found`);
	});

	it("fails jobs that were active when the service last stopped", async () => {
		const interrupted: TrainingJob = {
			id: "job-old",
			dataset_id: null,
			status: "training",
			progress: 40,
			current_step: 4,
			total_steps: 10,
			created_at: "2026-01-04T08:00:00.000Z",
			started_at: "2026-01-04T08:00:01.000Z",
			completed_at: null,
			config: TrainingConfigSchema.parse({}),
			output_path: null,
			error_message: null,
			metrics: {}
		};
		const { service, store } = createHarness({ jobs: [interrupted] });

		const [job] = await service.listJobs();

		expect(job).toMatchObject({
			status: "failed",
			error_message: "Interrupted by a server restart",
			completed_at: FIXED_ISO,
			progress: 40
		});
		expect(store.peek()?.jobs[0]?.status).toBe("failed");
	});

	it("reports an invalid jobs document as a read error", async () => {
		const { service, store } = createHarness();
		await store.write({
			jobs: [
				{
					id: "job-bad",
					dataset_id: null,
					status: "pending",
					progress: 0,
					current_step: 12,
					total_steps: 10,
					created_at: FIXED_ISO,
					started_at: null,
					completed_at: null,
					config: TrainingConfigSchema.parse({}),
					output_path: null,
					error_message: null,
					metrics: {}
				}
			]
		});

		await expect(service.listJobs()).rejects.toBeInstanceOf(StoreReadError);
	});

	it("lists the bundled base models", async () => {
		const { service } = createHarness();

		const models = await service.listBaseModels();

		expect(models).toHaveLength(5);
		expect(models[0]).toEqual({
			id: "unsloth/Llama-3.2-1B-Instruct",
			name: "Llama 3.2 1B Instruct",
			description: "Small and fast; fits modest GPUs.",
			size: "1B",
			vram_required: "4GB"
		});
	});

	it("lists LoRA adapters and GGUF files from the models directory", async () => {
		const { service } = createHarness();
		await expect(service.listTrainedModels()).resolves.toEqual([]);

		await mkdir(path.join(modelsDir, "adapter-lora"), { recursive: true });
		await writeFile(path.join(modelsDir, "adapter-lora", "adapter_config.json"), "{}", "utf-8");
		await mkdir(path.join(modelsDir, "scratch"), { recursive: true });
		await writeFile(path.join(modelsDir, "tutor.gguf"), Buffer.alloc(512 * 1024));
		await writeFile(path.join(modelsDir, "notes.txt"), "not a model", "utf-8");

		const models = await service.listTrainedModels();

		expect(models.map(({ name, type, path: modelPath, size_mb }) => ({ name, type, modelPath, size_mb }))).toEqual([
			{ name: "adapter-lora", type: "lora", modelPath: path.join(modelsDir, "adapter-lora"), size_mb: undefined },
			{ name: "tutor.gguf", type: "gguf", modelPath: path.join(modelsDir, "tutor.gguf"), size_mb: 0.5 }
		]);
	});
});
