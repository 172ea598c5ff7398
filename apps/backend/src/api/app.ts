import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { loadTutorConfig, type TutorConfig } from "../config/tutor.js";
import {
	createConsoleDiagnosticsRecorder,
	createDiagnosticsLogger,
	type DiagnosticsRecorder
} from "../infra/logging/index.js";
import {
	createInMemoryDocumentStore,
	createJsonFileDocumentStore,
	type DocumentStore
} from "../infra/storage/document-store.js";
import { createLlmProvider } from "../services/llm/provider.factory.js";
import type { LlmProvider } from "../services/llm/provider.js";
import { HashingEmbedder, HttpEmbedder, type Embedder } from "../services/retrieval/embedder.js";
import {
	RetrievalStore,
	loadSeedDocuments,
	type PersistedCollection
} from "../services/retrieval/retrieval-store.js";
import { ProcessFineTuneRunner, type FineTuneRunner } from "../services/training/fine-tune-runner.js";
import { TrainingDataService, type DatasetsDocument } from "../services/training/training-data.service.js";
import { TrainingJobService, type JobsDocument } from "../services/training/training-job.service.js";
import { ExerciseCatalog } from "../services/tutor/catalog.js";
import { TutorService } from "../services/tutor/tutor.service.js";
import { registerTrainingRoutes } from "./training/training.routes.js";
import { registerTutorRoutes } from "./tutor/index.js";

export interface TutorAppServices {
	config: TutorConfig;
	provider: LlmProvider;
	retrievalStore: RetrievalStore;
	catalog: ExerciseCatalog;
	tutorService: TutorService;
	dataService: TrainingDataService;
	jobService: TrainingJobService;
	diagnosticsRecorder: DiagnosticsRecorder;
}

export interface TutorServiceOverrides {
	provider?: LlmProvider;
	embedder?: Embedder;
	runner?: FineTuneRunner;
	fetchImpl?: typeof fetch;
	diagnosticsRecorder?: DiagnosticsRecorder;
	/** Keeps the vector collection and training documents in memory. */
	inMemoryStores?: boolean;
	now?: () => number;
}

function createDocumentStore<T>(filePath: string, inMemory: boolean): DocumentStore<T> {
	return inMemory ? createInMemoryDocumentStore<T>() : createJsonFileDocumentStore<T>(filePath);
}

function createEmbedder(config: TutorConfig, fetchImpl?: typeof fetch): Embedder {
	if (config.embeddingUrl) {
		return new HttpEmbedder({
			url: config.embeddingUrl,
			model: config.embeddingModel,
			apiKey: config.groq.apiKey || undefined,
			fetchImpl
		});
	}
	return new HashingEmbedder();
}

/**
 * Wires every service from configuration. The provider is chosen here once
 * and shared by all tutoring operations.
 */
export async function createTutorServices(
	config: TutorConfig,
	overrides: TutorServiceOverrides = {}
): Promise<TutorAppServices> {
	const inMemory = overrides.inMemoryStores ?? false;
	const diagnosticsRecorder =
		overrides.diagnosticsRecorder ??
		(config.logDir ? createDiagnosticsLogger({ logDirectory: config.logDir }) : createConsoleDiagnosticsRecorder());

	const provider =
		overrides.provider ?? createLlmProvider(config, { fetchImpl: overrides.fetchImpl, diagnosticsRecorder });

	const retrievalStore = new RetrievalStore({
		embedder: overrides.embedder ?? createEmbedder(config, overrides.fetchImpl),
		persistence: createDocumentStore<PersistedCollection>(
			path.join(config.vectorStoreDir, "collection.json"),
			inMemory
		),
		diagnosticsRecorder,
		now: overrides.now
	});
	await retrievalStore.initialize(await loadSeedDocuments(path.join(config.assetsDir, "retrieval-seed.json")));

	const catalog = await ExerciseCatalog.fromFile(path.join(config.assetsDir, "exercise-topics.json"));

	const dataService = new TrainingDataService({
		store: createDocumentStore<DatasetsDocument>(path.join(config.dataDir, "training", "datasets.json"), inMemory),
		exportDir: path.join(config.dataDir, "exports"),
		diagnosticsRecorder,
		now: overrides.now
	});

	const jobService = new TrainingJobService({
		store: createDocumentStore<JobsDocument>(path.join(config.dataDir, "training", "jobs.json"), inMemory),
		data: dataService,
		runner:
			overrides.runner ??
			new ProcessFineTuneRunner({
				command: config.trainingCommand,
				workDir: path.join(config.dataDir, "training", "runs")
			}),
		modelsDir: config.modelsDir,
		baseModelsFile: path.join(config.assetsDir, "base-models.json"),
		diagnosticsRecorder,
		now: overrides.now
	});

	const tutorService = new TutorService({
		provider,
		retriever: retrievalStore,
		interactionCollector: config.autoCollectTraining ? dataService : null,
		diagnosticsRecorder,
		now: overrides.now
	});

	return {
		config,
		provider,
		retrievalStore,
		catalog,
		tutorService,
		dataService,
		jobService,
		diagnosticsRecorder
	};
}

export async function buildTutorApp(
	services: TutorAppServices,
	options: { logger?: boolean } = {}
): Promise<FastifyInstance> {
	const app = Fastify({ logger: options.logger ?? false, ignoreTrailingSlash: true });

	await app.register(registerTutorRoutes, {
		prefix: "/api",
		tutorService: services.tutorService,
		catalog: services.catalog,
		provider: services.provider,
		isRetrievalHealthy: () => services.retrievalStore.isHealthy(),
		diagnosticsRecorder: services.diagnosticsRecorder
	});
	await app.register(registerTrainingRoutes, {
		prefix: "/api/training",
		dataService: services.dataService,
		jobService: services.jobService
	});

	app.addHook("onClose", async () => {
		await services.jobService.shutdown();
	});

	await app.ready();
	return app;
}

export interface TutorAppOptions {
	config?: TutorConfig;
	overrides?: TutorServiceOverrides;
	logger?: boolean;
}

export async function createTutorApp(options: TutorAppOptions = {}): Promise<FastifyInstance> {
	const services = await createTutorServices(options.config ?? loadTutorConfig(), options.overrides);
	return buildTutorApp(services, { logger: options.logger });
}

export interface TutorTestHarness {
	app: FastifyInstance;
	services: TutorAppServices;
	dataDir: string;
	close(): Promise<void>;
}

export interface TutorTestHarnessOptions {
	provider: LlmProvider;
	runner?: FineTuneRunner;
	diagnosticsRecorder?: DiagnosticsRecorder;
	env?: NodeJS.ProcessEnv;
	now?: () => number;
}

/**
 * In-process app for contract tests: bundled seed data, in-memory stores and
 * a scratch directory for exports.
 */
export async function createTutorTestHarness(options: TutorTestHarnessOptions): Promise<TutorTestHarness> {
	const dataDir = await mkdtemp(path.join(os.tmpdir(), "polyglot-tutor-"));
	const config = loadTutorConfig({
		DATA_DIR: dataDir,
		MODELS_DIR: path.join(dataDir, "models"),
		VECTOR_STORE_DIR: path.join(dataDir, "vectors"),
		...options.env
	});

	const services = await createTutorServices(config, {
		provider: options.provider,
		runner: options.runner,
		diagnosticsRecorder: options.diagnosticsRecorder ?? { record: () => undefined },
		inMemoryStores: true,
		now: options.now
	});
	const app = await buildTutorApp(services);

	return {
		app,
		services,
		dataDir,
		close: async () => {
			await app.close();
			await rm(dataDir, { recursive: true, force: true });
		}
	};
}
