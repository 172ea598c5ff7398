import type { LlmProviderName } from "@polyglot-tutor/shared/tutor";
import type { ExportFormat, TrainingJobStatus } from "@polyglot-tutor/shared/training";
import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { URL } from "node:url";

const DEFAULT_FILE_NAME = "diagnostics-events.jsonl" as const;
const DIRECTORY_MODE = 0o700;
const MAX_TEXT_LENGTH = 500;
const TRUNCATION_SUFFIX = "..." as const;

const HOSTNAME_KEYS = new Set(["endpointUrl"]);
const OMITTED_KEYS = new Set(["apiKey", "authorization"]);
const TRUNCATED_KEYS = new Set(["responseText", "message", "errorMessage"]);

export interface LlmRequestDiagnosticsEvent {
	type: "llm_request";
	provider: LlmProviderName;
	operation: "generate" | "stream";
	outcome: "success" | "error" | "cancelled";
	attempts: number;
	durationMs: number;
	errorCode?: string;
	timestamp: number;
}

export interface LlmRetryDiagnosticsEvent {
	type: "llm_retry";
	provider: LlmProviderName;
	endpointUrl: string;
	attempt: number;
	delayMs: number;
	reason: string;
	timestamp: number;
}

export interface RetrievalDegradedDiagnosticsEvent {
	type: "retrieval_degraded";
	operation: "query" | "upsert" | "load" | "persist";
	message: string;
	timestamp: number;
}

export interface StructuredOutputFallbackDiagnosticsEvent {
	type: "structured_output_fallback";
	operation: "correction" | "exercises" | "feedback";
	stage: "retry" | "fallback";
	message: string;
	responseText?: string;
	timestamp: number;
}

export interface ExerciseItemsDiscardedDiagnosticsEvent {
	type: "exercise_items_discarded";
	requested: number;
	received: number;
	discarded: number;
	reasons: string[];
	timestamp: number;
}

export interface StreamCancelledDiagnosticsEvent {
	type: "stream_cancelled";
	route: string;
	chunksSent: number;
	timestamp: number;
}

export interface TrainingJobTransitionDiagnosticsEvent {
	type: "training_job_transition";
	jobId: string;
	from: TrainingJobStatus;
	to: TrainingJobStatus;
	errorMessage?: string;
	timestamp: number;
}

export interface TrainingDatasetExportedDiagnosticsEvent {
	type: "training_dataset_exported";
	datasetId: string | null;
	format: ExportFormat;
	count: number;
	filePath: string;
	timestamp: number;
}

export type DiagnosticsEvent =
	| LlmRequestDiagnosticsEvent
	| LlmRetryDiagnosticsEvent
	| RetrievalDegradedDiagnosticsEvent
	| StructuredOutputFallbackDiagnosticsEvent
	| ExerciseItemsDiscardedDiagnosticsEvent
	| StreamCancelledDiagnosticsEvent
	| TrainingJobTransitionDiagnosticsEvent
	| TrainingDatasetExportedDiagnosticsEvent;

export type SanitizedDiagnosticsEvent = DiagnosticsEvent;

export type DiagnosticsLogWriter = (event: SanitizedDiagnosticsEvent) => Promise<void> | void;

/**
 * Sink accepted by every service that emits diagnostics. `DiagnosticsLogger`
 * implements it; tests usually pass a `vi.fn` based recorder.
 */
export interface DiagnosticsRecorder {
	record(event: DiagnosticsEvent): void | Promise<void>;
}

export interface DiagnosticsLoggerOptions {
	writer?: DiagnosticsLogWriter;
	logDirectory?: string;
	fileName?: string;
}

export class DiagnosticsLogger implements DiagnosticsRecorder {
	private readonly write: DiagnosticsLogWriter;
	private readonly directory?: string;
	private ensuredDirectory = false;

	constructor(options: DiagnosticsLoggerOptions) {
		if (options.writer) {
			this.write = options.writer;
			return;
		}

		const directory = options.logDirectory;
		if (!directory) {
			throw new TypeError("DiagnosticsLogger requires either a writer or logDirectory");
		}

		const filePath = path.join(directory, options.fileName ?? DEFAULT_FILE_NAME);
		this.directory = directory;
		this.write = async (event) => {
			await this.ensureDirectory();
			await appendFile(filePath, `${JSON.stringify(event)}\n`, "utf-8");
		};
	}

	async record(event: DiagnosticsEvent): Promise<void> {
		const sanitized = sanitizeDiagnosticsEvent(event);
		await this.write(sanitized);
	}

	private async ensureDirectory(): Promise<void> {
		if (this.ensuredDirectory || !this.directory) {
			return;
		}

		await mkdir(this.directory, { recursive: true, mode: DIRECTORY_MODE });
		this.ensuredDirectory = true;
	}
}

export function createDiagnosticsLogger(options: DiagnosticsLoggerOptions): DiagnosticsLogger {
	return new DiagnosticsLogger(options);
}

/**
 * Console-backed recorder used when no log directory is configured.
 */
export function createConsoleDiagnosticsRecorder(): DiagnosticsRecorder {
	return createDiagnosticsLogger({
		writer: (event) => {
			console.log(JSON.stringify(event));
		}
	});
}

/**
 * Records an event without letting a failing sink break the caller.
 */
export async function recordDiagnostics(
	recorder: DiagnosticsRecorder | null | undefined,
	event: DiagnosticsEvent
): Promise<void> {
	if (!recorder) {
		return;
	}

	try {
		await recorder.record(event);
	} catch (error) {
		console.warn("Failed to record diagnostics event", event.type, error);
	}
}

export function sanitizeDiagnosticsEvent<T extends DiagnosticsEvent>(event: T): T {
	const sanitized: T = structuredClone(event);
	sanitizeInPlace(sanitized);
	return sanitized;
}

function sanitizeInPlace(value: unknown): void {
	if (Array.isArray(value)) {
		value.forEach(sanitizeInPlace);
		return;
	}

	if (!isRecord(value)) {
		return;
	}

	for (const [key, innerValue] of Object.entries(value)) {
		if (OMITTED_KEYS.has(key)) {
			delete value[key];
			continue;
		}

		if (typeof innerValue === "string") {
			if (HOSTNAME_KEYS.has(key)) {
				value[key] = extractHostname(innerValue);
			} else if (TRUNCATED_KEYS.has(key)) {
				value[key] = truncateText(innerValue);
			}
			continue;
		}

		sanitizeInPlace(innerValue);
	}
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function extractHostname(candidate: string): string {
	const trimmed = candidate.trim();
	if (trimmed.length === 0) {
		return trimmed;
	}

	const attempts = [trimmed];
	if (!/^\w+:\/\//u.test(trimmed)) {
		attempts.push(`https://${trimmed}`);
	}

	for (const attempt of attempts) {
		try {
			const url = new URL(attempt);
			if (url.hostname) {
				return url.hostname;
			}
		} catch {
			continue;
		}
	}

	const withoutScheme = trimmed.replace(/^\w+:\/\//u, "");
	const host = withoutScheme.split(/[/?#]/u)[0] ?? withoutScheme;
	return host.replace(/:\d+$/u, "");
}

function truncateText(value: string): string {
	if (value.length <= MAX_TEXT_LENGTH) {
		return value;
	}

	const sliceLength = Math.max(0, MAX_TEXT_LENGTH - TRUNCATION_SUFFIX.length);
	return `${value.slice(0, sliceLength)}${TRUNCATION_SUFFIX}`;
}
