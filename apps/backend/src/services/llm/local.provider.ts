import { performance } from "node:perf_hooks";

import { AdmissionGate, type ReleaseSlot } from "./admission-gate.js";
import {
	ContextOverflowError,
	DEFAULT_MAX_TOKENS,
	DEFAULT_TEMPERATURE,
	GenerationAbortedError,
	ProviderUnavailableError,
	ResourceBusyError,
	estimateTokens,
	isAbortError,
	type GenerateOptions,
	type LlmMessage,
	type LlmProvider
} from "./provider.js";
import {
	createLinkedAbort,
	deriveNetworkError,
	describeNetworkError,
	extractErrorObject,
	isRecord,
	readServerSentData,
	safeJsonParse,
	trimTrailingSlash
} from "./provider-http.js";
import { recordDiagnostics, type DiagnosticsRecorder } from "../../infra/logging/index.js";

const DEFAULT_TIMEOUT_MS = 120_000;
const HEALTH_TIMEOUT_MS = 3_000;
export const CHATML_STOP_SEQUENCES = ["<|im_end|>", "<|im_start|>"] as const;

const CONTEXT_ERROR_PATTERN = /exceed.*context|context (size|length|window)|too long|n_ctx/iu;
const MEMORY_ERROR_PATTERN = /out of memory|failed to allocate|\boom\b/iu;

export interface LocalInferenceProviderOptions {
	serverUrl: string;
	contextLength: number;
	timeoutMs?: number;
	admissionGate?: AdmissionGate;
	maxConcurrency?: number;
	maxQueue?: number;
	queueTimeoutMs?: number;
	fetchImpl?: typeof fetch;
	diagnosticsRecorder?: DiagnosticsRecorder | null;
	now?: () => number;
}

interface OpenResponse {
	response: Response;
	release(): void;
}

export function formatChatMlPrompt(messages: readonly LlmMessage[]): string {
	const turns = messages.map(({ role, content }) => `<|im_start|>${role}\n${content}<|im_end|>`);
	return `${turns.join("\n")}\n<|im_start|>assistant\n`;
}

/**
 * Provider backed by a quantized GGUF model served by a llama.cpp server on the
 * same host. The model holds one decoder state, so every generation passes
 * through an admission gate.
 */
export class LocalInferenceProvider implements LlmProvider {
	readonly name = "local" as const;
	readonly contextLength: number;
	private readonly serverUrl: string;
	private readonly timeoutMs: number;
	private readonly gate: AdmissionGate;
	private readonly fetchImpl: typeof fetch;
	private readonly diagnosticsRecorder: DiagnosticsRecorder | null;
	private readonly now: () => number;

	constructor(options: LocalInferenceProviderOptions) {
		this.serverUrl = trimTrailingSlash(options.serverUrl);
		this.contextLength = options.contextLength;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.gate =
			options.admissionGate ??
			new AdmissionGate({
				maxConcurrency: options.maxConcurrency ?? 1,
				maxQueue: options.maxQueue,
				queueTimeoutMs: options.queueTimeoutMs
			});
		this.fetchImpl = options.fetchImpl ?? globalThis.fetch.bind(globalThis);
		this.diagnosticsRecorder = options.diagnosticsRecorder ?? null;
		this.now = options.now ?? (() => Date.now());
	}

	async generate(messages: LlmMessage[], options: GenerateOptions = {}): Promise<string> {
		const body = this.buildBody(messages, options, false);
		const startedAt = performance.now();
		let release: ReleaseSlot | null = null;

		try {
			release = await this.gate.acquire(options.signal);
			const opened = await this.post(body, options.signal);
			const response = opened.response;
			const payload = safeJsonParse(await response.text().finally(() => opened.release()));
			const content = isRecord(payload) && typeof payload.content === "string" ? payload.content : null;
			if (content === null) {
				throw new ProviderUnavailableError("llama.cpp server returned a response without content", {
					reason: "http",
					status: response.status
				});
			}
			await this.recordRequest("generate", "success", startedAt);
			return stripStopMarkers(content);
		} catch (error) {
			await this.recordRequest("generate", isAbortError(error) ? "cancelled" : "error", startedAt, error);
			throw error;
		} finally {
			release?.();
		}
	}

	async *generateStream(messages: LlmMessage[], options: GenerateOptions = {}): AsyncGenerator<string> {
		const body = this.buildBody(messages, options, true);
		const startedAt = performance.now();
		let outcome: "success" | "error" | "cancelled" = "success";
		let failure: unknown = null;
		let release: ReleaseSlot | null = null;
		let opened: OpenResponse | null = null;

		try {
			release = await this.gate.acquire(options.signal);
			opened = await this.post(body, options.signal);
			const response = opened.response;
			if (!response.body) {
				throw new ProviderUnavailableError("llama.cpp server returned an empty stream", {
					reason: "http",
					status: response.status
				});
			}

			for await (const data of readServerSentData(response.body)) {
				const parsed = safeJsonParse(data);
				if (!isRecord(parsed)) {
					continue;
				}

				if (isRecord(parsed.error)) {
					throw this.mapServerError(500, data);
				}

				const content = typeof parsed.content === "string" ? stripStopMarkers(parsed.content) : "";
				if (content.length > 0) {
					yield content;
				}

				if (parsed.stop === true) {
					break;
				}
			}
		} catch (error) {
			failure = error;
			outcome = isAbortError(error) || options.signal?.aborted ? "cancelled" : "error";
			if (outcome === "cancelled") {
				throw new GenerationAbortedError();
			}
			throw error;
		} finally {
			// Runs when the consumer stops early too, so the slot is never leaked.
			opened?.release();
			release?.();
			if (options.signal?.aborted) {
				outcome = "cancelled";
			}
			await this.recordRequest("stream", outcome, startedAt, failure);
		}
	}

	async healthCheck(): Promise<boolean> {
		const abort = createLinkedAbort(HEALTH_TIMEOUT_MS);
		try {
			const response = await this.fetchImpl(`${this.serverUrl}/health`, {
				method: "GET",
				signal: abort.signal
			});
			await response.body?.cancel();
			return response.ok;
		} catch (error) {
			console.warn("Local model health check failed", deriveNetworkError(error).message);
			return false;
		} finally {
			abort.dispose();
		}
	}

	private buildBody(messages: LlmMessage[], options: GenerateOptions, stream: boolean): Record<string, unknown> {
		const prompt = formatChatMlPrompt(messages);
		const maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
		const promptTokens = estimateTokens(prompt);

		if (promptTokens + maxTokens > this.contextLength) {
			throw new ContextOverflowError(
				`Prompt of ~${promptTokens} tokens plus ${maxTokens} completion tokens exceeds the ${this.contextLength}-token context`
			);
		}

		const body: Record<string, unknown> = {
			prompt,
			n_predict: maxTokens,
			temperature: options.temperature ?? DEFAULT_TEMPERATURE,
			stop: [...CHATML_STOP_SEQUENCES],
			cache_prompt: true,
			stream
		};

		if (options.jsonMode) {
			body.json_schema = { type: "object" };
		}

		return body;
	}

	private async post(body: Record<string, unknown>, signal?: AbortSignal): Promise<OpenResponse> {
		const url = new URL(`${this.serverUrl}/completion`);
		const abort = createLinkedAbort(this.timeoutMs, signal);
		let response: Response;

		try {
			response = await this.fetchImpl(url.toString(), {
				method: "POST",
				headers: { "content-type": "application/json" },
				body: JSON.stringify(body),
				signal: abort.signal
			});
		} catch (error) {
			abort.dispose();
			if (signal?.aborted) {
				throw new GenerationAbortedError();
			}
			if (abort.timedOut()) {
				throw new ProviderUnavailableError(`Local model did not respond within ${this.timeoutMs}ms`, {
					reason: "timeout",
					cause: error
				});
			}
			const { code, message } = deriveNetworkError(error);
			throw new ProviderUnavailableError(describeNetworkError(code, url) ?? message, { reason: "network", cause: error });
		}

		// The caller's signal stays linked until the body has been consumed.
		abort.clearTimer();

		if (!response.ok) {
			const rawBody = await response.text().finally(() => abort.dispose());
			throw this.mapServerError(response.status, rawBody);
		}

		return { response, release: () => abort.dispose() };
	}

	private mapServerError(status: number, rawBody: string): Error {
		const details = extractErrorObject(rawBody);
		const message = typeof details.message === "string" ? details.message : `llama.cpp server failed with status ${status}`;
		const type = typeof details.type === "string" ? details.type : "";

		if (type === "exceed_context_size_error" || CONTEXT_ERROR_PATTERN.test(message)) {
			return new ContextOverflowError(message, "context_length");
		}

		if (MEMORY_ERROR_PATTERN.test(message)) {
			return new ContextOverflowError(message, "out_of_memory");
		}

		if (status === 503) {
			return new ResourceBusyError(message);
		}

		return new ProviderUnavailableError(message, { reason: "http", status });
	}

	private async recordRequest(
		operation: "generate" | "stream",
		outcome: "success" | "error" | "cancelled",
		startedAt: number,
		error?: unknown
	): Promise<void> {
		await recordDiagnostics(this.diagnosticsRecorder, {
			type: "llm_request",
			provider: this.name,
			operation,
			outcome,
			attempts: 1,
			durationMs: Math.max(0, Math.round(performance.now() - startedAt)),
			errorCode: outcome === "error" && isRecord(error) && typeof error.code === "string" ? error.code : undefined,
			timestamp: this.now()
		});
	}
}

function stripStopMarkers(text: string): string {
	return CHATML_STOP_SEQUENCES.reduce((current, marker) => current.split(marker).join(""), text);
}
