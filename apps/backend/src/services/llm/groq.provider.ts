import { performance } from "node:perf_hooks";

import {
	ContextOverflowError,
	DEFAULT_MAX_TOKENS,
	DEFAULT_TEMPERATURE,
	GenerationAbortedError,
	ProviderUnavailableError,
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
	extractMessageContent,
	isRecord,
	parseRetryAfter,
	readServerSentData,
	safeJsonParse,
	sleep,
	trimTrailingSlash
} from "./provider-http.js";
import { recordDiagnostics, type DiagnosticsRecorder } from "../../infra/logging/index.js";

const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_RETRY_BASE_DELAY_MS = 500;
const MAX_RETRY_DELAY_MS = 8_000;
const MAX_JITTER_MS = 100;
const HEALTH_TIMEOUT_MS = 5_000;
const RETRYABLE_STATUSES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

export interface GroqProviderOptions {
	apiKey: string;
	model: string;
	baseUrl: string;
	contextLength: number;
	timeoutMs?: number;
	maxRetries?: number;
	retryBaseDelayMs?: number;
	fetchImpl?: typeof fetch;
	sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
	random?: () => number;
	diagnosticsRecorder?: DiagnosticsRecorder | null;
	now?: () => number;
}

interface OpenResponse {
	response: Response;
	release(): void;
}

interface CompletionRequest {
	url: URL;
	headers: Record<string, string>;
	body: Record<string, unknown>;
}

/**
 * Hosted chat-completion client for Groq's OpenAI-compatible API.
 */
export class GroqProvider implements LlmProvider {
	readonly name = "groq" as const;
	readonly contextLength: number;
	private readonly apiKey: string;
	private readonly model: string;
	private readonly baseUrl: string;
	private readonly timeoutMs: number;
	private readonly maxRetries: number;
	private readonly retryBaseDelayMs: number;
	private readonly fetchImpl: typeof fetch;
	private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
	private readonly random: () => number;
	private readonly diagnosticsRecorder: DiagnosticsRecorder | null;
	private readonly now: () => number;

	constructor(options: GroqProviderOptions) {
		this.apiKey = options.apiKey.trim();
		this.model = options.model;
		this.baseUrl = trimTrailingSlash(options.baseUrl);
		this.contextLength = options.contextLength;
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
		this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULT_RETRY_BASE_DELAY_MS;
		this.fetchImpl = options.fetchImpl ?? globalThis.fetch.bind(globalThis);
		this.sleep = options.sleep ?? sleep;
		this.random = options.random ?? Math.random;
		this.diagnosticsRecorder = options.diagnosticsRecorder ?? null;
		this.now = options.now ?? (() => Date.now());
	}

	async generate(messages: LlmMessage[], options: GenerateOptions = {}): Promise<string> {
		const request = this.buildRequest(messages, options, false);
		const startedAt = performance.now();
		let attempts = 0;

		try {
			const content = await this.withRetries(options.signal, async () => {
				attempts += 1;
				const { response, release } = await this.send(request, options.signal);
				try {
					return this.parseCompletion(await response.text());
				} finally {
					release();
				}
			});
			await this.recordRequest("generate", "success", attempts, startedAt);
			return content;
		} catch (error) {
			await this.recordRequest("generate", isAbortError(error) ? "cancelled" : "error", attempts, startedAt, error);
			throw error;
		}
	}

	async *generateStream(messages: LlmMessage[], options: GenerateOptions = {}): AsyncGenerator<string> {
		const request = this.buildRequest(messages, options, true);
		const startedAt = performance.now();
		let attempts = 0;
		let outcome: "success" | "error" | "cancelled" = "success";
		let failure: unknown = null;

		// Retries only cover establishing the stream, never a stream that has
		// already produced chunks.
		const { response, release } = await this.withRetries(options.signal, async () => {
			attempts += 1;
			return this.send(request, options.signal);
		}).catch(async (error: unknown) => {
			await this.recordRequest("stream", isAbortError(error) ? "cancelled" : "error", attempts, startedAt, error);
			throw error;
		});

		try {
			const body = response.body;
			if (!body) {
				throw new ProviderUnavailableError("Groq returned an empty stream", { reason: "http", status: response.status });
			}

			for await (const data of readServerSentData(body)) {
				if (data === "[DONE]") {
					break;
				}

				const chunk = this.parseStreamChunk(data);
				if (chunk) {
					yield chunk;
				}
			}

			if (options.signal?.aborted) {
				outcome = "cancelled";
			}
		} catch (error) {
			outcome = isAbortError(error) || options.signal?.aborted ? "cancelled" : "error";
			failure = error;
			if (outcome === "cancelled") {
				throw new GenerationAbortedError();
			}
			throw error;
		} finally {
			release();
			if (options.signal?.aborted) {
				outcome = "cancelled";
			}
			await this.recordRequest("stream", outcome, attempts, startedAt, failure);
		}
	}

	async healthCheck(): Promise<boolean> {
		if (!this.apiKey) {
			return false;
		}

		const abort = createLinkedAbort(HEALTH_TIMEOUT_MS);
		try {
			const response = await this.fetchImpl(`${this.baseUrl}/models`, {
				method: "GET",
				headers: { Authorization: `Bearer ${this.apiKey}` },
				signal: abort.signal
			});
			await response.body?.cancel();
			return response.ok;
		} catch (error) {
			console.warn("Groq health check failed", deriveNetworkError(error).message);
			return false;
		} finally {
			abort.dispose();
		}
	}

	private buildRequest(messages: LlmMessage[], options: GenerateOptions, stream: boolean): CompletionRequest {
		const body: Record<string, unknown> = {
			model: this.model,
			messages: messages.map(({ role, content }) => ({ role, content })),
			temperature: options.temperature ?? DEFAULT_TEMPERATURE,
			max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
			stream
		};

		if (options.jsonMode) {
			body.response_format = { type: "json_object" };
		}

		return {
			url: new URL(`${this.baseUrl}/chat/completions`),
			headers: {
				"content-type": "application/json",
				Authorization: this.apiKey.startsWith("Bearer ") ? this.apiKey : `Bearer ${this.apiKey}`
			},
			body
		};
	}

	private async send(request: CompletionRequest, signal?: AbortSignal): Promise<OpenResponse> {
		if (!this.apiKey) {
			throw new ProviderUnavailableError("GROQ_API_KEY is not configured", { reason: "not_configured" });
		}

		const abort = createLinkedAbort(this.timeoutMs, signal);
		let response: Response;

		try {
			response = await this.fetchImpl(request.url.toString(), {
				method: "POST",
				headers: request.headers,
				body: JSON.stringify(request.body),
				signal: abort.signal
			});
		} catch (error) {
			abort.dispose();
			if (signal?.aborted) {
				throw new GenerationAbortedError();
			}
			if (abort.timedOut()) {
				throw new ProviderUnavailableError(`Groq request timed out after ${this.timeoutMs}ms`, {
					reason: "timeout",
					retryable: true,
					cause: error
				});
			}
			const { code, message } = deriveNetworkError(error);
			throw new ProviderUnavailableError(describeNetworkError(code, request.url) ?? message, {
				reason: "network",
				retryable: true,
				cause: error
			});
		}

		// The timeout bounds the time to the response headers; the caller's signal
		// stays linked until the body has been consumed.
		abort.clearTimer();

		if (!response.ok) {
			const rawBody = await response.text().finally(() => abort.dispose());
			throw this.mapHttpError(response.status, rawBody, response.headers.get("retry-after"));
		}

		return { response, release: () => abort.dispose() };
	}

	private mapHttpError(status: number, rawBody: string, retryAfter: string | null): Error {
		const details = extractErrorObject(rawBody);
		const errorCode = typeof details.code === "string" ? details.code : String(status);
		const detailMessage = typeof details.message === "string" ? details.message : null;

		if (status === 401 || status === 403) {
			return new ProviderUnavailableError(detailMessage ?? "Invalid API key. Check your credentials.", {
				reason: "auth",
				status
			});
		}

		if (errorCode === "insufficient_quota" || details.type === "insufficient_quota") {
			return new ProviderUnavailableError(detailMessage ?? "API quota exhausted", { reason: "quota", status });
		}

		if (errorCode === "context_length_exceeded") {
			return new ContextOverflowError(detailMessage ?? "Prompt exceeds the model context window");
		}

		return new ProviderUnavailableError(detailMessage ?? `Request failed with status ${status}`, {
			reason: "http",
			status,
			retryable: RETRYABLE_STATUSES.has(status),
			retryAfterMs: parseRetryAfter(retryAfter)
		});
	}

	private parseCompletion(rawBody: string): string {
		const parsed = safeJsonParse(rawBody);
		const choices = isRecord(parsed) && Array.isArray(parsed.choices) ? parsed.choices : [];
		const choice = choices.find((candidate): candidate is Record<string, unknown> => isRecord(candidate));
		const message = choice && isRecord(choice.message) ? choice.message : null;
		const content = message ? extractMessageContent(message.content) : null;

		if (content === null) {
			throw new ProviderUnavailableError("Groq returned a response without content", { reason: "http", status: 200 });
		}

		return content;
	}

	private parseStreamChunk(data: string): string | null {
		const parsed = safeJsonParse(data);
		if (!isRecord(parsed)) {
			return null;
		}

		if (isRecord(parsed.error)) {
			const message = typeof parsed.error.message === "string" ? parsed.error.message : "Stream failed";
			throw new ProviderUnavailableError(message, { reason: "http" });
		}

		const choices = Array.isArray(parsed.choices) ? parsed.choices : [];
		const choice = choices.find((candidate): candidate is Record<string, unknown> => isRecord(candidate));
		const delta = choice && isRecord(choice.delta) ? choice.delta : null;
		const content = delta ? extractMessageContent(delta.content) : null;
		return content && content.length > 0 ? content : null;
	}

	private async withRetries<T>(signal: AbortSignal | undefined, task: () => Promise<T>): Promise<T> {
		let attempt = 0;

		while (true) {
			try {
				return await task();
			} catch (error) {
				if (!(error instanceof ProviderUnavailableError) || !error.retryable || attempt >= this.maxRetries) {
					throw error;
				}

				const delayMs =
					error.retryAfterMs === null
						? this.backoffMs(attempt)
						: Math.min(MAX_RETRY_DELAY_MS, error.retryAfterMs);
				attempt += 1;
				await recordDiagnostics(this.diagnosticsRecorder, {
					type: "llm_retry",
					provider: this.name,
					endpointUrl: this.baseUrl,
					attempt,
					delayMs,
					reason: error.message,
					timestamp: this.now()
				});
				await this.sleep(delayMs, signal);
			}
		}
	}

	private backoffMs(attempt: number): number {
		const exponential = Math.min(MAX_RETRY_DELAY_MS, this.retryBaseDelayMs * 2 ** attempt);
		return exponential + Math.floor(this.random() * MAX_JITTER_MS);
	}

	private async recordRequest(
		operation: "generate" | "stream",
		outcome: "success" | "error" | "cancelled",
		attempts: number,
		startedAt: number,
		error?: unknown
	): Promise<void> {
		await recordDiagnostics(this.diagnosticsRecorder, {
			type: "llm_request",
			provider: this.name,
			operation,
			outcome,
			attempts,
			durationMs: Math.max(0, Math.round(performance.now() - startedAt)),
			errorCode: outcome === "error" ? errorCodeOf(error) : undefined,
			timestamp: this.now()
		});
	}
}

function errorCodeOf(error: unknown): string {
	if (isRecord(error) && typeof error.code === "string") {
		return error.code;
	}
	return "UNKNOWN";
}
