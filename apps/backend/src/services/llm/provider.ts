import type { LlmProviderName } from "@polyglot-tutor/shared/tutor";

export type LlmMessageRole = "system" | "user" | "assistant";

export interface LlmMessage {
	role: LlmMessageRole;
	content: string;
}

export interface GenerateOptions {
	temperature?: number;
	maxTokens?: number;
	jsonMode?: boolean;
	signal?: AbortSignal;
}

/**
 * Uniform contract over the inference backends. Call sites depend only on this
 * interface; the concrete variant is chosen once at startup.
 */
export interface LlmProvider {
	readonly name: LlmProviderName;
	readonly contextLength: number;
	generate(messages: LlmMessage[], options?: GenerateOptions): Promise<string>;
	generateStream(messages: LlmMessage[], options?: GenerateOptions): AsyncIterable<string>;
	healthCheck(): Promise<boolean>;
}

export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_MAX_TOKENS = 1024;
const CHARS_PER_TOKEN = 4;

export function estimateTokens(text: string): number {
	return Math.ceil(text.length / CHARS_PER_TOKEN);
}

export function estimateMessagesTokens(messages: readonly LlmMessage[]): number {
	// Role markers and separators cost a few tokens per message.
	return messages.reduce((total, message) => total + estimateTokens(message.content) + 4, 0);
}

export type ProviderUnavailableReason = "auth" | "quota" | "network" | "timeout" | "http" | "not_configured";

export class ProviderUnavailableError extends Error {
	readonly code = "PROVIDER_UNAVAILABLE" as const;
	readonly reason: ProviderUnavailableReason;
	readonly status: number | null;
	readonly retryable: boolean;
	readonly retryAfterMs: number | null;

	constructor(
		message: string,
		details: {
			reason: ProviderUnavailableReason;
			status?: number | null;
			retryable?: boolean;
			retryAfterMs?: number | null;
			cause?: unknown;
		}
	) {
		super(message, { cause: details.cause });
		this.name = "ProviderUnavailableError";
		this.reason = details.reason;
		this.status = details.status ?? null;
		this.retryable = details.retryable ?? false;
		this.retryAfterMs = details.retryAfterMs ?? null;
	}
}

export class ContextOverflowError extends Error {
	readonly code = "CONTEXT_OVERFLOW" as const;

	constructor(
		message: string,
		public readonly reason: "context_length" | "out_of_memory" = "context_length",
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = "ContextOverflowError";
	}
}

export class ResourceBusyError extends Error {
	readonly code = "RESOURCE_BUSY" as const;

	constructor(message: string, public readonly retryAfterSeconds = 5) {
		super(message);
		this.name = "ResourceBusyError";
	}
}

export class GenerationAbortedError extends Error {
	readonly code = "ABORTED" as const;

	constructor(message = "Generation was cancelled") {
		super(message);
		this.name = "GenerationAbortedError";
	}
}

export function isAbortError(error: unknown): boolean {
	if (error instanceof GenerationAbortedError) {
		return true;
	}
	return error instanceof Error && error.name === "AbortError";
}
