import type { TutorConfig } from "../../config/tutor.js";
import type { DiagnosticsRecorder } from "../../infra/logging/index.js";
import { GroqProvider } from "./groq.provider.js";
import { LocalInferenceProvider } from "./local.provider.js";
import type { LlmProvider } from "./provider.js";

export interface CreateLlmProviderOptions {
	fetchImpl?: typeof fetch;
	diagnosticsRecorder?: DiagnosticsRecorder | null;
}

export function createLlmProvider(config: TutorConfig, options: CreateLlmProviderOptions = {}): LlmProvider {
	if (config.llmProvider === "local") {
		return new LocalInferenceProvider({
			serverUrl: config.local.serverUrl,
			contextLength: config.contextLength,
			maxConcurrency: config.local.maxConcurrency,
			maxQueue: config.local.maxQueue,
			queueTimeoutMs: config.local.queueTimeoutMs,
			timeoutMs: config.requestTimeoutMs,
			fetchImpl: options.fetchImpl,
			diagnosticsRecorder: options.diagnosticsRecorder
		});
	}

	return new GroqProvider({
		apiKey: config.groq.apiKey,
		model: config.groq.model,
		baseUrl: config.groq.baseUrl,
		contextLength: config.contextLength,
		timeoutMs: config.requestTimeoutMs,
		maxRetries: config.maxRetries,
		retryBaseDelayMs: config.retryBaseDelayMs,
		fetchImpl: options.fetchImpl,
		diagnosticsRecorder: options.diagnosticsRecorder
	});
}
