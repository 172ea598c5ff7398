import type {
	ChatRequest,
	ChatResponse,
	CorrectionResult,
	Exercise,
	ExerciseCheckRequest,
	ExerciseCheckResponse,
	ExerciseRequest,
	ExplainRequest,
	ExplainResponse,
	LearnerLevel
} from "@polyglot-tutor/shared/tutor";
import { randomUUID } from "node:crypto";

import { recordDiagnostics, type DiagnosticsRecorder } from "../../infra/logging/index.js";
import {
	ContextOverflowError,
	ProviderUnavailableError,
	isAbortError,
	type LlmMessage,
	type LlmProvider
} from "../llm/provider.js";
import { assemblePrompt, type AssembledPrompt } from "./prompt-budget.js";
import {
	CORRECT_ANSWER_FEEDBACK,
	FEEDBACK_FALLBACK,
	buildContextBlock,
	buildCorrectionSystemPrompt,
	buildCorrectionUserPrompt,
	buildExerciseSystemPrompt,
	buildExerciseUserPrompt,
	buildExplainSystemPrompt,
	buildExplainUserPrompt,
	buildFeedbackSystemPrompt,
	buildFeedbackUserPrompt,
	buildTutorSystemPrompt,
	type ExercisePromptInput
} from "./prompts.js";
import {
	MalformedModelOutputError,
	normalizeAnswer,
	parseCorrectionOutput,
	parseExerciseOutput,
	type ExerciseBatchResult,
	type ParsedCorrection
} from "./structured-output.js";

const RETRIEVAL_RESULTS = 3;

const CHAT_PARAMS = { temperature: 0.7, maxTokens: 1024 } as const;
const EXPLAIN_PARAMS = { temperature: 0.7, maxTokens: 1500 } as const;
const CORRECTION_PARAMS = { temperature: 0.3, maxTokens: 2048 } as const;
const EXERCISE_PARAMS = { temperature: 0.7, maxTokens: 3000 } as const;
const FEEDBACK_PARAMS = { temperature: 0.7, maxTokens: 200 } as const;

const CHAT_MARKUP_PATTERN = /<\|im_(?:start|end)\|>(?:system|user|assistant)?/gu;
const CHAT_MARKUP_FORMS = ["<|im_start|>", "<|im_end|>"].flatMap((marker) =>
	["", "system", "user", "assistant"].map((role) => marker + role)
);

export class ExerciseGenerationError extends Error {
	readonly code = "GENERATION_FAILED" as const;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "ExerciseGenerationError";
	}
}

export interface ContextRetriever {
	searchContext(text: string, language: string, k?: number): Promise<string[]>;
}

export interface CollectedInteraction {
	userMessage: string;
	assistantResponse: string;
	language: string;
	level: LearnerLevel;
}

export interface InteractionCollector {
	collectInteraction(interaction: CollectedInteraction): Promise<unknown>;
}

export interface TutorServiceOptions {
	provider: LlmProvider;
	retriever?: ContextRetriever | null;
	interactionCollector?: InteractionCollector | null;
	diagnosticsRecorder?: DiagnosticsRecorder | null;
	createId?: () => string;
	now?: () => number;
}

interface ChatPreparation {
	systemPrompt: string;
	contextBlock: string | null;
	context: string[];
}

/**
 * Orchestrates every tutoring operation over a single injected provider:
 * prompt selection, retrieval, prompt budgeting and structured-output
 * validation.
 */
export class TutorService {
	private readonly provider: LlmProvider;
	private readonly retriever: ContextRetriever | null;
	private readonly interactionCollector: InteractionCollector | null;
	private readonly diagnosticsRecorder: DiagnosticsRecorder | null;
	private readonly createId: () => string;
	private readonly now: () => number;

	constructor(options: TutorServiceOptions) {
		this.provider = options.provider;
		this.retriever = options.retriever ?? null;
		this.interactionCollector = options.interactionCollector ?? null;
		this.diagnosticsRecorder = options.diagnosticsRecorder ?? null;
		this.createId = options.createId ?? (() => randomUUID());
		this.now = options.now ?? (() => Date.now());
	}

	get providerName(): LlmProvider["name"] {
		return this.provider.name;
	}

	async chat(request: ChatRequest, signal?: AbortSignal): Promise<ChatResponse> {
		const preparation = await this.prepareChat(request);
		const reply = await this.generateChat(preparation, request, signal);

		const response = cleanReply(reply, preparation.systemPrompt);
		if (!response) {
			throw new ProviderUnavailableError("Model returned an empty reply", { reason: "http" });
		}

		await this.collect({
			userMessage: request.message,
			assistantResponse: response,
			language: request.target_language,
			level: request.learner_level
		});

		return { response, context_used: preparation.context.length > 0 ? preparation.context : null };
	}

	/**
	 * Streams the reply chunk by chunk. History reduction after a context
	 * overflow happens only while no chunk has been produced yet.
	 */
	async *chatStream(request: ChatRequest, signal?: AbortSignal): AsyncGenerator<string, void, undefined> {
		const preparation = await this.prepareChat(request);

		let maxHistoryTurns: number | undefined;
		for (;;) {
			const prompt = this.assembleChat(preparation, request, maxHistoryTurns);
			const iterator = this.provider
				.generateStream(prompt.messages, { ...CHAT_PARAMS, signal })
				[Symbol.asyncIterator]();

			let first: IteratorResult<string>;
			try {
				first = await iterator.next();
			} catch (error) {
				const reduced = this.reduceHistory(error, prompt, maxHistoryTurns);
				if (reduced === null) {
					throw error;
				}
				maxHistoryTurns = reduced;
				continue;
			}

			const cleaner = new StreamingReplyCleaner(preparation.systemPrompt);
			try {
				let current = first;
				while (!current.done) {
					const text = cleaner.push(current.value);
					if (text) {
						yield text;
					}
					current = await iterator.next();
				}
				const rest = cleaner.flush();
				if (rest) {
					yield rest;
				}
			} finally {
				await iterator.return?.();
			}
			return;
		}
	}

	async explainGrammar(request: ExplainRequest, signal?: AbortSignal): Promise<ExplainResponse> {
		const context = request.use_rag ? await this.retrieve(request.topic, request.target_language) : [];
		const systemPrompt = buildExplainSystemPrompt(request.target_language, request.learner_level);
		const messages: LlmMessage[] = [{ role: "system", content: systemPrompt }];
		const contextBlock = buildContextBlock(context);
		if (contextBlock) {
			messages.push({ role: "system", content: contextBlock });
		}
		messages.push({ role: "user", content: buildExplainUserPrompt(request.topic) });

		const explanation = cleanReply(await this.provider.generate(messages, { ...EXPLAIN_PARAMS, signal }), systemPrompt);
		if (!explanation) {
			throw new ProviderUnavailableError("Model returned an empty explanation", { reason: "http" });
		}

		return { explanation, context_used: context.length > 0 ? context : null };
	}

	async correct(text: string, language: string, signal?: AbortSignal): Promise<CorrectionResult> {
		if (text.trim().length === 0) {
			return { original_text: text, corrected_text: text, errors: [], has_errors: false };
		}

		const parsed = await this.generateStructured(
			"correction",
			(strict) => [
				{ role: "system", content: buildCorrectionSystemPrompt(language, strict) },
				{ role: "user", content: buildCorrectionUserPrompt(language, text) }
			],
			CORRECTION_PARAMS,
			parseCorrectionOutput,
			signal
		);

		if (!parsed) {
			return { original_text: text, corrected_text: text, errors: [], has_errors: false };
		}

		return normalizeCorrection(text, parsed);
	}

	async generateExercises(request: ExerciseRequest, signal?: AbortSignal): Promise<Exercise[]> {
		const input: ExercisePromptInput = {
			topic: request.topic,
			language: request.target_language,
			exerciseType: request.exercise_type,
			level: request.learner_level,
			count: request.count
		};

		const batch = await this.generateStructured<ExerciseBatchResult>(
			"exercises",
			(strict) => [
				{ role: "system", content: buildExerciseSystemPrompt(input, strict) },
				{ role: "user", content: buildExerciseUserPrompt(input) }
			],
			EXERCISE_PARAMS,
			(reply) => parseExerciseOutput(reply, request.exercise_type, this.createId),
			signal
		);

		if (!batch) {
			throw new ExerciseGenerationError("The model did not return readable exercises");
		}

		if (batch.rejections.length > 0) {
			await recordDiagnostics(this.diagnosticsRecorder, {
				type: "exercise_items_discarded",
				requested: request.count,
				received: batch.received,
				discarded: batch.rejections.length,
				reasons: batch.rejections,
				timestamp: this.now()
			});
		}

		if (batch.exercises.length === 0) {
			throw new ExerciseGenerationError(
				`None of the ${batch.received} generated exercises passed validation`
			);
		}

		return batch.exercises.slice(0, request.count);
	}

	async checkAnswer(
		request: ExerciseCheckRequest,
		language: string,
		signal?: AbortSignal
	): Promise<ExerciseCheckResponse> {
		const isCorrect = normalizeAnswer(request.user_answer) === normalizeAnswer(request.correct_answer);
		const explanation = request.explanation ?? "";

		const feedback = isCorrect
			? CORRECT_ANSWER_FEEDBACK
			: await this.generateFeedback(request, language, signal);

		return {
			is_correct: isCorrect,
			correct_answer: request.correct_answer,
			explanation,
			feedback
		};
	}

	private async generateFeedback(
		request: ExerciseCheckRequest,
		language: string,
		signal?: AbortSignal
	): Promise<string> {
		try {
			const reply = await this.provider.generate(
				[
					{ role: "system", content: buildFeedbackSystemPrompt(language) },
					{
						role: "user",
						content: buildFeedbackUserPrompt(request.user_answer, request.correct_answer, request.explanation)
					}
				],
				{ ...FEEDBACK_PARAMS, signal }
			);
			const feedback = cleanReply(reply, "");
			if (feedback) {
				return feedback;
			}
			await this.recordFallback("feedback", "fallback", "Model returned empty feedback");
		} catch (error) {
			if (isAbortError(error)) {
				throw error;
			}
			await this.recordFallback("feedback", "fallback", describeError(error));
		}

		return FEEDBACK_FALLBACK;
	}

	private async generateChat(
		preparation: ChatPreparation,
		request: ChatRequest,
		signal?: AbortSignal
	): Promise<string> {
		let maxHistoryTurns: number | undefined;
		for (;;) {
			const prompt = this.assembleChat(preparation, request, maxHistoryTurns);
			try {
				return await this.provider.generate(prompt.messages, { ...CHAT_PARAMS, signal });
			} catch (error) {
				const reduced = this.reduceHistory(error, prompt, maxHistoryTurns);
				if (reduced === null) {
					throw error;
				}
				maxHistoryTurns = reduced;
			}
		}
	}

	private async prepareChat(request: ChatRequest): Promise<ChatPreparation> {
		const context = request.use_rag ? await this.retrieve(request.message, request.target_language) : [];
		return {
			systemPrompt: buildTutorSystemPrompt(request.target_language, request.learner_level),
			contextBlock: buildContextBlock(context),
			context
		};
	}

	private assembleChat(
		preparation: ChatPreparation,
		request: ChatRequest,
		maxHistoryTurns: number | undefined
	): AssembledPrompt {
		return assemblePrompt({
			systemPrompt: preparation.systemPrompt,
			contextBlock: preparation.contextBlock,
			history: request.history,
			message: request.message,
			contextLength: this.provider.contextLength,
			maxTokens: CHAT_PARAMS.maxTokens,
			maxHistoryTurns
		});
	}

	/** Next history limit after an overflow, or null when no retry applies. */
	private reduceHistory(error: unknown, prompt: AssembledPrompt, current: number | undefined): number | null {
		if (!(error instanceof ContextOverflowError) || current !== undefined || prompt.includedTurns === 0) {
			return null;
		}
		return Math.floor(prompt.includedTurns / 2);
	}

	private async retrieve(text: string, language: string): Promise<string[]> {
		if (!this.retriever) {
			return [];
		}

		try {
			return await this.retriever.searchContext(text, language, RETRIEVAL_RESULTS);
		} catch (error) {
			await recordDiagnostics(this.diagnosticsRecorder, {
				type: "retrieval_degraded",
				operation: "query",
				message: describeError(error),
				timestamp: this.now()
			});
			return [];
		}
	}

	/**
	 * JSON-mode call with one stricter retry. Returns null when both attempts
	 * produced unreadable output; provider failures propagate.
	 */
	private async generateStructured<T>(
		operation: "correction" | "exercises",
		buildMessages: (strict: boolean) => LlmMessage[],
		params: { temperature: number; maxTokens: number },
		parse: (reply: string) => T,
		signal?: AbortSignal
	): Promise<T | null> {
		for (const strict of [false, true]) {
			const reply = await this.provider.generate(buildMessages(strict), { ...params, jsonMode: true, signal });
			try {
				return parse(reply);
			} catch (error) {
				if (!(error instanceof MalformedModelOutputError)) {
					throw error;
				}
				await this.recordFallback(operation, strict ? "fallback" : "retry", error.message, reply);
			}
		}

		return null;
	}

	private async recordFallback(
		operation: "correction" | "exercises" | "feedback",
		stage: "retry" | "fallback",
		message: string,
		responseText?: string
	): Promise<void> {
		await recordDiagnostics(this.diagnosticsRecorder, {
			type: "structured_output_fallback",
			operation,
			stage,
			message,
			...(responseText === undefined ? {} : { responseText }),
			timestamp: this.now()
		});
	}

	private async collect(interaction: CollectedInteraction): Promise<void> {
		if (!this.interactionCollector) {
			return;
		}

		try {
			await this.interactionCollector.collectInteraction(interaction);
		} catch (error) {
			console.warn("Failed to collect chat interaction for training", error);
		}
	}
}

function collapseWhitespace(value: string): string {
	return value.trim().replace(/\s+/gu, " ");
}

export function normalizeCorrection(originalText: string, parsed: ParsedCorrection): CorrectionResult {
	const correctedText = parsed.correctedText.trim().length > 0 ? parsed.correctedText : originalText;
	const changed = collapseWhitespace(correctedText) !== collapseWhitespace(originalText);
	const hasErrors = parsed.errors.length > 0 || changed;

	return {
		original_text: originalText,
		corrected_text: hasErrors ? correctedText : originalText,
		errors: parsed.errors,
		has_errors: hasErrors
	};
}

/**
 * Removes chat-template markup and an echoed system prompt from model text.
 */
export function cleanReply(reply: string, systemPrompt: string): string {
	const text = reply.replace(CHAT_MARKUP_PATTERN, "");
	const echoed = systemPrompt.trim();
	return (echoed ? text.split(echoed).join("") : text).trim();
}

/** Start of a markup token cut off at the end of `text`, or `text.length`. */
function partialMarkupStart(text: string): number {
	const index = text.lastIndexOf("<");
	if (index === -1) {
		return text.length;
	}
	const tail = text.slice(index);
	return CHAT_MARKUP_FORMS.some((form) => form.length > tail.length && form.startsWith(tail)) ? index : text.length;
}

/**
 * Incremental form of {@link cleanReply} for streamed replies. Markup split
 * across chunks is held back until it can be removed whole, and the opening
 * text is held while it still reads as an echo of the system prompt.
 */
export class StreamingReplyCleaner {
	private readonly echoed: string;
	private pending = "";
	private head = "";
	private headResolved: boolean;

	constructor(systemPrompt: string) {
		this.echoed = systemPrompt.trim();
		this.headResolved = this.echoed.length === 0;
	}

	push(chunk: string): string {
		this.pending += chunk;
		const hold = partialMarkupStart(this.pending);
		const ready = this.pending.slice(0, hold).replace(CHAT_MARKUP_PATTERN, "");
		this.pending = this.pending.slice(hold);
		return this.release(ready, false);
	}

	flush(): string {
		const ready = this.pending.replace(CHAT_MARKUP_PATTERN, "");
		this.pending = "";
		return this.release(ready, true);
	}

	private release(text: string, final: boolean): string {
		if (this.headResolved) {
			return text;
		}

		this.head += text;
		const opening = this.head.trimStart();
		if (!final && opening.length < this.echoed.length && this.echoed.startsWith(opening)) {
			return "";
		}

		this.headResolved = true;
		const head = this.head;
		this.head = "";
		return opening.startsWith(this.echoed) ? opening.slice(this.echoed.length).trimStart() : head;
	}
}

function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
