import {
	ChatRequestSchema,
	ExerciseCheckRequestSchema,
	ExerciseRequestSchema,
	ExplainRequestSchema,
	LearnerLevelSchema,
	SUPPORTED_LANGUAGES,
	type ChatRequestInput
} from "@polyglot-tutor/shared/tutor";
import { describe, expect, it, vi } from "vitest";

import type { DiagnosticsEvent } from "../../../src/infra/logging/index.js";
import {
	ContextOverflowError,
	GenerationAbortedError,
	ProviderUnavailableError
} from "../../../src/services/llm/provider.js";
import {
	CORRECT_ANSWER_FEEDBACK,
	FEEDBACK_FALLBACK,
	buildTutorSystemPrompt
} from "../../../src/services/tutor/prompts.js";
import {
	ExerciseGenerationError,
	StreamingReplyCleaner,
	TutorService,
	cleanReply,
	normalizeCorrection,
	type ContextRetriever,
	type InteractionCollector
} from "../../../src/services/tutor/tutor.service.js";
import { FakeLlmProvider } from "../../helpers/fake-provider.js";

const FIXED_NOW = 1_715_000_000_000;
const CONTEXT_SNIPPET = "Grammar: Use 'a' before consonant sounds and 'an' before vowel sounds.";

function createHarness(options: { collector?: InteractionCollector; contextLength?: number } = {}) {
	const provider = new FakeLlmProvider({ contextLength: options.contextLength });
	const events: DiagnosticsEvent[] = [];
	const retriever: ContextRetriever = { searchContext: vi.fn(async () => [CONTEXT_SNIPPET]) };
	let nextId = 0;
	const service = new TutorService({
		provider,
		retriever,
		interactionCollector: options.collector ?? null,
		diagnosticsRecorder: { record: (event) => void events.push(event) },
		createId: () => {
			nextId += 1;
			return `ex-${nextId}`;
		},
		now: () => FIXED_NOW
	});
	return { service, provider, retriever, events };
}

function chatRequest(input: Partial<ChatRequestInput> = {}) {
	return ChatRequestSchema.parse({ message: "How do I use articles?", ...input });
}

function history(count: number) {
	return Array.from({ length: count }, (_, index) => ({
		role: index % 2 === 0 ? ("user" as const) : ("assistant" as const),
		content: `history turn ${index}`
	}));
}

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
	const chunks: string[] = [];
	for await (const chunk of stream) {
		chunks.push(chunk);
	}
	return chunks;
}

function multipleChoice(question: string, answer: string) {
	return { question, options: ["a", "an", "the", "-"], correct_answer: answer, explanation: "Articles" };
}

describe("TutorService.chat", () => {
	it("sends the tutor prompt, retrieved context and message", async () => {
		const { service, provider, retriever } = createHarness();
		provider.enqueue("Use 'an' before vowel sounds.");

		const result = await service.chat(chatRequest({ target_language: "English", learner_level: "beginner" }));

		expect(result).toEqual({ response: "Use 'an' before vowel sounds.", context_used: [CONTEXT_SNIPPET] });
		expect(retriever.searchContext).toHaveBeenCalledWith("How do I use articles?", "English", 3);
		const call = provider.lastCall();
		expect(call?.messages).toEqual([
			{ role: "system", content: buildTutorSystemPrompt("English", "beginner") },
			{
				role: "system",
				content: `Reference notes for the tutor (background material, not written by the learner):\n- ${CONTEXT_SNIPPET}`
			},
			{ role: "user", content: "How do I use articles?" }
		]);
		expect(call?.options).toMatchObject({ temperature: 0.7, maxTokens: 1024 });
	});

	it("skips retrieval when use_rag is false", async () => {
		const { service, provider, retriever } = createHarness();
		provider.enqueue("Sure.");

		const result = await service.chat(chatRequest({ use_rag: false }));

		expect(result.context_used).toBeNull();
		expect(retriever.searchContext).not.toHaveBeenCalled();
		expect(provider.lastCall()?.messages).toHaveLength(2);
	});

	it("retries once with half the history after a context overflow", async () => {
		const { service, provider } = createHarness();
		provider.enqueue(new ContextOverflowError("prompt too long"), "Shorter answer.");

		const result = await service.chat(chatRequest({ use_rag: false, history: history(4) }));

		expect(result.response).toBe("Shorter answer.");
		expect(provider.calls).toHaveLength(2);
		expect(provider.calls[0]?.messages).toHaveLength(6);
		expect(provider.calls[1]?.messages.map((message) => message.content).slice(1, 3)).toEqual([
			"history turn 2",
			"history turn 3"
		]);
	});

	it("surfaces a context overflow when there is no history to drop", async () => {
		const { service, provider } = createHarness();
		provider.enqueue(new ContextOverflowError("prompt too long"));

		await expect(service.chat(chatRequest({ use_rag: false }))).rejects.toBeInstanceOf(ContextOverflowError);
		expect(provider.calls).toHaveLength(1);
	});

	it("treats an empty reply as a provider failure", async () => {
		const { service, provider } = createHarness();
		provider.enqueue("<|im_end|>  ");

		await expect(service.chat(chatRequest())).rejects.toThrow("Model returned an empty reply");
	});

	it("collects the exchange for training and tolerates collector failures", async () => {
		const collector: InteractionCollector = {
			collectInteraction: vi.fn(async () => Promise.reject(new Error("store offline")))
		};
		const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
		const { service, provider } = createHarness({ collector });
		provider.enqueue("Привет!");

		const result = await service.chat(chatRequest({ message: "Say hi", target_language: "Russian", use_rag: false }));

		expect(result.response).toBe("Привет!");
		expect(collector.collectInteraction).toHaveBeenCalledWith({
			userMessage: "Say hi",
			assistantResponse: "Привет!",
			language: "Russian",
			level: "intermediate"
		});
		expect(warn).toHaveBeenCalledWith("Failed to collect chat interaction for training", expect.any(Error));
		warn.mockRestore();
	});
});

describe("TutorService.chat for every language and level", () => {
	for (const language of SUPPORTED_LANGUAGES) {
		for (const level of LearnerLevelSchema.options) {
			it(`keeps the tutor instructions out of the ${language} ${level} reply`, async () => {
				const { service, provider } = createHarness();
				const systemPrompt = buildTutorSystemPrompt(language, level);
				provider.enqueue(
					(messages) => `<|im_start|>assistant\n${messages[0]?.content ?? ""}\nLet's practise together.<|im_end|>`
				);

				const result = await service.chat(
					chatRequest({ message: "Hello", use_rag: false, target_language: language, learner_level: level })
				);

				expect(provider.lastCall()?.messages[0]).toEqual({ role: "system", content: systemPrompt });
				expect(result.response).toBe("Let's practise together.");
				expect(result.response).not.toContain(systemPrompt);
			});
		}
	}
});

describe("TutorService.chatStream", () => {
	it("removes markup split across chunks", async () => {
		const { service, provider } = createHarness();
		provider.enqueueStream({ chunks: ["Hel", "lo<|im_", "end|>"] });

		await expect(collect(service.chatStream(chatRequest({ use_rag: false })))).resolves.toEqual(["Hel", "lo"]);
	});

	it("drops a system prompt echoed at the start of the stream", async () => {
		const { service, provider } = createHarness();
		const systemPrompt = buildTutorSystemPrompt("Japanese", "beginner");
		provider.enqueueStream({ chunks: [systemPrompt.slice(0, 20), `${systemPrompt.slice(20)}\nこんにちは!`] });

		const chunks = await collect(
			service.chatStream(chatRequest({ use_rag: false, target_language: "Japanese", learner_level: "beginner" }))
		);

		expect(chunks).toEqual(["こんにちは!"]);
	});

	it("yields the provider chunks and skips empty ones", async () => {
		const { service, provider } = createHarness();
		provider.enqueueStream({ chunks: ["Bon", "", "jour"] });

		await expect(collect(service.chatStream(chatRequest({ use_rag: false })))).resolves.toEqual(["Bon", "jour"]);
		expect(provider.lastCall()?.operation).toBe("stream");
		expect(provider.streamClosed).toBe(1);
	});

	it("reduces history when the stream overflows before any chunk", async () => {
		const { service, provider } = createHarness();
		provider.enqueueStream(
			{ chunks: [], failWith: new ContextOverflowError("prompt too long") },
			{ chunks: ["ok"] }
		);

		const chunks = await collect(service.chatStream(chatRequest({ use_rag: false, history: history(2) })));

		expect(chunks).toEqual(["ok"]);
		expect(provider.calls[1]?.messages.map((message) => message.content).slice(1, -1)).toEqual(["history turn 1"]);
	});

	it("closes the provider stream when the consumer stops early", async () => {
		const { service, provider } = createHarness();
		provider.enqueueStream({ chunks: ["one", "two", "three"] });

		for await (const chunk of service.chatStream(chatRequest({ use_rag: false }))) {
			expect(chunk).toBe("one");
			break;
		}

		expect(provider.streamClosed).toBe(1);
	});
});

describe("TutorService.explainGrammar", () => {
	it("retrieves context for the topic and returns the explanation", async () => {
		const { service, provider, retriever } = createHarness();
		provider.enqueue("Articles come before nouns.");

		const result = await service.explainGrammar(ExplainRequestSchema.parse({ topic: "Articles" }));

		expect(result).toEqual({ explanation: "Articles come before nouns.", context_used: [CONTEXT_SNIPPET] });
		expect(retriever.searchContext).toHaveBeenCalledWith("Articles", "English", 3);
		expect(provider.lastCall()?.messages.at(-1)).toEqual({ role: "user", content: "Please explain: Articles" });
		expect(provider.lastCall()?.options).toMatchObject({ temperature: 0.7, maxTokens: 1500 });
	});

	it("rejects an empty explanation", async () => {
		const { service, provider } = createHarness();
		provider.enqueue("   ");

		await expect(service.explainGrammar(ExplainRequestSchema.parse({ topic: "Articles" }))).rejects.toThrow(
			"Model returned an empty explanation"
		);
	});
});

describe("TutorService.correct", () => {
	it("returns blank input unchanged without calling the model", async () => {
		const { service, provider } = createHarness();

		await expect(service.correct("   ", "English")).resolves.toEqual({
			original_text: "   ",
			corrected_text: "   ",
			errors: [],
			has_errors: false
		});
		expect(provider.calls).toHaveLength(0);
	});

	it("parses a JSON correction", async () => {
		const { service, provider } = createHarness();
		provider.enqueue(
			JSON.stringify({
				corrected_text: "I went home yesterday.",
				errors: [{ original: "goed", corrected: "went", error_type: "grammar", explanation: "Irregular past tense", position: 2 }]
			})
		);

		const result = await service.correct("I goed home yesterday.", "English");

		expect(result).toEqual({
			original_text: "I goed home yesterday.",
			corrected_text: "I went home yesterday.",
			errors: [
				{ original: "goed", corrected: "went", error_type: "grammar", explanation: "Irregular past tense", position: 2 }
			],
			has_errors: true
		});
		expect(provider.lastCall()?.options).toMatchObject({ temperature: 0.3, maxTokens: 2048, jsonMode: true });
	});

	it("retries with a stricter prompt and then falls back to the original text", async () => {
		const { service, provider, events } = createHarness();
		provider.enqueue("Looks good to me!", "Still no JSON here");

		const result = await service.correct("I goed home.", "English");

		expect(result).toEqual({ original_text: "I goed home.", corrected_text: "I goed home.", errors: [], has_errors: false });
		expect(provider.calls).toHaveLength(2);
		expect(provider.calls[1]?.messages[0]?.content).toContain("Your previous answer could not be parsed.");
		expect(events).toEqual([
			{
				type: "structured_output_fallback",
				operation: "correction",
				stage: "retry",
				message: "Model response did not contain a JSON object",
				responseText: "Looks good to me!",
				timestamp: FIXED_NOW
			},
			{
				type: "structured_output_fallback",
				operation: "correction",
				stage: "fallback",
				message: "Model response did not contain a JSON object",
				responseText: "Still no JSON here",
				timestamp: FIXED_NOW
			}
		]);
	});

	it("propagates provider failures", async () => {
		const { service, provider } = createHarness();
		provider.enqueue(new ProviderUnavailableError("Groq is down", { reason: "network" }));

		await expect(service.correct("I goed home.", "English")).rejects.toThrow("Groq is down");
	});
});

describe("normalizeCorrection", () => {
	it("reports no errors when the text is unchanged apart from spacing", () => {
		expect(normalizeCorrection("Hello  world", { correctedText: "Hello world ", errors: [] })).toEqual({
			original_text: "Hello  world",
			corrected_text: "Hello  world",
			errors: [],
			has_errors: false
		});
	});

	it("flags a changed text even when no errors were listed", () => {
		expect(normalizeCorrection("teh cat", { correctedText: "the cat", errors: [] })).toMatchObject({
			corrected_text: "the cat",
			has_errors: true
		});
	});

	it("keeps the original when the model returns an empty correction", () => {
		expect(normalizeCorrection("Fine.", { correctedText: "  ", errors: [] }).corrected_text).toBe("Fine.");
	});
});

describe("cleanReply", () => {
	it("removes chat markup and an echoed system prompt", () => {
		expect(cleanReply("<|im_start|>assistant\nHello<|im_end|>", "")).toBe("Hello");
		expect(cleanReply("You are a tutor. Hello there", "You are a tutor.")).toBe("Hello there");
		expect(cleanReply("Sure!\nYou are a tutor.\nAsk me anything.", "You are a tutor.")).toBe("Sure!\n\nAsk me anything.");
	});
});

describe("StreamingReplyCleaner", () => {
	it("releases an opening that only looked like the system prompt", () => {
		const cleaner = new StreamingReplyCleaner("You are a tutor.");

		expect(cleaner.push("You are")).toBe("");
		expect(cleaner.flush()).toBe("You are");
	});

	it("holds a role name that follows a split start marker", () => {
		const cleaner = new StreamingReplyCleaner("");

		expect(cleaner.push("<|im_start|>")).toBe("");
		expect(cleaner.push("assistant\nHi")).toBe("\nHi");
		expect(cleaner.push(" <")).toBe(" ");
		expect(cleaner.flush()).toBe("<");
	});
});

describe("TutorService.generateExercises", () => {
	it("returns at most the requested number of valid exercises", async () => {
		const { service, provider, events } = createHarness();
		provider.enqueue(
			JSON.stringify({
				exercises: [
					multipleChoice("___ apple", "an"),
					multipleChoice("___ banana", "a"),
					multipleChoice("___ sun", "the"),
					multipleChoice("___ hour", "a hour")
				]
			})
		);

		const exercises = await service.generateExercises(ExerciseRequestSchema.parse({ topic: "Articles", count: 2 }));

		expect(exercises.map((exercise) => [exercise.id, exercise.correct_answer])).toEqual([
			["ex-1", "an"],
			["ex-2", "a"]
		]);
		expect(events).toEqual([
			{
				type: "exercise_items_discarded",
				requested: 2,
				received: 4,
				discarded: 1,
				reasons: ["item 3: correct_answer is not one of the options"],
				timestamp: FIXED_NOW
			}
		]);
		expect(provider.lastCall()?.options).toMatchObject({ temperature: 0.7, maxTokens: 3000, jsonMode: true });
	});

	it("fails when no generated item is valid", async () => {
		const { service, provider } = createHarness();
		provider.enqueue(JSON.stringify({ exercises: [multipleChoice("___ hour", "a hour"), { question: 7 }] }));

		await expect(
			service.generateExercises(ExerciseRequestSchema.parse({ topic: "Articles" }))
		).rejects.toThrow("None of the 2 generated exercises passed validation");
	});

	it("fails when neither attempt returns readable JSON", async () => {
		const { service, provider } = createHarness();
		provider.enqueue("Here are some exercises!", "1. a  2. an");

		const failure = service.generateExercises(ExerciseRequestSchema.parse({ topic: "Articles" }));

		await expect(failure).rejects.toBeInstanceOf(ExerciseGenerationError);
		await expect(failure).rejects.toThrow("The model did not return readable exercises");
	});
});

describe("TutorService.checkAnswer", () => {
	const request = ExerciseCheckRequestSchema.parse({
		exercise_id: "ex-1",
		user_answer: "goed",
		correct_answer: "went",
		explanation: "Irregular"
	});

	it("accepts answers that differ only in case and spacing", async () => {
		const { service, provider } = createHarness();

		const result = await service.checkAnswer({ ...request, user_answer: "  WENT " }, "English");

		expect(result).toEqual({
			is_correct: true,
			correct_answer: "went",
			explanation: "Irregular",
			feedback: CORRECT_ANSWER_FEEDBACK
		});
		expect(provider.calls).toHaveLength(0);
	});

	it("asks the model for feedback on a wrong answer", async () => {
		const { service, provider } = createHarness();
		provider.enqueue("'Go' is irregular, so its past tense is 'went'.");

		const result = await service.checkAnswer(request, "English");

		expect(result.is_correct).toBe(false);
		expect(result.feedback).toBe("'Go' is irregular, so its past tense is 'went'.");
		expect(provider.lastCall()?.messages[1]?.content).toBe(
			'I answered "goed" but the correct answer is "went". Why?\nReference explanation: Irregular'
		);
		expect(provider.lastCall()?.options).toMatchObject({ temperature: 0.7, maxTokens: 200 });
	});

	it("uses fixed feedback when the model fails", async () => {
		const { service, provider, events } = createHarness();
		provider.enqueue(new ProviderUnavailableError("Groq is down", { reason: "network" }));

		const result = await service.checkAnswer(request, "English");

		expect(result.feedback).toBe(FEEDBACK_FALLBACK);
		expect(events).toEqual([
			{
				type: "structured_output_fallback",
				operation: "feedback",
				stage: "fallback",
				message: "Groq is down",
				timestamp: FIXED_NOW
			}
		]);
	});

	it("propagates cancellation", async () => {
		const { service, provider } = createHarness();
		provider.enqueue(new GenerationAbortedError());

		await expect(service.checkAnswer(request, "English")).rejects.toBeInstanceOf(GenerationAbortedError);
	});
});
