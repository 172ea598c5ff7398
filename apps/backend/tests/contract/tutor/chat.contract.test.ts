import { ChatResponseSchema, ExplainResponseSchema } from "@polyglot-tutor/shared/tutor";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { z } from "zod";

import { ContextOverflowError, ProviderUnavailableError } from "../../../src/services/llm/provider.js";
import { errorEnvelopeSchema, loadContractHarness, type ContractHarness } from "../helpers.js";

describe("Tutor contract: chat", () => {
	let harness: ContractHarness;

	beforeEach(async () => {
		harness = await loadContractHarness();
	});

	afterEach(async () => {
		await harness.close();
	});

	it("returns the tutor reply without context when retrieval is off", async () => {
		harness.provider.enqueue("Try: \"A coffee, please.\"");

		const response = await harness.app.inject({
			method: "POST",
			url: "/api/chat/",
			payload: {
				message: "How do I order coffee?",
				history: [
					{ role: "user", content: "Hello" },
					{ role: "assistant", content: "Hi! What would you like to practise?" }
				],
				use_rag: false
			}
		});

		expect(response.statusCode).toBe(200);
		expect(ChatResponseSchema.parse(response.json())).toEqual({
			response: "Try: \"A coffee, please.\"",
			context_used: null
		});

		const call = harness.provider.lastCall();
		expect(call?.options).toMatchObject({ temperature: 0.7, maxTokens: 1024 });
		expect(call?.messages.map((message) => message.role)).toEqual(["system", "user", "assistant", "user"]);
		expect(call?.messages.at(-1)?.content).toBe("How do I order coffee?");
	});

	it("includes retrieved reference material when retrieval is on", async () => {
		harness.provider.enqueue("Use the past simple for finished actions.");

		const response = await harness.app.inject({
			method: "POST",
			url: "/api/chat",
			payload: { message: "When do I use the past simple tense?", target_language: "English" }
		});

		expect(response.statusCode).toBe(200);
		const body = ChatResponseSchema.extend({ context_used: z.array(z.string()).min(1) }).parse(response.json());
		expect(body.response).toBe("Use the past simple for finished actions.");
		expect(harness.provider.lastCall()?.messages[1]?.content.startsWith("Reference notes for the tutor")).toBe(true);
	});

	it("rejects a blank message", async () => {
		const response = await harness.app.inject({
			method: "POST",
			url: "/api/chat",
			payload: { message: "   " }
		});

		expect(response.statusCode).toBe(400);
		expect(errorEnvelopeSchema.parse(response.json())).toMatchObject({
			error: "VALIDATION_ERROR",
			message: "message: message must not be empty"
		});
		expect(harness.provider.calls).toHaveLength(0);
	});

	it("rejects an unsupported language", async () => {
		const response = await harness.app.inject({
			method: "POST",
			url: "/api/chat",
			payload: { message: "Bonjour", target_language: "French" }
		});

		expect(response.statusCode).toBe(400);
		expect(errorEnvelopeSchema.parse(response.json()).message).toBe(
			"target_language: target_language must be one of English, Chinese, Russian, Japanese"
		);
	});

	it("maps provider failures to 502", async () => {
		harness.provider.enqueue(new ProviderUnavailableError("Groq rejected the API key", { reason: "auth", status: 401 }));

		const response = await harness.app.inject({
			method: "POST",
			url: "/api/chat",
			payload: { message: "Hello", use_rag: false }
		});

		expect(response.statusCode).toBe(502);
		expect(errorEnvelopeSchema.parse(response.json())).toMatchObject({
			error: "PROVIDER_UNAVAILABLE",
			message: "Groq rejected the API key"
		});
	});
});

describe("Tutor contract: chat stream", () => {
	let harness: ContractHarness;

	beforeEach(async () => {
		harness = await loadContractHarness();
	});

	afterEach(async () => {
		await harness.close();
	});

	it("streams chunks as server-sent events and ends with [DONE]", async () => {
		harness.provider.enqueueStream({ chunks: ["Hola", " amigo", "\n¿Qué tal?"] });

		const response = await harness.app.inject({
			method: "POST",
			url: "/api/chat/stream",
			payload: { message: "Greet me in Spanish", use_rag: false }
		});

		expect(response.statusCode).toBe(200);
		expect(response.headers["content-type"]).toBe("text/event-stream; charset=utf-8");
		expect(response.headers["cache-control"]).toBe("no-cache");
		expect(response.body).toBe("data: Hola\n\ndata:  amigo\n\ndata: \ndata: ¿Qué tal?\n\ndata: [DONE]\n\n");
		expect(harness.provider.streamClosed).toBe(1);
	});

	it("answers with a JSON error when the stream fails before any output", async () => {
		harness.provider.enqueueStream({ chunks: [], failWith: new ContextOverflowError("Prompt does not fit the model context") });

		const response = await harness.app.inject({
			method: "POST",
			url: "/api/chat/stream",
			payload: { message: "Hello", use_rag: false }
		});

		expect(response.statusCode).toBe(413);
		expect(errorEnvelopeSchema.parse(response.json())).toMatchObject({
			error: "CONTEXT_OVERFLOW",
			message: "Prompt does not fit the model context"
		});
	});

	it("validates the request before opening the stream", async () => {
		const response = await harness.app.inject({
			method: "POST",
			url: "/api/chat/stream",
			payload: { history: [] }
		});

		expect(response.statusCode).toBe(400);
		expect(errorEnvelopeSchema.parse(response.json()).message).toBe("message: message is required");
		expect(harness.provider.calls).toHaveLength(0);
	});
});

describe("Tutor contract: explain", () => {
	let harness: ContractHarness;

	beforeEach(async () => {
		harness = await loadContractHarness();
	});

	afterEach(async () => {
		await harness.close();
	});

	it("returns the explanation from the model", async () => {
		harness.provider.enqueue("Russian has six grammatical cases.");

		const response = await harness.app.inject({
			method: "POST",
			url: "/api/chat/explain",
			payload: { topic: "Noun cases", target_language: "Russian", learner_level: "beginner", use_rag: false }
		});

		expect(response.statusCode).toBe(200);
		expect(ExplainResponseSchema.parse(response.json())).toEqual({
			explanation: "Russian has six grammatical cases.",
			context_used: null
		});
		expect(harness.provider.lastCall()?.options).toMatchObject({ temperature: 0.7, maxTokens: 1500 });
	});

	it("requires a topic", async () => {
		const response = await harness.app.inject({
			method: "POST",
			url: "/api/chat/explain",
			payload: {}
		});

		expect(response.statusCode).toBe(400);
		expect(errorEnvelopeSchema.parse(response.json()).error).toBe("VALIDATION_ERROR");
	});
});
