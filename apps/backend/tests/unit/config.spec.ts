import path from "node:path";
import { describe, expect, it } from "vitest";

import { loadTutorConfig, resolveAssetsDir } from "../../src/config/tutor.js";

describe("loadTutorConfig", () => {
	it("falls back to defaults for an empty environment", () => {
		const config = loadTutorConfig({});

		expect(config.host).toBe("127.0.0.1");
		expect(config.port).toBe(8000);
		expect(config.llmProvider).toBe("groq");
		expect(config.groq).toEqual({
			apiKey: "",
			model: "llama-3.3-70b-versatile",
			baseUrl: "https://api.groq.com/openai/v1"
		});
		expect(config.local.maxConcurrency).toBe(1);
		expect(config.local.maxQueue).toBe(4);
		expect(config.local.modelPath).toBe("./models/model.gguf");
		expect(config.maxRetries).toBe(3);
		expect(config.contextLength).toBe(8192);
		expect(config.embeddingUrl).toBeNull();
		expect(config.logDir).toBeNull();
		expect(config.trainingCommand).toBeNull();
		expect(config.autoCollectTraining).toBe(false);
	});

	it("reads provider selection and numeric overrides", () => {
		const config = loadTutorConfig({
			LLM_PROVIDER: " LOCAL ",
			PORT: "9100",
			CONTEXT_LENGTH: "4096",
			LOCAL_MAX_QUEUE: "0",
			LLM_MAX_RETRIES: "0",
			TRAINING_AUTO_COLLECT: "yes",
			GROQ_API_KEY: "  test-secret  "
		});

		expect(config.llmProvider).toBe("local");
		expect(config.port).toBe(9100);
		expect(config.contextLength).toBe(4096);
		expect(config.local.maxQueue).toBe(0);
		expect(config.maxRetries).toBe(0);
		expect(config.autoCollectTraining).toBe(true);
		expect(config.groq.apiKey).toBe("test-secret");
	});

	it("ignores malformed numbers and unknown providers", () => {
		const config = loadTutorConfig({
			LLM_PROVIDER: "openai",
			PORT: "not-a-port",
			LLM_TIMEOUT_MS: "-5",
			TRAINING_AUTO_COLLECT: "maybe"
		});

		expect(config.llmProvider).toBe("groq");
		expect(config.port).toBe(8000);
		expect(config.requestTimeoutMs).toBe(60_000);
		expect(config.autoCollectTraining).toBe(false);
	});
});

describe("resolveAssetsDir", () => {
	it("prefers ASSETS_DIR when set", () => {
		expect(resolveAssetsDir({ ASSETS_DIR: "/srv/tutor-assets" })).toBe(path.resolve("/srv/tutor-assets"));
	});

	it("finds the bundled data directory", () => {
		expect(path.basename(resolveAssetsDir({}))).toBe("data");
	});
});
