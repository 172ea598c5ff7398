import { z } from "zod";

import { createTutorTestHarness, type TutorTestHarness } from "../../src/api/app.js";
import type { FineTuneRunner } from "../../src/services/training/fine-tune-runner.js";
import { FakeLlmProvider } from "../helpers/fake-provider.js";

export function successEnvelope<T extends z.ZodTypeAny>(data: T) {
	return z.object({
		success: z.literal(true),
		data,
		timestamp: z.number().int().nonnegative()
	});
}

export const errorEnvelopeSchema = z.object({
	success: z.literal(false),
	error: z.string().min(1),
	message: z.string().min(1),
	timestamp: z.number().int().nonnegative()
});

export interface ContractHarness extends TutorTestHarness {
	provider: FakeLlmProvider;
}

/** Completes every fine-tune immediately, writing nothing. */
export const instantRunner: FineTuneRunner = {
	run: async (request) => {
		request.onProgress({ step: 1, totalSteps: 1, metrics: { loss: 0.5 } });
		return { outputPath: request.outputDir };
	}
};

export async function loadContractHarness(
	options: { provider?: FakeLlmProvider; runner?: FineTuneRunner; env?: NodeJS.ProcessEnv } = {}
): Promise<ContractHarness> {
	const provider = options.provider ?? new FakeLlmProvider();
	const harness = await createTutorTestHarness({
		provider,
		runner: options.runner ?? instantRunner,
		env: options.env
	});
	return { ...harness, provider };
}
