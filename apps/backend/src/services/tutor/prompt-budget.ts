import type { ConversationTurn } from "@polyglot-tutor/shared/tutor";

import { estimateMessagesTokens, estimateTokens, type LlmMessage } from "../llm/provider.js";

const MESSAGE_OVERHEAD_TOKENS = 4;
// Reserve for the assistant header the provider appends.
const PROMPT_RESERVE_TOKENS = 16;

export interface PromptAssemblyInput {
	systemPrompt: string;
	contextBlock: string | null;
	history: readonly ConversationTurn[];
	message: string;
	contextLength: number;
	maxTokens: number;
	/** Upper bound on history turns kept, applied before the token budget. */
	maxHistoryTurns?: number;
}

export interface AssembledPrompt {
	messages: LlmMessage[];
	includedTurns: number;
	droppedTurns: number;
	estimatedTokens: number;
}

/**
 * Builds the message list in a fixed order: system prompt, retrieved context,
 * history, then the live message. History is dropped oldest-first until the
 * estimate fits inside `contextLength - maxTokens`.
 */
export function assemblePrompt(input: PromptAssemblyInput): AssembledPrompt {
	const head: LlmMessage[] = [{ role: "system", content: input.systemPrompt }];
	if (input.contextBlock) {
		head.push({ role: "system", content: input.contextBlock });
	}
	const tail: LlmMessage = { role: "user", content: input.message };

	const fixedTokens = estimateMessagesTokens([...head, tail]) + PROMPT_RESERVE_TOKENS;
	let remaining = input.contextLength - input.maxTokens - fixedTokens;

	const turnLimit = Math.max(0, input.maxHistoryTurns ?? input.history.length);
	const candidates = turnLimit === 0 ? [] : input.history.slice(-turnLimit);
	const kept: LlmMessage[] = [];

	for (let index = candidates.length - 1; index >= 0; index -= 1) {
		const turn = candidates[index];
		if (!turn) {
			continue;
		}
		const cost = estimateTokens(turn.content) + MESSAGE_OVERHEAD_TOKENS;
		if (cost > remaining) {
			break;
		}
		remaining -= cost;
		kept.unshift({ role: turn.role, content: turn.content });
	}

	const messages = [...head, ...kept, tail];
	return {
		messages,
		includedTurns: kept.length,
		droppedTurns: input.history.length - kept.length,
		estimatedTokens: estimateMessagesTokens(messages)
	};
}
