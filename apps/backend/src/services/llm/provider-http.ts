import type { ReadableStream } from "node:stream/web";

import { GenerationAbortedError } from "./provider.js";

export interface LinkedAbort {
	signal: AbortSignal;
	timedOut(): boolean;
	clearTimer(): void;
	dispose(): void;
}

/**
 * Combines a per-request timeout with the caller's cancellation signal.
 */
export function createLinkedAbort(timeoutMs: number, parent?: AbortSignal): LinkedAbort {
	const controller = new AbortController();
	let didTimeout = false;

	const timeoutId = setTimeout(() => {
		didTimeout = true;
		controller.abort();
	}, timeoutMs);

	const onParentAbort = () => controller.abort();
	if (parent?.aborted) {
		controller.abort();
	} else {
		parent?.addEventListener("abort", onParentAbort, { once: true });
	}

	return {
		signal: controller.signal,
		timedOut: () => didTimeout,
		clearTimer: () => clearTimeout(timeoutId),
		dispose: () => {
			clearTimeout(timeoutId);
			parent?.removeEventListener("abort", onParentAbort);
		}
	};
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new GenerationAbortedError());
			return;
		}

		const onAbort = () => {
			clearTimeout(timeoutId);
			reject(new GenerationAbortedError());
		};
		const timeoutId = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Yields the payload of every `data:` line of a server-sent event body, in
 * order, until the body ends. The reader is cancelled when the consumer stops.
 */
export async function* readServerSentData(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
	const reader = body.getReader();
	const decoder = new TextDecoder();
	let buffer = "";

	try {
		while (true) {
			const { done, value } = await reader.read();
			if (done) {
				break;
			}

			buffer += decoder.decode(value, { stream: true });
			const lines = buffer.split("\n");
			buffer = lines.pop() ?? "";

			for (const line of lines) {
				const data = parseDataLine(line);
				if (data !== null) {
					yield data;
				}
			}
		}

		const trailing = parseDataLine(buffer + decoder.decode());
		if (trailing !== null) {
			yield trailing;
		}
	} finally {
		await reader.cancel().catch(() => undefined);
		reader.releaseLock();
	}
}

function parseDataLine(line: string): string | null {
	const trimmed = line.replace(/\r$/u, "");
	if (!trimmed.startsWith("data:")) {
		return null;
	}
	return trimmed.slice(5).replace(/^ /u, "");
}

export function trimTrailingSlash(value: string): string {
	return value.replace(/\/+$/u, "");
}

export function parseRetryAfter(header: string | null): number | null {
	if (!header) {
		return null;
	}

	const seconds = Number(header);
	if (Number.isFinite(seconds) && seconds >= 0) {
		return seconds * 1000;
	}

	const date = Date.parse(header);
	return Number.isNaN(date) ? null : Math.max(0, date - Date.now());
}

export function extractErrorObject(rawBody: string): { code?: unknown; type?: unknown; message?: unknown } {
	const parsed = safeJsonParse(rawBody);
	if (!isRecord(parsed)) {
		return {};
	}

	if (isRecord(parsed.error)) {
		return {
			code: parsed.error.code,
			type: parsed.error.type,
			message: parsed.error.message
		};
	}

	if (typeof parsed.error === "string") {
		return { message: parsed.error };
	}

	return {
		code: parsed.code,
		type: parsed.type,
		message: parsed.message
	};
}

export function deriveNetworkError(error: unknown): { code: string; message: string } {
	if (isRecord(error) && typeof error.code === "string" && error.code.trim().length > 0) {
		const detailsMessage = typeof error.message === "string" ? error.message : null;
		return {
			code: error.code,
			message: detailsMessage && detailsMessage.trim().length > 0 ? detailsMessage : error.code
		};
	}

	if (error instanceof Error && isRecord(error.cause)) {
		const cause = error.cause;
		const causeCode = typeof cause.code === "string" ? cause.code : null;
		if (causeCode && causeCode.trim().length > 0) {
			const causeMessage = typeof cause.message === "string" ? cause.message : null;
			return {
				code: causeCode,
				message: causeMessage && causeMessage.trim().length > 0 ? causeMessage : error.message
			};
		}
	}

	if (error instanceof Error) {
		return { code: "NETWORK_ERROR", message: error.message };
	}

	return { code: "NETWORK_ERROR", message: "Network request failed" };
}

export function describeNetworkError(code: string, url: URL): string | null {
	switch (code) {
		case "ECONNREFUSED":
			return `Unable to connect to ${url.origin}. Is the server running?`;
		case "ENOTFOUND":
			return `Could not resolve hostname ${url.hostname}. Check the URL.`;
		case "ECONNRESET":
			return "Connection reset by server. Check server logs.";
		default:
			return null;
	}
}

export function extractMessageContent(value: unknown): string | null {
	if (typeof value === "string") {
		return value;
	}

	if (Array.isArray(value)) {
		const parts = value.map(extractMessageContent).filter((part): part is string => part !== null);
		return parts.length > 0 ? parts.join("") : null;
	}

	if (isRecord(value) && typeof value.text === "string") {
		return value.text;
	}

	return null;
}

export function safeJsonParse(value: string): unknown {
	try {
		return JSON.parse(value) as unknown;
	} catch {
		return null;
	}
}

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null;
}
