import type { FastifyReply } from "fastify";

import { recordDiagnostics, type DiagnosticsRecorder } from "../infra/logging/index.js";
import { isAbortError } from "../services/llm/provider.js";
import { mapError } from "./errors.js";

export const SSE_DONE_FRAME = "data: [DONE]\n\n";

const SSE_HEADERS = {
  "content-type": "text/event-stream; charset=utf-8",
  "cache-control": "no-cache",
  connection: "keep-alive",
  "x-accel-buffering": "no"
} as const;

/** Every line of the chunk becomes its own `data:` field. */
export function formatSseData(chunk: string): string {
  const lines = chunk.split(/\r\n|\r|\n/u).map((line) => `data: ${line}`);
  return `${lines.join("\n")}\n\n`;
}

export function formatSseError(code: string, message: string): string {
  return `event: error\ndata: ${JSON.stringify({ error: code, message })}\n\n`;
}

/**
 * Destination of an event stream. Headers go out with the first frame, so a
 * failure before any output can still be answered with a regular status.
 */
export interface SseSink {
  readonly opened: boolean;
  write(frame: string): void;
  end(): void;
  onClose(listener: () => void): void;
}

export function createReplySink(reply: FastifyReply): SseSink {
  const raw = reply.raw;
  let opened = false;

  const open = () => {
    if (opened) {
      return;
    }
    opened = true;
    reply.hijack();
    raw.writeHead(200, SSE_HEADERS);
  };

  return {
    get opened() {
      return opened;
    },
    write(frame: string) {
      open();
      if (!raw.writableEnded && !raw.destroyed) {
        raw.write(frame);
      }
    },
    end() {
      if (!opened) {
        reply.hijack();
      }
      if (!raw.writableEnded) {
        raw.end();
      }
    },
    onClose(listener: () => void) {
      raw.once("close", listener);
    }
  };
}

export type SseOutcome = "completed" | "cancelled" | "failed";

export interface SseStreamResult {
  outcome: SseOutcome;
  chunksSent: number;
  /** Set when the stream failed before anything was written. */
  error: unknown;
}

export interface PipeToSseOptions {
  route: string;
  source: (signal: AbortSignal) => AsyncIterable<string>;
  sink: SseSink;
  controller?: AbortController;
  diagnosticsRecorder?: DiagnosticsRecorder | null;
  now?: () => number;
}

/**
 * Forwards chunks in order as SSE frames and finishes with `[DONE]`. A client
 * disconnect aborts the source; breaking out of the iteration lets the
 * provider release its request and admission slot.
 */
export async function pipeToSse(options: PipeToSseOptions): Promise<SseStreamResult> {
  const { sink, route } = options;
  const controller = options.controller ?? new AbortController();
  const now = options.now ?? Date.now;
  let finished = false;
  let chunksSent = 0;

  sink.onClose(() => {
    if (!finished) {
      controller.abort();
    }
  });

  const cancelled = async (): Promise<SseStreamResult> => {
    await recordDiagnostics(options.diagnosticsRecorder, {
      type: "stream_cancelled",
      route,
      chunksSent,
      timestamp: now()
    });
    return { outcome: "cancelled", chunksSent, error: null };
  };

  try {
    for await (const chunk of options.source(controller.signal)) {
      if (controller.signal.aborted) {
        break;
      }
      sink.write(formatSseData(chunk));
      chunksSent += 1;
    }

    if (controller.signal.aborted) {
      return await cancelled();
    }

    sink.write(SSE_DONE_FRAME);
    return { outcome: "completed", chunksSent, error: null };
  } catch (error) {
    if (controller.signal.aborted || isAbortError(error)) {
      return await cancelled();
    }

    if (!sink.opened) {
      return { outcome: "failed", chunksSent, error };
    }

    const mapped = mapError(error, now);
    sink.write(formatSseError(mapped.payload.error, mapped.payload.message));
    return { outcome: "failed", chunksSent, error: null };
  } finally {
    finished = true;
    if (sink.opened || controller.signal.aborted) {
      sink.end();
    }
  }
}
