import { ChatRequestSchema, ExplainRequestSchema } from "@polyglot-tutor/shared/tutor";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

import type { DiagnosticsRecorder } from "../../infra/logging/index.js";
import type { TutorService } from "../../services/tutor/tutor.service.js";
import { sendError } from "../errors.js";
import { createReplySink, pipeToSse } from "../sse.js";

export interface ChatRoutesOptions {
  tutorService: TutorService;
  diagnosticsRecorder?: DiagnosticsRecorder | null;
}

export async function registerChatRoutes(app: FastifyInstance, options: ChatRoutesOptions): Promise<void> {
  const { tutorService } = options;

  // POST /api/chat
  app.post("/chat", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const body = ChatRequestSchema.parse(request.body);
      const result = await tutorService.chat(body);
      return reply.code(200).send(result);
    } catch (error) {
      return sendError(reply, error);
    }
  });

  // POST /api/chat/stream - Server-Sent Events, one frame per chunk
  app.post("/chat/stream", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = ChatRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendError(reply, parsed.error);
    }
    const body = parsed.data;

    const result = await pipeToSse({
      route: "/api/chat/stream",
      source: (signal) => tutorService.chatStream(body, signal),
      sink: createReplySink(reply),
      diagnosticsRecorder: options.diagnosticsRecorder ?? null
    });

    if (result.outcome === "failed" && result.error !== null) {
      return sendError(reply, result.error);
    }
    return reply;
  });

  // POST /api/chat/explain
  app.post("/chat/explain", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const body = ExplainRequestSchema.parse(request.body);
      const result = await tutorService.explainGrammar(body);
      return reply.code(200).send(result);
    } catch (error) {
      return sendError(reply, error);
    }
  });
}
