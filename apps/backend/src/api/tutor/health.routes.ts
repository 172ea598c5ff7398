import type { HealthResponse } from "@polyglot-tutor/shared/tutor";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

import type { LlmProvider } from "../../services/llm/provider.js";

export interface HealthRoutesOptions {
  provider: LlmProvider;
  isRetrievalHealthy: () => boolean;
}

export async function registerHealthRoutes(app: FastifyInstance, options: HealthRoutesOptions): Promise<void> {
  // GET /api/health - always 200; component failures are reported in the body
  app.get("/health", async (_request: FastifyRequest, reply: FastifyReply) => {
    let llmHealthy = false;
    try {
      llmHealthy = await options.provider.healthCheck();
    } catch (error) {
      reply.log.warn({ err: error }, "LLM health check failed");
    }

    const body: HealthResponse = {
      status: "ok",
      llm_provider: options.provider.name,
      llm_status: llmHealthy ? "ok" : "error",
      rag_status: options.isRetrievalHealthy() ? "ok" : "error"
    };
    return reply.code(200).send(body);
  });
}
