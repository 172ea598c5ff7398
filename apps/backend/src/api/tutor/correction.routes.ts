import { CorrectionRequestSchema } from "@polyglot-tutor/shared/tutor";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";

import type { TutorService } from "../../services/tutor/tutor.service.js";
import { sendError } from "../errors.js";

export interface CorrectionRoutesOptions {
  tutorService: TutorService;
}

export async function registerCorrectionRoutes(
  app: FastifyInstance,
  options: CorrectionRoutesOptions
): Promise<void> {
  // POST /api/correct
  app.post("/correct", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const body = CorrectionRequestSchema.parse(request.body);
      const result = await options.tutorService.correct(body.text, body.target_language);
      return reply.code(200).send(result);
    } catch (error) {
      return sendError(reply, error);
    }
  });
}
