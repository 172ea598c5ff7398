import {
  ExerciseCheckRequestSchema,
  ExerciseRequestSchema,
  TargetLanguageSchema
} from "@polyglot-tutor/shared/tutor";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";

import type { ExerciseCatalog } from "../../services/tutor/catalog.js";
import type { TutorService } from "../../services/tutor/tutor.service.js";
import { sendError } from "../errors.js";

const languageQuerySchema = z.object({
  target_language: TargetLanguageSchema.default("English")
});

export interface ExerciseRoutesOptions {
  tutorService: TutorService;
  catalog: ExerciseCatalog;
}

export async function registerExerciseRoutes(
  app: FastifyInstance,
  options: ExerciseRoutesOptions
): Promise<void> {
  const { tutorService, catalog } = options;

  // POST /api/exercises/generate
  app.post("/exercises/generate", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const body = ExerciseRequestSchema.parse(request.body);
      const exercises = await tutorService.generateExercises(body);
      return reply.code(200).send(exercises);
    } catch (error) {
      return sendError(reply, error);
    }
  });

  // POST /api/exercises/check?target_language=
  app.post("/exercises/check", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const { target_language } = languageQuerySchema.parse(request.query);
      const body = ExerciseCheckRequestSchema.parse(request.body);
      const result = await tutorService.checkAnswer(body, target_language);
      return reply.code(200).send(result);
    } catch (error) {
      return sendError(reply, error);
    }
  });

  // GET /api/exercises/topics?target_language=
  app.get("/exercises/topics", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const { target_language } = languageQuerySchema.parse(request.query);
      return reply.code(200).send({ language: target_language, topics: catalog.topics(target_language) });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  // GET /api/exercises/types
  app.get("/exercises/types", async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({ types: catalog.exerciseTypes() });
  });

  // GET /api/exercises/levels
  app.get("/exercises/levels", async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send({ levels: catalog.levels() });
  });
}
