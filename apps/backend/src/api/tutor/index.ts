import type { FastifyInstance } from "fastify";

import type { DiagnosticsRecorder } from "../../infra/logging/index.js";
import type { LlmProvider } from "../../services/llm/provider.js";
import type { ExerciseCatalog } from "../../services/tutor/catalog.js";
import type { TutorService } from "../../services/tutor/tutor.service.js";
import { registerChatRoutes } from "./chat.routes.js";
import { registerCorrectionRoutes } from "./correction.routes.js";
import { registerExerciseRoutes } from "./exercises.routes.js";
import { registerHealthRoutes } from "./health.routes.js";

export interface TutorRoutesOptions {
  tutorService: TutorService;
  catalog: ExerciseCatalog;
  provider: LlmProvider;
  isRetrievalHealthy: () => boolean;
  diagnosticsRecorder?: DiagnosticsRecorder | null;
}

export async function registerTutorRoutes(app: FastifyInstance, options: TutorRoutesOptions): Promise<void> {
  await registerChatRoutes(app, options);
  await registerCorrectionRoutes(app, options);
  await registerExerciseRoutes(app, options);
  await registerHealthRoutes(app, options);
}
