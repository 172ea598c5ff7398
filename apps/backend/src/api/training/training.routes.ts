import {
  CreateDatasetRequestSchema,
  CreateJobRequestSchema,
  ExportFormatSchema,
  ExportRequestSchema,
  QualityRatingSchema,
  TrainingExampleInputSchema,
  TrainingExampleUpdateSchema,
  UpdateDatasetRequestSchema
} from "@polyglot-tutor/shared/training";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";

import type { TrainingDataService } from "../../services/training/training-data.service.js";
import type { TrainingJobService } from "../../services/training/training-job.service.js";
import { sendError } from "../errors.js";

const approveRequestSchema = z.object({
  approved: z.boolean().default(true)
});

const rateRequestSchema = z.object({
  rating: QualityRatingSchema
});

const queryBoolean = z.enum(["true", "false"]).transform((value) => value === "true");

// Query-string forms: ?approved=false, ?rating=4, /datasets/export?format=alpaca
const approveQuerySchema = z.object({
  approved: queryBoolean.optional()
});

const rateQuerySchema = z.object({
  rating: z.coerce.number().pipe(QualityRatingSchema).optional()
});

const exportQuerySchema = z.object({
  dataset_id: z.string().min(1).optional(),
  format: ExportFormatSchema.default("jsonl"),
  only_approved: queryBoolean.default("true")
});

type DatasetParams = { Params: { datasetId: string } };
type ExampleParams = { Params: { datasetId: string; exampleId: string } };
type JobParams = { Params: { jobId: string } };

export interface TrainingRoutesOptions {
  dataService: TrainingDataService;
  jobService: TrainingJobService;
}

function ok(reply: FastifyReply, data: unknown, status = 200): FastifyReply {
  return reply.code(status).send({ success: true, data, timestamp: Date.now() });
}

/**
 * Register training data and fine-tuning job routes (mounted under /api/training)
 */
export async function registerTrainingRoutes(
  app: FastifyInstance,
  options: TrainingRoutesOptions
): Promise<void> {
  const { dataService, jobService } = options;

  // Datasets
  app.get("/datasets", async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      return ok(reply, await dataService.listDatasets());
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.post("/datasets", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const body = CreateDatasetRequestSchema.parse(request.body);
      return ok(reply, await dataService.createDataset(body), 201);
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.get("/datasets/:datasetId", async (request: FastifyRequest<DatasetParams>, reply: FastifyReply) => {
    try {
      return ok(reply, await dataService.getDataset(request.params.datasetId));
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.patch("/datasets/:datasetId", async (request: FastifyRequest<DatasetParams>, reply: FastifyReply) => {
    try {
      const body = UpdateDatasetRequestSchema.parse(request.body);
      return ok(reply, await dataService.updateDataset(request.params.datasetId, body));
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.delete("/datasets/:datasetId", async (request: FastifyRequest<DatasetParams>, reply: FastifyReply) => {
    try {
      await dataService.deleteDataset(request.params.datasetId);
      return ok(reply, { deleted: request.params.datasetId });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  // Examples
  app.post("/datasets/:datasetId/examples", async (request: FastifyRequest<DatasetParams>, reply: FastifyReply) => {
    try {
      const body = TrainingExampleInputSchema.parse(request.body);
      return ok(reply, await dataService.addExample(request.params.datasetId, body), 201);
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.put(
    "/datasets/:datasetId/examples/:exampleId",
    async (request: FastifyRequest<ExampleParams>, reply: FastifyReply) => {
      try {
        const body = TrainingExampleUpdateSchema.parse(request.body);
        const { datasetId, exampleId } = request.params;
        return ok(reply, await dataService.updateExample(datasetId, exampleId, body));
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  app.delete(
    "/datasets/:datasetId/examples/:exampleId",
    async (request: FastifyRequest<ExampleParams>, reply: FastifyReply) => {
      try {
        const { datasetId, exampleId } = request.params;
        await dataService.deleteExample(datasetId, exampleId);
        return ok(reply, { deleted: exampleId });
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  app.post(
    "/datasets/:datasetId/examples/:exampleId/approve",
    async (request: FastifyRequest<ExampleParams>, reply: FastifyReply) => {
      try {
        const query = approveQuerySchema.parse(request.query ?? {});
        const approved = query.approved ?? approveRequestSchema.parse(request.body ?? {}).approved;
        const { datasetId, exampleId } = request.params;
        return ok(reply, await dataService.approveExample(datasetId, exampleId, approved));
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  app.post(
    "/datasets/:datasetId/examples/:exampleId/rate",
    async (request: FastifyRequest<ExampleParams>, reply: FastifyReply) => {
      try {
        const query = rateQuerySchema.parse(request.query ?? {});
        const rating = query.rating ?? rateRequestSchema.parse(request.body).rating;
        const { datasetId, exampleId } = request.params;
        return ok(reply, await dataService.rateExample(datasetId, exampleId, rating));
      } catch (error) {
        return sendError(reply, error);
      }
    }
  );

  // Export
  app.post("/export", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const body = ExportRequestSchema.parse(request.body ?? {});
      return ok(reply, await dataService.exportDataset(body));
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.post("/datasets/export", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const query = exportQuerySchema.parse(request.query ?? {});
      return ok(reply, await dataService.exportDataset(query));
    } catch (error) {
      return sendError(reply, error);
    }
  });

  // Jobs
  app.get("/jobs", async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      return ok(reply, await jobService.listJobs());
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.post("/jobs", async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const body = CreateJobRequestSchema.parse(request.body ?? {});
      return ok(reply, await jobService.createJob(body), 201);
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.get("/jobs/:jobId", async (request: FastifyRequest<JobParams>, reply: FastifyReply) => {
    try {
      return ok(reply, await jobService.getJob(request.params.jobId));
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.delete("/jobs/:jobId", async (request: FastifyRequest<JobParams>, reply: FastifyReply) => {
    try {
      await jobService.deleteJob(request.params.jobId);
      return ok(reply, { deleted: request.params.jobId });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.post("/jobs/:jobId/start", async (request: FastifyRequest<JobParams>, reply: FastifyReply) => {
    try {
      return ok(reply, await jobService.startJob(request.params.jobId), 202);
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.post("/jobs/:jobId/cancel", async (request: FastifyRequest<JobParams>, reply: FastifyReply) => {
    try {
      return ok(reply, await jobService.cancelJob(request.params.jobId));
    } catch (error) {
      return sendError(reply, error);
    }
  });

  // Models
  app.get("/models", async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      return ok(reply, await jobService.listTrainedModels());
    } catch (error) {
      return sendError(reply, error);
    }
  });

  app.get("/base-models", async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      return ok(reply, await jobService.listBaseModels());
    } catch (error) {
      return sendError(reply, error);
    }
  });
}
