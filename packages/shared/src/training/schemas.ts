import { z } from 'zod';

const isoTimestamp = (field: string) =>
  z.string({ required_error: `${field} is required` }).datetime({ message: `${field} must be an ISO-8601 timestamp` });

export const QualityRatingSchema = z
  .number()
  .int('quality_rating must be an integer')
  .min(1, 'quality_rating must be between 1 and 5')
  .max(5, 'quality_rating must be between 1 and 5');

export const TrainingExampleSchema = z.object({
  id: z.string().min(1),
  created_at: isoTimestamp('created_at'),
  system_prompt: z.string().default(''),
  user_input: z.string(),
  assistant_output: z.string(),
  category: z.string().default('general'),
  language: z.string().default('English'),
  quality_rating: QualityRatingSchema.nullable().default(null),
  is_approved: z.boolean().default(false),
});
export type TrainingExample = z.infer<typeof TrainingExampleSchema>;

export const TrainingDatasetSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().trim().min(1, 'name must not be empty').max(200),
    description: z.string().max(2_000).default(''),
    created_at: isoTimestamp('created_at'),
    updated_at: isoTimestamp('updated_at'),
    examples: z.array(TrainingExampleSchema).default([]),
  })
  .superRefine((data, ctx) => {
    const seen = new Set<string>();
    data.examples.forEach((example, index) => {
      if (seen.has(example.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate example id ${example.id}`,
          path: ['examples', index, 'id'],
        });
      }
      seen.add(example.id);
    });
  });
export type TrainingDataset = z.infer<typeof TrainingDatasetSchema>;

export type TrainingDatasetSummary = Omit<TrainingDataset, 'examples'> & {
  example_count: number;
  approved_count: number;
};

export const CreateDatasetRequestSchema = z.object({
  name: z.string({ required_error: 'name is required' }).trim().min(1, 'name must not be empty').max(200),
  description: z.string().max(2_000).default(''),
});
export type CreateDatasetRequest = z.infer<typeof CreateDatasetRequestSchema>;

export const UpdateDatasetRequestSchema = z
  .object({
    name: z.string().trim().min(1, 'name must not be empty').max(200).optional(),
    description: z.string().max(2_000).optional(),
  })
  .refine((data) => data.name !== undefined || data.description !== undefined, {
    message: 'at least one of name or description is required',
  });
export type UpdateDatasetRequest = z.infer<typeof UpdateDatasetRequestSchema>;

export const TrainingExampleInputSchema = z.object({
  system_prompt: z.string().max(8_000).default(''),
  user_input: z.string({ required_error: 'user_input is required' }).trim().min(1, 'user_input must not be empty').max(16_000),
  assistant_output: z
    .string({ required_error: 'assistant_output is required' })
    .trim()
    .min(1, 'assistant_output must not be empty')
    .max(16_000),
  category: z.string().trim().min(1).max(100).default('general'),
  language: z.string().trim().min(1).max(100).default('English'),
  is_approved: z.boolean().default(false),
});
export type TrainingExampleInput = z.infer<typeof TrainingExampleInputSchema>;

export const TrainingExampleUpdateSchema = z.object({
  system_prompt: z.string().max(8_000).optional(),
  user_input: z.string().trim().min(1).max(16_000).optional(),
  assistant_output: z.string().trim().min(1).max(16_000).optional(),
  category: z.string().trim().min(1).max(100).optional(),
  language: z.string().trim().min(1).max(100).optional(),
  quality_rating: QualityRatingSchema.nullable().optional(),
  is_approved: z.boolean().optional(),
});
export type TrainingExampleUpdate = z.infer<typeof TrainingExampleUpdateSchema>;

export const ExportFormatSchema = z.enum(['jsonl', 'alpaca', 'sharegpt']);
export type ExportFormat = z.infer<typeof ExportFormatSchema>;

export const ExportRequestSchema = z.object({
  dataset_id: z.string().min(1).optional(),
  format: ExportFormatSchema.default('jsonl'),
  only_approved: z.boolean().default(true),
});
export type ExportRequest = z.infer<typeof ExportRequestSchema>;

export const ExportResultSchema = z.object({
  file_path: z.string(),
  count: z.number().int().positive(),
  format: ExportFormatSchema,
});
export type ExportResult = z.infer<typeof ExportResultSchema>;

export const TrainingConfigSchema = z.object({
  base_model: z.string().trim().min(1).default('unsloth/Llama-3.2-1B-Instruct'),
  lora_r: z.number().int().positive().default(16),
  lora_alpha: z.number().int().positive().default(32),
  lora_dropout: z.number().min(0).max(1).default(0.05),
  epochs: z.number().int().positive().default(3),
  batch_size: z.number().int().positive().default(2),
  gradient_accumulation_steps: z.number().int().positive().default(4),
  learning_rate: z.number().positive().default(2e-4),
  warmup_steps: z.number().int().nonnegative().default(10),
  max_seq_length: z.number().int().positive().default(2048),
  output_name: z
    .string()
    .trim()
    .regex(/^[\w.-]+$/u, 'output_name may only contain letters, digits, dots, dashes and underscores')
    .default('language-tutor-lora'),
});
export type TrainingConfig = z.infer<typeof TrainingConfigSchema>;
export type TrainingConfigInput = z.input<typeof TrainingConfigSchema>;

export const TrainingJobStatusSchema = z.enum(['pending', 'preparing', 'training', 'completed', 'failed', 'cancelled']);
export type TrainingJobStatus = z.infer<typeof TrainingJobStatusSchema>;

export const ACTIVE_JOB_STATUSES: readonly TrainingJobStatus[] = ['preparing', 'training'];

export const TrainingJobSchema = z
  .object({
    id: z.string().min(1),
    dataset_id: z.string().nullable().default(null),
    status: TrainingJobStatusSchema,
    progress: z.number().min(0).max(100),
    current_step: z.number().int().nonnegative(),
    total_steps: z.number().int().nonnegative(),
    created_at: isoTimestamp('created_at'),
    started_at: isoTimestamp('started_at').nullable(),
    completed_at: isoTimestamp('completed_at').nullable(),
    config: TrainingConfigSchema,
    output_path: z.string().nullable(),
    error_message: z.string().nullable(),
    metrics: z.record(z.number()),
  })
  .superRefine((data, ctx) => {
    if (data.total_steps > 0 && data.current_step > data.total_steps) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'current_step must not exceed total_steps',
        path: ['current_step'],
      });
    }
  });
export type TrainingJob = z.infer<typeof TrainingJobSchema>;

export const CreateJobRequestSchema = z.object({
  dataset_id: z.string().min(1).optional(),
  config: TrainingConfigSchema.partial().default({}),
});
export type CreateJobRequest = z.infer<typeof CreateJobRequestSchema>;

export const BaseModelSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  size: z.string(),
  vram_required: z.string(),
});
export type BaseModel = z.infer<typeof BaseModelSchema>;

export const TrainedModelSchema = z.object({
  name: z.string(),
  path: z.string(),
  type: z.enum(['lora', 'gguf']),
  size_mb: z.number().nonnegative().optional(),
  created_at: isoTimestamp('created_at'),
});
export type TrainedModel = z.infer<typeof TrainedModelSchema>;
