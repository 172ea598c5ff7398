import { z } from 'zod';

export const SUPPORTED_LANGUAGES = ['English', 'Chinese', 'Russian', 'Japanese'] as const;

export const TargetLanguageSchema = z.enum(SUPPORTED_LANGUAGES, {
  errorMap: () => ({ message: `target_language must be one of ${SUPPORTED_LANGUAGES.join(', ')}` }),
});
export type TargetLanguage = z.infer<typeof TargetLanguageSchema>;

export const LearnerLevelSchema = z.enum(['beginner', 'intermediate', 'advanced']);
export type LearnerLevel = z.infer<typeof LearnerLevelSchema>;

export const ConversationRoleSchema = z.enum(['user', 'assistant']);
export type ConversationRole = z.infer<typeof ConversationRoleSchema>;

const MAX_MESSAGE_LENGTH = 8_000;
const MAX_HISTORY_TURNS = 200;

const requiredText = (field: string, max: number) =>
  z
    .string({ required_error: `${field} is required` })
    .trim()
    .min(1, `${field} must not be empty`)
    .max(max, `${field} must be at most ${max} characters`);

export const ConversationTurnSchema = z.object({
  role: ConversationRoleSchema,
  content: z.string().max(MAX_MESSAGE_LENGTH, `content must be at most ${MAX_MESSAGE_LENGTH} characters`),
});
export type ConversationTurn = z.infer<typeof ConversationTurnSchema>;

export const ChatRequestSchema = z.object({
  message: requiredText('message', MAX_MESSAGE_LENGTH),
  history: z.array(ConversationTurnSchema).max(MAX_HISTORY_TURNS).default([]),
  target_language: TargetLanguageSchema.default('English'),
  learner_level: LearnerLevelSchema.default('intermediate'),
  use_rag: z.boolean().default(true),
});
export type ChatRequest = z.infer<typeof ChatRequestSchema>;
export type ChatRequestInput = z.input<typeof ChatRequestSchema>;

export const ChatResponseSchema = z.object({
  response: z.string(),
  context_used: z.array(z.string()).nullable(),
});
export type ChatResponse = z.infer<typeof ChatResponseSchema>;

export const ExplainRequestSchema = z.object({
  topic: requiredText('topic', 500),
  target_language: TargetLanguageSchema.default('English'),
  learner_level: LearnerLevelSchema.default('intermediate'),
  use_rag: z.boolean().default(true),
});
export type ExplainRequest = z.infer<typeof ExplainRequestSchema>;

export const ExplainResponseSchema = z.object({
  explanation: z.string(),
  context_used: z.array(z.string()).nullable(),
});
export type ExplainResponse = z.infer<typeof ExplainResponseSchema>;

export const CorrectionErrorTypeSchema = z.enum(['grammar', 'spelling', 'punctuation', 'word_choice', 'style']);
export type CorrectionErrorType = z.infer<typeof CorrectionErrorTypeSchema>;

export const CorrectionRequestSchema = z.object({
  text: z.string({ required_error: 'text is required' }).max(MAX_MESSAGE_LENGTH),
  target_language: TargetLanguageSchema.default('English'),
});
export type CorrectionRequest = z.infer<typeof CorrectionRequestSchema>;

export const CorrectionErrorSchema = z.object({
  original: z.string(),
  corrected: z.string(),
  error_type: CorrectionErrorTypeSchema,
  explanation: z.string(),
  position: z.number().int().nonnegative().nullable().optional(),
});
export type CorrectionError = z.infer<typeof CorrectionErrorSchema>;

export const CorrectionResultSchema = z
  .object({
    original_text: z.string(),
    corrected_text: z.string(),
    errors: z.array(CorrectionErrorSchema),
    has_errors: z.boolean(),
  })
  .superRefine((data, ctx) => {
    if (!data.has_errors && data.errors.length > 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'has_errors must be true when errors are listed',
        path: ['has_errors'],
      });
    }
  });
export type CorrectionResult = z.infer<typeof CorrectionResultSchema>;

export const ExerciseTypeSchema = z.enum(['multiple_choice', 'fill_in_blank', 'translation']);
export type ExerciseType = z.infer<typeof ExerciseTypeSchema>;

export const ExerciseSchema = z
  .object({
    id: z.string().min(1),
    type: ExerciseTypeSchema,
    question: z.string().trim().min(1, 'question must not be empty'),
    options: z.array(z.string()).nullable().optional(),
    correct_answer: z.string().trim().min(1, 'correct_answer must not be empty'),
    hint: z.string().nullable().optional(),
    explanation: z.string(),
  })
  .superRefine((data, ctx) => {
    if (data.type !== 'multiple_choice') {
      return;
    }

    if (!data.options || data.options.length < 2) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'multiple_choice exercises need at least two options',
        path: ['options'],
      });
      return;
    }

    if (!data.options.includes(data.correct_answer)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'correct_answer must be one of the options',
        path: ['correct_answer'],
      });
    }
  });
export type Exercise = z.infer<typeof ExerciseSchema>;

export const ExerciseRequestSchema = z.object({
  topic: requiredText('topic', 200),
  target_language: TargetLanguageSchema.default('English'),
  exercise_type: ExerciseTypeSchema.default('multiple_choice'),
  learner_level: LearnerLevelSchema.default('intermediate'),
  count: z.number().int().min(1, 'count must be at least 1').max(10, 'count must be at most 10').default(5),
});
export type ExerciseRequest = z.infer<typeof ExerciseRequestSchema>;

export const ExerciseCheckRequestSchema = z.object({
  exercise_id: z.string().min(1),
  user_answer: z.string({ required_error: 'user_answer is required' }).max(2_000),
  correct_answer: z.string({ required_error: 'correct_answer is required' }).max(2_000),
  explanation: z.string().optional(),
});
export type ExerciseCheckRequest = z.infer<typeof ExerciseCheckRequestSchema>;

export const ExerciseCheckResponseSchema = z.object({
  is_correct: z.boolean(),
  correct_answer: z.string(),
  explanation: z.string(),
  feedback: z.string(),
});
export type ExerciseCheckResponse = z.infer<typeof ExerciseCheckResponseSchema>;

export const ExerciseTypeInfoSchema = z.object({
  value: ExerciseTypeSchema,
  label: z.string(),
});
export type ExerciseTypeInfo = z.infer<typeof ExerciseTypeInfoSchema>;

export const LearnerLevelInfoSchema = z.object({
  value: LearnerLevelSchema,
  label: z.string(),
});
export type LearnerLevelInfo = z.infer<typeof LearnerLevelInfoSchema>;

export const LlmProviderNameSchema = z.enum(['groq', 'local']);
export type LlmProviderName = z.infer<typeof LlmProviderNameSchema>;

export const ComponentStatusSchema = z.enum(['ok', 'error']);
export type ComponentStatus = z.infer<typeof ComponentStatusSchema>;

export const HealthResponseSchema = z.object({
  status: z.literal('ok'),
  llm_provider: LlmProviderNameSchema,
  llm_status: ComponentStatusSchema,
  rag_status: ComponentStatusSchema,
});
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
