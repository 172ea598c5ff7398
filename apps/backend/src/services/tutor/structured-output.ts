import {
	CorrectionErrorTypeSchema,
	ExerciseSchema,
	type CorrectionError,
	type CorrectionErrorType,
	type Exercise,
	type ExerciseType
} from "@polyglot-tutor/shared/tutor";
import { z } from "zod";

export class MalformedModelOutputError extends Error {
	readonly code = "MALFORMED_MODEL_OUTPUT" as const;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "MalformedModelOutputError";
	}
}

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/iu;

/**
 * Pulls the first JSON object out of free-form model text, tolerating code
 * fences and surrounding prose.
 */
export function extractJsonObject(text: string): unknown {
	const fenced = FENCE_PATTERN.exec(text);
	const candidate = (fenced?.[1] ?? text).trim();

	const direct = tryParse(candidate);
	if (direct !== undefined) {
		return direct;
	}

	const start = candidate.indexOf("{");
	const end = candidate.lastIndexOf("}");
	if (start !== -1 && end > start) {
		const sliced = tryParse(candidate.slice(start, end + 1));
		if (sliced !== undefined) {
			return sliced;
		}
	}

	throw new MalformedModelOutputError("Model response did not contain a JSON object");
}

function tryParse(text: string): unknown {
	try {
		const parsed: unknown = JSON.parse(text);
		return typeof parsed === "object" && parsed !== null ? parsed : undefined;
	} catch {
		return undefined;
	}
}

function normalizeErrorType(value: string): CorrectionErrorType {
	const normalized = value.trim().toLowerCase().replace(/[\s-]+/gu, "_");
	const parsed = CorrectionErrorTypeSchema.safeParse(normalized);
	return parsed.success ? parsed.data : "grammar";
}

const ModelCorrectionSchema = z.object({
	corrected_text: z.string(),
	errors: z
		.array(
			z.object({
				original: z.string().default(""),
				corrected: z.string().default(""),
				error_type: z.string().default("grammar").transform(normalizeErrorType),
				explanation: z.string().default(""),
				position: z.number().int().nonnegative().nullable().optional()
			})
		)
		.default([])
});

export interface ParsedCorrection {
	correctedText: string;
	errors: CorrectionError[];
}

export function parseCorrectionOutput(text: string): ParsedCorrection {
	const result = ModelCorrectionSchema.safeParse(extractJsonObject(text));
	if (!result.success) {
		throw new MalformedModelOutputError(
			`Correction response has an unexpected shape: ${result.error.issues[0]?.message ?? "invalid"}`,
			{ cause: result.error }
		);
	}

	return {
		correctedText: result.data.corrected_text,
		errors: result.data.errors.map((error) => ({
			original: error.original,
			corrected: error.corrected,
			error_type: error.error_type,
			explanation: error.explanation,
			position: error.position ?? null
		}))
	};
}

const ModelExerciseBatchSchema = z.object({
	exercises: z.array(z.unknown())
});

const ModelExerciseItemSchema = z.object({
	question: z.string(),
	options: z.array(z.union([z.string(), z.number()]).transform(String)).nullable().optional(),
	correct_answer: z.union([z.string(), z.number()]).transform(String),
	hint: z.string().nullable().optional(),
	explanation: z.string().default("")
});

export interface ExerciseBatchResult {
	exercises: Exercise[];
	received: number;
	rejections: string[];
}

export function normalizeAnswer(value: string): string {
	return value.normalize("NFKC").trim().replace(/\s+/gu, " ").toLowerCase();
}

/**
 * Validates each generated item independently; malformed items are dropped
 * and described in `rejections`. Throws only when the batch itself cannot be
 * read.
 */
export function parseExerciseOutput(
	text: string,
	type: ExerciseType,
	createId: () => string
): ExerciseBatchResult {
	const batch = ModelExerciseBatchSchema.safeParse(extractJsonObject(text));
	if (!batch.success) {
		throw new MalformedModelOutputError('Exercise response is missing an "exercises" array', { cause: batch.error });
	}

	const exercises: Exercise[] = [];
	const rejections: string[] = [];

	batch.data.exercises.forEach((raw, index) => {
		const item = ModelExerciseItemSchema.safeParse(raw);
		if (!item.success) {
			rejections.push(`item ${index}: ${item.error.issues[0]?.message ?? "invalid shape"}`);
			return;
		}

		const candidate = toExercise(item.data, type, createId());
		if (typeof candidate === "string") {
			rejections.push(`item ${index}: ${candidate}`);
			return;
		}

		exercises.push(candidate);
	});

	return { exercises, received: batch.data.exercises.length, rejections };
}

function toExercise(
	item: z.infer<typeof ModelExerciseItemSchema>,
	type: ExerciseType,
	id: string
): Exercise | string {
	const question = item.question.trim();
	let correctAnswer = item.correct_answer.trim();
	let options: string[] | null = null;

	if (type === "multiple_choice") {
		const cleaned = (item.options ?? []).map((option) => option.trim()).filter((option) => option.length > 0);
		const distinct = cleaned.filter(
			(option, index) => cleaned.findIndex((other) => normalizeAnswer(other) === normalizeAnswer(option)) === index
		);
		if (distinct.length < 2) {
			return "multiple choice needs at least two distinct options";
		}

		const match = distinct.find((option) => normalizeAnswer(option) === normalizeAnswer(correctAnswer));
		if (!match) {
			return "correct_answer is not one of the options";
		}
		correctAnswer = match;
		options = distinct;
	}

	if (type === "fill_in_blank" && !question.includes("___")) {
		return "fill-in-the-blank question has no ___ gap";
	}

	const parsed = ExerciseSchema.safeParse({
		id,
		type,
		question,
		options,
		correct_answer: correctAnswer,
		hint: item.hint?.trim() || null,
		explanation: item.explanation.trim()
	});

	return parsed.success ? parsed.data : parsed.error.issues[0]?.message ?? "invalid exercise";
}
