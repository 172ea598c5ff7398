import {
	ExerciseTypeSchema,
	LearnerLevelSchema,
	SUPPORTED_LANGUAGES,
	type ExerciseTypeInfo,
	type LearnerLevelInfo
} from "@polyglot-tutor/shared/tutor";
import { readFile } from "node:fs/promises";
import { z } from "zod";

const TopicFileSchema = z.record(z.string(), z.array(z.string().trim().min(1)));

function titleCase(value: string): string {
	return value
		.split("_")
		.map((word) => `${word.charAt(0).toUpperCase()}${word.slice(1)}`)
		.join(" ");
}

export class ExerciseCatalog {
	constructor(private readonly topicsByLanguage: Readonly<Record<string, readonly string[]>>) {}

	static async fromFile(filePath: string): Promise<ExerciseCatalog> {
		const raw: unknown = JSON.parse(await readFile(filePath, "utf-8"));
		const topics = TopicFileSchema.parse(raw);

		const missing = SUPPORTED_LANGUAGES.filter((language) => !topics[language]);
		if (missing.length > 0) {
			throw new Error(`Exercise topic file ${filePath} has no topics for: ${missing.join(", ")}`);
		}

		return new ExerciseCatalog(topics);
	}

	/** Unknown languages fall back to the English topic list. */
	topics(language: string): string[] {
		return [...(this.topicsByLanguage[language] ?? this.topicsByLanguage.English ?? [])];
	}

	exerciseTypes(): ExerciseTypeInfo[] {
		return ExerciseTypeSchema.options.map((value) => ({ value, label: titleCase(value) }));
	}

	levels(): LearnerLevelInfo[] {
		return LearnerLevelSchema.options.map((value) => ({ value, label: titleCase(value) }));
	}
}
