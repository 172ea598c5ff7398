import type { TrainingConfig } from "@polyglot-tutor/shared/training";
import { spawn, type ChildProcess } from "node:child_process";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { createInterface } from "node:readline";
import { z } from "zod";

export interface FineTuneProgress {
	step: number;
	totalSteps: number;
	metrics: Record<string, number>;
}

export interface FineTuneRequest {
	jobId: string;
	config: TrainingConfig;
	dataFile: string;
	outputDir: string;
	signal: AbortSignal;
	onProgress(progress: FineTuneProgress): void;
}

export interface FineTuneResult {
	outputPath: string;
}

/**
 * Performs the actual fine-tuning outside this process. The job service only
 * relays what the runner reports.
 */
export interface FineTuneRunner {
	run(request: FineTuneRequest): Promise<FineTuneResult>;
}

export class FineTuneError extends Error {
	readonly code = "FINE_TUNE_FAILED" as const;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "FineTuneError";
	}
}

const ProgressLineSchema = z.object({
	step: z.number().int().nonnegative(),
	total_steps: z.number().int().nonnegative(),
	metrics: z.record(z.number()).default({})
});

const ResultLineSchema = z.object({
	output_path: z.string().min(1)
});

const STDERR_TAIL_LINES = 20;

export interface ProcessFineTuneRunnerOptions {
	/** Executable followed by its arguments; the job config path is appended. */
	command: string | null;
	workDir: string;
	spawnImpl?: typeof spawn;
}

function formatExitMessage(code: number | null, signal: NodeJS.Signals | null): string {
	if (signal) {
		return `Training command terminated by signal ${signal}`;
	}
	return `Training command exited with code ${code ?? "unknown"}`;
}

/**
 * Runs `TRAINING_COMMAND <config.json>` and reads JSON lines from its stdout:
 * `{step, total_steps, metrics}` for progress and `{output_path}` on success.
 */
export class ProcessFineTuneRunner implements FineTuneRunner {
	private readonly command: string | null;
	private readonly workDir: string;
	private readonly spawnImpl: typeof spawn;

	constructor(options: ProcessFineTuneRunnerOptions) {
		this.command = options.command?.trim() || null;
		this.workDir = options.workDir;
		this.spawnImpl = options.spawnImpl ?? spawn;
	}

	async run(request: FineTuneRequest): Promise<FineTuneResult> {
		if (!this.command) {
			throw new FineTuneError("No training command is configured; set TRAINING_COMMAND to enable fine-tuning");
		}

		const [executable, ...args] = this.command.split(/\s+/u);
		if (!executable) {
			throw new FineTuneError("TRAINING_COMMAND is empty");
		}

		const configPath = path.join(this.workDir, `job-${request.jobId}.json`);
		await mkdir(this.workDir, { recursive: true });
		await writeFile(
			configPath,
			JSON.stringify(
				{
					job_id: request.jobId,
					data_file: request.dataFile,
					output_dir: request.outputDir,
					...request.config
				},
				null,
				2
			),
			"utf-8"
		);

		const child = this.spawnImpl(executable, [...args, configPath], {
			stdio: ["ignore", "pipe", "pipe"]
		});

		return this.supervise(child, request);
	}

	private supervise(child: ChildProcess, request: FineTuneRequest): Promise<FineTuneResult> {
		return new Promise<FineTuneResult>((resolve, reject) => {
			let outputPath: string | null = null;
			const stderrTail: string[] = [];

			const onAbort = () => {
				if (!child.killed) {
					child.kill("SIGTERM");
				}
			};
			if (request.signal.aborted) {
				onAbort();
			} else {
				request.signal.addEventListener("abort", onAbort, { once: true });
			}

			if (child.stdout) {
				createInterface({ input: child.stdout, crlfDelay: Infinity }).on("line", (line) => {
					const parsed = parseJsonLine(line);
					const progress = ProgressLineSchema.safeParse(parsed);
					if (progress.success) {
						request.onProgress({
							step: progress.data.step,
							totalSteps: progress.data.total_steps,
							metrics: progress.data.metrics
						});
						return;
					}
					const result = ResultLineSchema.safeParse(parsed);
					if (result.success) {
						outputPath = result.data.output_path;
					}
				});
			}

			if (child.stderr) {
				createInterface({ input: child.stderr, crlfDelay: Infinity }).on("line", (line) => {
					stderrTail.push(line);
					if (stderrTail.length > STDERR_TAIL_LINES) {
						stderrTail.shift();
					}
				});
			}

			child.once("error", (error) => {
				request.signal.removeEventListener("abort", onAbort);
				reject(new FineTuneError(`Failed to start training command: ${error.message}`, { cause: error }));
			});

			child.once("close", (code, signal) => {
				request.signal.removeEventListener("abort", onAbort);
				if (request.signal.aborted) {
					reject(new FineTuneError("Training was cancelled"));
					return;
				}
				if (code === 0) {
					resolve({ outputPath: outputPath ?? request.outputDir });
					return;
				}
				const detail = stderrTail.length > 0 ? `: ${stderrTail.join("\n")}` : "";
				reject(new FineTuneError(`${formatExitMessage(code, signal)}${detail}`));
			});
		});
	}
}

function parseJsonLine(line: string): unknown {
	const trimmed = line.trim();
	if (!trimmed.startsWith("{")) {
		return undefined;
	}
	try {
		return JSON.parse(trimmed) as unknown;
	} catch {
		return undefined;
	}
}
