export {
	DiagnosticsLogger,
	createConsoleDiagnosticsRecorder,
	createDiagnosticsLogger,
	recordDiagnostics,
	sanitizeDiagnosticsEvent
} from "./diagnostics-logger.js";

export type {
	DiagnosticsEvent,
	DiagnosticsLoggerOptions,
	DiagnosticsLogWriter,
	DiagnosticsRecorder,
	ExerciseItemsDiscardedDiagnosticsEvent,
	LlmRequestDiagnosticsEvent,
	LlmRetryDiagnosticsEvent,
	RetrievalDegradedDiagnosticsEvent,
	SanitizedDiagnosticsEvent,
	StreamCancelledDiagnosticsEvent,
	StructuredOutputFallbackDiagnosticsEvent,
	TrainingDatasetExportedDiagnosticsEvent,
	TrainingJobTransitionDiagnosticsEvent
} from "./diagnostics-logger.js";
