/**
 * Request and response contracts for the tutoring endpoints: chat, grammar
 * explanation, correction, exercises and health.
 *
 * @remarks
 * Import from `@polyglot-tutor/shared/tutor` so the backend and any client
 * validate payloads with the same schemas.
 */
export * from "./schemas.js";
