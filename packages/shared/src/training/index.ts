/**
 * Contracts for training-data curation: datasets, examples, exports, fine-tuning
 * jobs and model listings.
 */
export * from "./schemas.js";
