export * from "./tutor/index.js";
export * from "./training/index.js";

import { SUPPORTED_LANGUAGES } from "./tutor/schemas.js";

export interface ProjectSummary {
  name: string;
  description: string;
  languages: readonly string[];
}

export function describeProject(): ProjectSummary {
  return {
    name: "Polyglot Tutor",
    description:
      "Language tutoring service with retrieval-grounded chat, grammar correction, exercises and training-data curation.",
    languages: SUPPORTED_LANGUAGES
  };
}
