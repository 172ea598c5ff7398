import { describeProject } from "@polyglot-tutor/shared";

import { buildTutorApp, createTutorServices } from "./api/app.js";
import { loadTutorConfig } from "./config/tutor.js";

async function main(): Promise<void> {
  const summary = describeProject();
  console.log("Polyglot Tutor backend starting...", summary);

  const config = loadTutorConfig();

  if (config.llmProvider === "groq" && !config.groq.apiKey) {
    console.warn("GROQ_API_KEY is not set; LLM requests will fail until it is configured.");
  }

  const services = await createTutorServices(config);
  console.log(`LLM provider: ${services.provider.name}; retrieval documents: ${services.retrievalStore.count()}`);
  if (config.llmProvider === "local") {
    console.log(`Local model: ${config.local.modelPath} served at ${config.local.serverUrl}`);
  }

  const app = await buildTutorApp(services, { logger: true });

  try {
    await app.listen({ port: config.port, host: config.host });
    console.log(`Tutor API listening at http://${config.host}:${config.port}`);
  } catch (error) {
    console.error("Failed to start tutor backend", error);
    process.exit(1);
  }

  const shutdown = async (signal: string) => {
    console.log(`Received ${signal}. Shutting down tutor backend.`);
    await app.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error("Failed to start tutor backend", error);
  process.exit(1);
});
