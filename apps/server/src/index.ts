import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { loadServerConfig } from "./config";
import { DeezerCatalogClient } from "./external/catalog-client";
import { createLlmTextGenerator } from "./external/llm-client";
import { logger, loggingConfig } from "./logger";

const config = loadServerConfig();

logger.info(
	{
		logLevel: loggingConfig.level,
		logSessionId: loggingConfig.logSessionId,
		llmProvider: config.llmProvider,
		llmModel: config.llmModel,
		deezerApiUrl: config.deezerApiUrl,
	},
	"Logging initialized",
);

const app = createApp({
	catalog: new DeezerCatalogClient({
		baseUrl: config.deezerApiUrl,
		timeoutMs: config.catalogTimeoutMs,
	}),
	generator: createLlmTextGenerator({
		provider: config.llmProvider,
		model: config.llmModel,
		ollamaUrl: config.ollamaUrl,
		openrouterApiKey: config.openrouterApiKey,
	}),
	defaultLanguage: config.responseLanguage,
	defaultFailurePolicy: config.stageFailurePolicy,
	relatedConcurrency: config.relatedConcurrency,
});

// ─── Start HTTP server ───────────────────────────────────────────────
const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
	logger.info({ port: info.port }, "Playlist agents server listening");
});

// ─── Graceful shutdown ───────────────────────────────────────────────
function shutdown() {
	logger.info("Shutting down...");
	server.close(() => process.exit(0));
}
process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
