import {
	normalizeLlmProvider,
	resolveTextLlmProfile,
} from "@playlist-agents/shared/text-llm-profile";
import {
	type LlmProvider,
	STAGE_FAILURE_POLICIES,
	type StageFailurePolicy,
} from "@playlist-agents/shared/types";

export interface ServerConfig {
	port: number;
	deezerApiUrl: string;
	catalogTimeoutMs: number;
	relatedConcurrency: number;
	llmProvider: LlmProvider;
	llmModel: string;
	ollamaUrl: string;
	openrouterApiKey: string;
	responseLanguage: string;
	stageFailurePolicy: StageFailurePolicy;
}

type Env = Record<string, string | undefined>;

const parsePositiveInt = (value: string | undefined, fallback: number) => {
	const parsed = Number(value);
	return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

function parseStageFailurePolicy(value: string | undefined): StageFailurePolicy {
	const match = STAGE_FAILURE_POLICIES.find((policy) => policy === value);
	return match ?? "retry-then-halt";
}

export function loadServerConfig(env: Env = process.env): ServerConfig {
	const provider = normalizeLlmProvider(env.LLM_PROVIDER);
	const profile = resolveTextLlmProfile({ provider, model: env.LLM_MODEL });

	return {
		port: parsePositiveInt(env.PORT, 5185),
		deezerApiUrl: (env.DEEZER_API_URL || "https://api.deezer.com").replace(
			/\/+$/,
			"",
		),
		catalogTimeoutMs: parsePositiveInt(env.CATALOG_TIMEOUT_MS, 10_000),
		relatedConcurrency: parsePositiveInt(env.RELATED_CONCURRENCY, 1),
		llmProvider: profile.provider,
		llmModel: profile.model,
		ollamaUrl: (env.OLLAMA_URL || "http://localhost:11434").replace(
			/\/+$/,
			"",
		),
		openrouterApiKey: env.OPENROUTER_API_KEY ?? "",
		responseLanguage: env.RESPONSE_LANGUAGE?.trim() || "English",
		stageFailurePolicy: parseStageFailurePolicy(env.STAGE_FAILURE_POLICY),
	};
}
