import type { LlmProvider } from "./types";

export const DEFAULT_TEXT_PROVIDER: LlmProvider = "ollama";
export const DEFAULT_OLLAMA_TEXT_MODEL = "qwen2.5:7b-instruct";
export const DEFAULT_OPENROUTER_TEXT_MODEL = "qwen/qwen-2.5-72b-instruct";

export function normalizeLlmProvider(
	value?: string | null,
	fallback: LlmProvider = DEFAULT_TEXT_PROVIDER,
): LlmProvider {
	if (!value) return fallback;
	if (value === "ollama" || value === "openrouter") {
		return value;
	}
	return fallback;
}

export function resolveTextLlmProfile(input?: {
	provider?: string | null;
	model?: string | null;
}): { provider: LlmProvider; model: string } {
	const provider = normalizeLlmProvider(input?.provider);
	const explicitModel = input?.model?.trim() || "";

	if (explicitModel) {
		return { provider, model: explicitModel };
	}

	return {
		provider,
		model:
			provider === "openrouter"
				? DEFAULT_OPENROUTER_TEXT_MODEL
				: DEFAULT_OLLAMA_TEXT_MODEL,
	};
}
