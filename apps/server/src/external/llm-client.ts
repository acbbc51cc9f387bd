import type { LlmProvider } from "@playlist-agents/shared/types";
import { createOpenRouter } from "@openrouter/ai-sdk-provider";
import { generateText } from "ai";
import { createOllama } from "ollama-ai-provider-v2";
import { Semaphore } from "../lib/semaphore";

// ---------------------------------------------------------------------------
// Per-provider semaphore — prevents overloading local Ollama and caps
// concurrent OpenRouter requests from the server process.
// ---------------------------------------------------------------------------

type Provider = LlmProvider;

const LIMITS: Record<Provider, number> = {
	ollama: 1,
	openrouter: 5,
};

const semaphores: Record<Provider, Semaphore> = {
	ollama: new Semaphore(LIMITS.ollama),
	openrouter: new Semaphore(LIMITS.openrouter),
};

// ---------------------------------------------------------------------------
// Message / generator contracts
// ---------------------------------------------------------------------------

export type ChatMessage =
	| { role: "system"; content: string }
	| { role: "user"; content: string }
	| { role: "assistant"; content: string };

export interface GenerationRequest {
	messages: ChatMessage[];
	maxOutputTokens: number;
	temperature: number;
	topP: number;
	signal?: AbortSignal;
}

/** Anything that turns a message list into one completion. */
export interface TextGenerator {
	generate(request: GenerationRequest): Promise<string>;
}

export interface LlmConnection {
	provider: Provider;
	model: string;
	ollamaUrl: string;
	openrouterApiKey: string;
}

// ---------------------------------------------------------------------------
// Provider factory (internal)
// ---------------------------------------------------------------------------

function getLanguageModel(connection: LlmConnection) {
	if (connection.provider === "openrouter") {
		if (!connection.openrouterApiKey) {
			throw new Error(
				"No OpenRouter API key configured. Set OPENROUTER_API_KEY.",
			);
		}
		const or = createOpenRouter({ apiKey: connection.openrouterApiKey });
		return or(connection.model);
	}
	const ollama = createOllama({ baseURL: `${connection.ollamaUrl}/api` });
	return ollama(connection.model);
}

// ---------------------------------------------------------------------------
// Exported API
// ---------------------------------------------------------------------------

export async function callLlmChat(
	connection: LlmConnection,
	request: GenerationRequest,
): Promise<string> {
	const { provider } = connection;
	if (!(provider in semaphores)) {
		throw new Error(
			`Invalid LLM provider "${provider}". Must be one of: ${Object.keys(semaphores).join(", ")}`,
		);
	}
	if (!connection.model.trim()) {
		throw new Error(`No model configured for LLM provider "${provider}".`);
	}

	return semaphores[provider].run(async () => {
		const providerOptions =
			provider === "ollama" ? { ollama: { think: false } } : undefined;

		const { text } = await generateText({
			model: getLanguageModel(connection),
			messages: request.messages,
			maxOutputTokens: request.maxOutputTokens,
			temperature: request.temperature,
			topP: request.topP,
			providerOptions,
			abortSignal: request.signal,
		});
		return text;
	}, request.signal);
}

export function createLlmTextGenerator(connection: LlmConnection): TextGenerator {
	return {
		generate: (request) => callLlmChat(connection, request),
	};
}
