import type { AgentResult } from "@playlist-agents/shared/types";
import type { ChatMessage, TextGenerator } from "../external/llm-client";
import { type Logger, stageLogger } from "../logger";

export const AGENT_GENERATION_PARAMS = {
	maxOutputTokens: 1500,
	temperature: 0.4,
	topP: 0.9,
} as const;

export interface AgentOptions {
	name: string;
	role: string;
	/** Language every response must be written in, e.g. "English". */
	language: string;
	generator: TextGenerator;
	log?: Logger;
}

/** One role-bound generation call. `execute` never rejects. */
export class Agent {
	readonly name: string;
	readonly role: string;
	readonly language: string;
	private readonly generator: TextGenerator;
	private readonly log: Logger;

	constructor(options: AgentOptions) {
		this.name = options.name;
		this.role = options.role;
		this.language = options.language;
		this.generator = options.generator;
		this.log = options.log ?? stageLogger(options.name);
	}

	buildMessages(inputContext: string): ChatMessage[] {
		return [
			{
				role: "system",
				content: [
					`ROLE: ${this.name}`,
					`TASK: ${this.role}`,
					`CONSTRAINTS: Respond in ${this.language}. Use Markdown formatting. Work strictly from the provided context; do not invent data that is not in it.`,
				].join("\n"),
			},
			{
				role: "user",
				content: `DATA CONTEXT:\n${inputContext}`,
			},
		];
	}

	async execute(
		inputContext: string,
		signal?: AbortSignal,
	): Promise<AgentResult> {
		const startedAt = Date.now();
		try {
			const text = await this.generator.generate({
				messages: this.buildMessages(inputContext),
				...AGENT_GENERATION_PARAMS,
				signal,
			});
			if (!text.trim()) {
				this.log.warn("Agent returned an empty completion");
				return { ok: false, reason: "Empty completion" };
			}
			this.log.debug(
				{ durationMs: Date.now() - startedAt, chars: text.length },
				"Agent completed",
			);
			return { ok: true, text };
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error);
			this.log.warn({ err: error }, "Agent generation failed");
			return { ok: false, reason };
		}
	}
}
