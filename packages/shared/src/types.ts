/**
 * Shared wire types used by the API server and the terminal client.
 */

export const LLM_PROVIDERS = ["ollama", "openrouter"] as const;
export type LlmProvider = (typeof LLM_PROVIDERS)[number];

export const STAGE_FAILURE_POLICIES = [
	"retry-then-halt",
	"halt",
	"placeholder",
] as const;
export type StageFailurePolicy = (typeof STAGE_FAILURE_POLICIES)[number];

// ─── Catalog metadata ───────────────────────────────────────────────

export interface RelatedArtist {
	name: string;
	/** At most two titles, in catalog order. */
	tracks: string[];
}

export interface ArtistMetadata {
	sourceArtist: string;
	/** At most four titles, in catalog order. */
	sourceTracks: string[];
	/** At most five artists, in sampled order. */
	similar: RelatedArtist[];
}

// ─── Agent / pipeline wire types ────────────────────────────────────

export type AgentResult =
	| { ok: true; text: string }
	| { ok: false; reason: string };

export type StageId =
	| "similarity-analyst"
	| "playlist-compiler"
	| "mood-classifier"
	| "discovery-recommender";

export type StageInput = "context" | StageId;

export interface StageDefinition {
	id: StageId;
	name: string;
	role: string;
	input: StageInput;
}

export type StageReport =
	| {
			status: "ran";
			id: StageId;
			name: string;
			input: string;
			attempts: number;
			result: AgentResult;
	  }
	| {
			status: "skipped";
			id: StageId;
			name: string;
	  };

export type PipelineOutcome =
	| { status: "unavailable"; query: string }
	| {
			status: "completed" | "halted";
			query: string;
			metadata: ArtistMetadata;
			context: string;
			stages: StageReport[];
	  };
