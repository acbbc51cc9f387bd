import type { StageDefinition } from "@playlist-agents/shared/types";

export const PLAYLIST_STAGES: readonly StageDefinition[] = [
	{
		id: "similarity-analyst",
		name: "Similarity Analyst",
		role: "Analyze the list of related artists. Explain the stylistic connections between the target artist and each related artist.",
		input: "context",
	},
	{
		id: "playlist-compiler",
		name: "Playlist Compiler",
		role: "Compile a single track list from the context. Format each entry as 'Artist - Track'. Do not produce tracks that are not present in the context.",
		input: "context",
	},
	{
		id: "mood-classifier",
		name: "Mood Classifier",
		role: "Split the list into two contrasting mood categories. Output each category as a sorted list under its own heading.",
		input: "playlist-compiler",
	},
	{
		id: "discovery-recommender",
		name: "Discovery Recommender",
		role: "Suggest 3 NEW tracks by other artists who do not appear in the list.",
		input: "mood-classifier",
	},
];

/**
 * Throws when a stage reads from a stage that is not defined earlier in
 * the list, or when two stages share an id.
 */
export function validateStageGraph(stages: readonly StageDefinition[]): void {
	const seen = new Set<string>();
	for (const stage of stages) {
		if (seen.has(stage.id)) {
			throw new Error(`Duplicate pipeline stage "${stage.id}"`);
		}
		if (stage.input !== "context" && !seen.has(stage.input)) {
			throw new Error(
				`Stage "${stage.id}" reads from "${stage.input}", which does not run before it`,
			);
		}
		seen.add(stage.id);
	}
}
