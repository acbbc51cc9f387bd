import z from "zod";
import {
	type PipelineOutcome,
	STAGE_FAILURE_POLICIES,
	type StageReport,
} from "../types";

/** Body of POST /api/playlist/recommend */
export const RecommendRequestSchema = z.object({
	artist: z.string().trim().min(1),
	seed: z.number().int().optional(),
	language: z.string().trim().min(1).optional(),
	onStageFailure: z.enum(STAGE_FAILURE_POLICIES).optional(),
});

export type RecommendRequest = z.infer<typeof RecommendRequestSchema>;

const StageIdSchema = z.enum([
	"similarity-analyst",
	"playlist-compiler",
	"mood-classifier",
	"discovery-recommender",
]);

const AgentResultSchema = z.discriminatedUnion("ok", [
	z.object({ ok: z.literal(true), text: z.string() }),
	z.object({ ok: z.literal(false), reason: z.string() }),
]);

const StageReportSchema: z.ZodType<StageReport> = z.discriminatedUnion(
	"status",
	[
		z.object({
			status: z.literal("ran"),
			id: StageIdSchema,
			name: z.string(),
			input: z.string(),
			attempts: z.number().int(),
			result: AgentResultSchema,
		}),
		z.object({
			status: z.literal("skipped"),
			id: StageIdSchema,
			name: z.string(),
		}),
	],
);

const ArtistMetadataSchema = z.object({
	sourceArtist: z.string(),
	sourceTracks: z.array(z.string()),
	similar: z.array(
		z.object({ name: z.string(), tracks: z.array(z.string()) }),
	),
});

/** Successful (200) response of POST /api/playlist/recommend */
export const PipelineOutcomeSchema: z.ZodType<PipelineOutcome> = z.union([
	z.object({ status: z.literal("unavailable"), query: z.string() }),
	z.object({
		status: z.enum(["completed", "halted"]),
		query: z.string(),
		metadata: ArtistMetadataSchema,
		context: z.string(),
		stages: z.array(StageReportSchema),
	}),
]);

/** Error body returned by the API for 4xx responses */
export const ApiErrorSchema = z.object({
	error: z.string(),
	query: z.string().optional(),
});
