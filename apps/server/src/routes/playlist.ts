import type { StageFailurePolicy } from "@playlist-agents/shared/types";
import { RecommendRequestSchema } from "@playlist-agents/shared/validation/pipeline-schemas";
import { Hono } from "hono";
import type { CatalogClient } from "../external/catalog-client";
import type { TextGenerator } from "../external/llm-client";
import { createRandomSource } from "../lib/random";
import { logger } from "../logger";
import { recommendPlaylist } from "../playlist/pipeline";

export interface PlaylistRouteDeps {
	catalog: CatalogClient;
	generator: TextGenerator;
	defaultLanguage: string;
	defaultFailurePolicy: StageFailurePolicy;
	relatedConcurrency: number;
}

export function createPlaylistRoutes(deps: PlaylistRouteDeps): Hono {
	const app = new Hono();

	// POST /api/playlist/recommend
	app.post("/recommend", async (c) => {
		const body: unknown = await c.req.json().catch(() => null);
		const parsed = RecommendRequestSchema.safeParse(body);
		if (!parsed.success) {
			return c.json({ error: parsed.error.message }, 400);
		}

		const { artist, seed, language, onStageFailure } = parsed.data;
		const outcome = await recommendPlaylist(artist, {
			catalog: deps.catalog,
			generator: deps.generator,
			random: createRandomSource(seed),
			relatedConcurrency: deps.relatedConcurrency,
			language: language ?? deps.defaultLanguage,
			onStageFailure: onStageFailure ?? deps.defaultFailurePolicy,
			signal: c.req.raw.signal,
			onProgress: (event) => {
				if (event.type === "stage-start") {
					logger.debug(
						{ stage: event.stage.id, attempt: event.attempt },
						"Stage started",
					);
				}
			},
		});

		if (outcome.status === "unavailable") {
			return c.json({ error: "artist_not_found", query: outcome.query }, 404);
		}
		return c.json(outcome);
	});

	return app;
}
