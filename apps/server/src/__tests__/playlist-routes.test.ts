import { PipelineOutcomeSchema } from "@playlist-agents/shared/validation/pipeline-schemas";
import type { Hono } from "hono";
import { describe, expect, it } from "vitest";
import { createApp } from "../app";
import { createEchoCatalog, createEchoGenerator } from "./fakes";

function setup() {
	const catalog = createEchoCatalog();
	const { generator, calls } = createEchoGenerator();
	const app = createApp({
		catalog,
		generator,
		defaultLanguage: "English",
		defaultFailurePolicy: "retry-then-halt",
		relatedConcurrency: 2,
	});
	return { app, catalog, calls };
}

async function postRecommend(app: Hono, body: unknown): Promise<Response> {
	return app.request("http://localhost/api/playlist/recommend", {
		method: "POST",
		headers: { "content-type": "application/json" },
		body: JSON.stringify(body),
	});
}

describe("playlist routes", () => {
	it("answers the health check", async () => {
		const { app } = setup();
		const response = await app.request("http://localhost/health");
		expect(response.status).toBe(200);
		expect(await response.json()).toEqual({ ok: true });
	});

	it("runs the pipeline and returns every stage", async () => {
		const { app, calls } = setup();

		const response = await postRecommend(app, {
			artist: "Echo",
			seed: 7,
			language: "German",
		});

		expect(response.status).toBe(200);
		const outcome = PipelineOutcomeSchema.parse(await response.json());
		if (outcome.status === "unavailable") throw new Error("unexpected");
		expect(outcome.status).toBe("completed");
		expect(outcome.query).toBe("Echo");
		expect(outcome.metadata.sourceArtist).toBe("Echo");
		expect(outcome.metadata.similar).toHaveLength(5);
		expect(outcome.stages.map((stage) => stage.id)).toEqual([
			"similarity-analyst",
			"playlist-compiler",
			"mood-classifier",
			"discovery-recommender",
		]);
		expect(calls[0].messages[0].content).toContain("Respond in German.");
	});

	it("returns the same sample for the same seed", async () => {
		const first = await postRecommend(setup().app, { artist: "Echo", seed: 3 });
		const second = await postRecommend(setup().app, { artist: "Echo", seed: 3 });
		const a = PipelineOutcomeSchema.parse(await first.json());
		const b = PipelineOutcomeSchema.parse(await second.json());
		if (a.status === "unavailable" || b.status === "unavailable") {
			throw new Error("unexpected");
		}
		expect(a.metadata).toEqual(b.metadata);
	});

	it("returns 404 when the artist cannot be found", async () => {
		const { app, calls } = setup();
		const response = await postRecommend(app, { artist: "Zzyzx123" });
		expect(response.status).toBe(404);
		expect(await response.json()).toEqual({
			error: "artist_not_found",
			query: "Zzyzx123",
		});
		expect(calls).toHaveLength(0);
	});

	it("rejects a blank artist", async () => {
		const { app, catalog } = setup();
		const response = await postRecommend(app, { artist: "   " });
		expect(response.status).toBe(400);
		expect(catalog.calls).toHaveLength(0);
	});

	it("rejects an unknown failure policy", async () => {
		const { app } = setup();
		const response = await postRecommend(app, {
			artist: "Echo",
			onStageFailure: "ignore",
		});
		expect(response.status).toBe(400);
	});

	it("rejects a body that is not JSON", async () => {
		const { app } = setup();
		const response = await app.request(
			"http://localhost/api/playlist/recommend",
			{ method: "POST", body: "artist=Echo" },
		);
		expect(response.status).toBe(400);
	});
});
