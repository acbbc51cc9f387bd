import type {
	PipelineOutcome,
	StageFailurePolicy,
} from "@playlist-agents/shared/types";
import {
	ApiErrorSchema,
	PipelineOutcomeSchema,
} from "@playlist-agents/shared/validation/pipeline-schemas";

export function normalizeServerUrl(serverUrl: string): string {
	return serverUrl.replace(/\/+$/, "");
}

export interface RecommendParams {
	artist: string;
	seed?: number;
	language?: string;
	onStageFailure?: StageFailurePolicy;
}

async function readJson(response: Response, pathname: string): Promise<unknown> {
	try {
		return await response.json();
	} catch (error) {
		throw new Error(
			`Invalid JSON response from ${pathname}: ${
				error instanceof Error ? error.message : String(error)
			}`,
		);
	}
}

/**
 * Asks the server for a recommendation. A 404 from the server means the
 * artist could not be resolved and comes back as an `unavailable` outcome.
 */
export async function requestRecommendation(
	serverUrl: string,
	params: RecommendParams,
): Promise<PipelineOutcome> {
	const base = normalizeServerUrl(serverUrl);
	const pathname = "/api/playlist/recommend";
	let response: Response;
	try {
		response = await fetch(`${base}${pathname}`, {
			method: "POST",
			headers: { "Content-Type": "application/json" },
			body: JSON.stringify(params),
		});
	} catch (error) {
		throw new Error(
			`Failed to reach ${base}${pathname}: ${
				error instanceof Error ? error.message : String(error)
			}`,
		);
	}

	if (response.status === 404) {
		const body = ApiErrorSchema.safeParse(await readJson(response, pathname));
		if (body.success && body.data.error === "artist_not_found") {
			return { status: "unavailable", query: body.data.query ?? params.artist };
		}
		throw new Error(`HTTP 404 ${pathname}`);
	}
	if (!response.ok) {
		const body = await response.text();
		throw new Error(`HTTP ${response.status} ${pathname}: ${body}`);
	}

	const parsed = PipelineOutcomeSchema.safeParse(
		await readJson(response, pathname),
	);
	if (!parsed.success) {
		throw new Error(
			`Invalid response schema from ${pathname}: ${parsed.error.message}`,
		);
	}
	return parsed.data;
}
