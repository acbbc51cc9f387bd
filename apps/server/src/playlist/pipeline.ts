import { formatAgentResult } from "@playlist-agents/shared/agent-result";
import type {
	AgentResult,
	ArtistMetadata,
	PipelineOutcome,
	StageDefinition,
	StageFailurePolicy,
	StageId,
	StageReport,
} from "@playlist-agents/shared/types";
import type { CatalogClient } from "../external/catalog-client";
import type { TextGenerator } from "../external/llm-client";
import type { RandomSource } from "../lib/random";
import { logger } from "../logger";
import { Agent } from "./agent";
import { buildArtistContext } from "./context-builder";
import { fetchArtistMetadata } from "./metadata-fetcher";
import { PLAYLIST_STAGES, validateStageGraph } from "./stages";

export type PipelineProgressEvent =
	| { type: "metadata-ready"; metadata: ArtistMetadata }
	| { type: "stage-start"; stage: StageDefinition; attempt: number }
	| { type: "stage-complete"; report: StageReport };

export interface PipelineOptions {
	generator: TextGenerator;
	language: string;
	stages?: readonly StageDefinition[];
	/**
	 * What to do when an agent fails:
	 * - retry-then-halt: run the stage once more unless `signal` has
	 *   aborted, halt if it fails again
	 * - halt: stop at the first failure
	 * - placeholder: feed the failure text forward and keep going
	 */
	onStageFailure?: StageFailurePolicy;
	onProgress?: (event: PipelineProgressEvent) => void;
	signal?: AbortSignal;
}

export interface RecommendOptions extends PipelineOptions {
	catalog: CatalogClient;
	random?: RandomSource;
	relatedConcurrency?: number;
}

/**
 * Runs every stage in order over the context built from `metadata`.
 * Stages never run concurrently; each reads either the built context or
 * the output of the stage named by its `input`.
 */
export async function runPlaylistPipeline(
	query: string,
	metadata: ArtistMetadata,
	options: PipelineOptions,
): Promise<PipelineOutcome> {
	const stages = options.stages ?? PLAYLIST_STAGES;
	const policy = options.onStageFailure ?? "retry-then-halt";
	const emit = options.onProgress ?? (() => {});
	validateStageGraph(stages);

	const context = buildArtistContext(metadata);
	const outputs = new Map<StageId, string>();
	const reports: StageReport[] = [];
	let halted = false;

	for (const stage of stages) {
		if (halted) {
			const skipped: StageReport = {
				status: "skipped",
				id: stage.id,
				name: stage.name,
			};
			reports.push(skipped);
			emit({ type: "stage-complete", report: skipped });
			continue;
		}

		const input =
			stage.input === "context" ? context : outputs.get(stage.input);
		if (input === undefined) {
			throw new Error(
				`Stage "${stage.id}" has no output from "${stage.input}" to read`,
			);
		}

		const agent = new Agent({
			name: stage.name,
			role: stage.role,
			language: options.language,
			generator: options.generator,
		});
		const maxAttempts = policy === "retry-then-halt" ? 2 : 1;

		let attempts = 0;
		let result: AgentResult;
		do {
			attempts++;
			emit({ type: "stage-start", stage, attempt: attempts });
			result = await agent.execute(input, options.signal);
		} while (
			!result.ok &&
			attempts < maxAttempts &&
			!options.signal?.aborted
		);

		const report: StageReport = {
			status: "ran",
			id: stage.id,
			name: stage.name,
			input,
			attempts,
			result,
		};
		reports.push(report);
		emit({ type: "stage-complete", report });

		if (result.ok) {
			outputs.set(stage.id, result.text);
		} else if (policy === "placeholder") {
			outputs.set(stage.id, formatAgentResult(result));
		} else {
			logger.warn(
				{ query, stage: stage.id, attempts, reason: result.reason },
				"Halting playlist pipeline after stage failure",
			);
			halted = true;
		}
	}

	return {
		status: halted ? "halted" : "completed",
		query,
		metadata,
		context,
		stages: reports,
	};
}

/**
 * Fetches metadata for `query` and runs the pipeline over it. No agent runs
 * when the metadata is unavailable.
 */
export async function recommendPlaylist(
	query: string,
	options: RecommendOptions,
): Promise<PipelineOutcome> {
	const metadata = await fetchArtistMetadata(query, {
		catalog: options.catalog,
		random: options.random,
		relatedConcurrency: options.relatedConcurrency,
		signal: options.signal,
	});
	if (!metadata) {
		return { status: "unavailable", query };
	}
	options.onProgress?.({ type: "metadata-ready", metadata });
	return runPlaylistPipeline(query, metadata, options);
}
