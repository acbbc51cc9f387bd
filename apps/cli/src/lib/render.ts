import { formatAgentResult } from "@playlist-agents/shared/agent-result";
import type {
	PipelineOutcome,
	StageReport,
} from "@playlist-agents/shared/types";

function renderStage(report: StageReport, index: number): string {
	const heading = `## ${index + 1}. ${report.name}`;
	if (report.status === "skipped") {
		return `${heading}\n\n_Skipped: an earlier stage failed._`;
	}
	const retried = report.attempts > 1 ? ` _(attempts: ${report.attempts})_` : "";
	return `${heading}${retried}\n\n${formatAgentResult(report.result).trim()}`;
}

/** Markdown for the terminal, one section per stage. */
export function renderOutcome(outcome: PipelineOutcome): string {
	if (outcome.status === "unavailable") {
		return `Artist not found or catalog data unavailable: ${outcome.query}`;
	}

	const { metadata } = outcome;
	const sections = [
		`# Playlist for ${metadata.sourceArtist}`,
		`Related artists: ${
			metadata.similar.map((artist) => artist.name).join(", ") || "none"
		}`,
		...outcome.stages.map(renderStage),
	];
	if (outcome.status === "halted") {
		sections.push("_Pipeline halted after a stage failed._");
	}
	return `${sections.join("\n\n")}\n`;
}
