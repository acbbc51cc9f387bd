#!/usr/bin/env node
import { STAGE_FAILURE_POLICIES } from "@playlist-agents/shared/types";
import type { CliConfig } from "./config";
import { getConfigPath, loadConfig, patchConfig } from "./config";
import { normalizeServerUrl, requestRecommendation } from "./lib/api";
import {
	getFlagChoice,
	getFlagInt,
	getFlagString,
	hasFlag,
	parseArgs,
} from "./lib/flags";
import { renderOutcome } from "./lib/render";

function printHelp(): void {
	console.log(`
playlist-agents asks a playlist-agents server to build a playlist around one
artist: it looks the artist up in the music catalog, samples related
artists, and runs four agents over the result (similarity analysis,
playlist compilation, mood split, discovery picks).

Commands:
  playlist-agents recommend <artist...> [--seed <n>] [--language <name>]
                  [--on-failure retry-then-halt|halt|placeholder]
                  [--server <url>] [--json]
  playlist-agents config [--server <url>] [--language <name>] [--clear-language]
  playlist-agents help

Examples:
  playlist-agents recommend Linkin Park
  playlist-agents recommend "Massive Attack" --seed 42 --language Russian
  playlist-agents config --server http://localhost:5185
`);
}

function printConfig(config: CliConfig): void {
	console.log(`Config file: ${getConfigPath()}`);
	console.log(`Server URL:  ${config.serverUrl}`);
	console.log(`Language:    ${config.language ?? "(server default)"}`);
}

function normalizeServerSetting(value: string): string {
	const trimmed = value.trim();
	if (!/^https?:\/\//.test(trimmed)) {
		throw new Error(`Server URL must start with http:// or https://: ${value}`);
	}
	return normalizeServerUrl(trimmed);
}

async function cmdRecommend(args: string[]): Promise<void> {
	const parsed = parseArgs(args);
	if (hasFlag(parsed, "help")) {
		printHelp();
		return;
	}
	const artist = parsed.positionals.join(" ").trim();
	if (!artist) {
		throw new Error("Usage: playlist-agents recommend <artist...>");
	}

	const config = loadConfig();
	const serverUrl = normalizeServerSetting(
		getFlagString(parsed, "server") ?? config.serverUrl,
	);
	const language = getFlagString(parsed, "language") ?? config.language;
	const seed = getFlagInt(parsed, "seed");
	const onStageFailure = getFlagChoice(
		parsed,
		STAGE_FAILURE_POLICIES,
		"on-failure",
	);

	console.error(`Running playlist agents for "${artist}"...`);
	const outcome = await requestRecommendation(serverUrl, {
		artist,
		...(seed !== undefined ? { seed } : {}),
		...(language ? { language } : {}),
		...(onStageFailure ? { onStageFailure } : {}),
	});

	if (hasFlag(parsed, "json")) {
		console.log(JSON.stringify(outcome, null, 2));
	} else if (outcome.status === "unavailable") {
		console.error(renderOutcome(outcome));
	} else {
		process.stdout.write(renderOutcome(outcome));
	}

	if (outcome.status === "unavailable") {
		process.exitCode = 1;
	} else if (outcome.status === "halted") {
		process.exitCode = 2;
	}
}

function cmdConfig(args: string[]): void {
	const parsed = parseArgs(args);
	if (hasFlag(parsed, "help")) {
		printHelp();
		return;
	}
	const server = getFlagString(parsed, "server");
	const language = getFlagString(parsed, "language");
	const clearLanguage = hasFlag(parsed, "clear-language");

	if (server === undefined && language === undefined && !clearLanguage) {
		printConfig(loadConfig());
		return;
	}

	const patch: Partial<CliConfig> = {};
	if (server !== undefined) {
		patch.serverUrl = normalizeServerSetting(server);
	}
	if (language !== undefined) {
		patch.language = language;
	}
	if (clearLanguage) {
		patch.language = null;
	}
	printConfig(patchConfig(patch));
}

async function main(): Promise<void> {
	const [command, ...rest] = process.argv.slice(2);
	if (
		!command ||
		command === "help" ||
		command === "--help" ||
		command === "-h"
	) {
		printHelp();
		return;
	}

	switch (command) {
		case "recommend":
			await cmdRecommend(rest);
			return;
		case "config":
			cmdConfig(rest);
			return;
		default:
			throw new Error(`Unknown command: ${command}`);
	}
}

main().catch((error) => {
	const message = error instanceof Error ? error.message : String(error);
	console.error(`Error: ${message}`);
	process.exit(1);
});
