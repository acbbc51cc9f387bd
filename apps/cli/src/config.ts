import fs from "node:fs";
import path from "node:path";
import z from "zod";
import { getConfigRoot } from "./lib/paths";

const CONFIG_VERSION = 1;

export interface CliConfig {
	version: number;
	serverUrl: string;
	/** Response language sent with every request; null lets the server decide. */
	language: string | null;
}

const DEFAULT_SERVER_URL =
	process.env.PLAYLIST_AGENTS_SERVER_URL ?? "http://localhost:5185";

const StoredConfigSchema = z
	.object({
		serverUrl: z.unknown(),
		language: z.unknown(),
	})
	.partial();

function defaultConfig(): CliConfig {
	return {
		version: CONFIG_VERSION,
		serverUrl: DEFAULT_SERVER_URL,
		language: null,
	};
}

function sanitize(raw: unknown): CliConfig {
	const defaults = defaultConfig();
	const parsed = StoredConfigSchema.safeParse(raw);
	if (!parsed.success) return defaults;
	const { serverUrl, language } = parsed.data;

	return {
		version: CONFIG_VERSION,
		serverUrl:
			typeof serverUrl === "string" && serverUrl.trim().length > 0
				? serverUrl.trim()
				: defaults.serverUrl,
		language:
			typeof language === "string" && language.trim().length > 0
				? language.trim()
				: null,
	};
}

export function getConfigPath(): string {
	return path.join(getConfigRoot(), "config.json");
}

export function loadConfig(): CliConfig {
	const configPath = getConfigPath();
	if (!fs.existsSync(configPath)) {
		return defaultConfig();
	}

	try {
		return sanitize(JSON.parse(fs.readFileSync(configPath, "utf8")));
	} catch {
		return defaultConfig();
	}
}

export function saveConfig(next: CliConfig): void {
	const configPath = getConfigPath();
	fs.mkdirSync(path.dirname(configPath), { recursive: true });
	const sanitized = sanitize(next);
	fs.writeFileSync(
		configPath,
		`${JSON.stringify(sanitized, null, 2)}\n`,
		"utf8",
	);
}

export function patchConfig(
	patch: Partial<CliConfig>,
	current = loadConfig(),
): CliConfig {
	const merged = { ...current, ...patch };
	const sanitized = sanitize(merged);
	saveConfig(sanitized);
	return sanitized;
}
